export const THINK_OPEN = '<think>'
export const THINK_CLOSE = '</think>'
export const DEFAULT_THINKING_MARKER = '💭'

export type ThinkState = 'normal' | 'insideThink'

export interface TokenStreamFilterOptions {
  revealThinking: boolean
  marker?: string
}

// Length of the longest suffix of `text` that is a proper prefix of `tag`.
const partialTagSuffix = (text: string, tag: string): number => {
  const max = Math.min(text.length, tag.length - 1)
  for (let n = max; n > 0; n--) {
    if (tag.startsWith(text.slice(text.length - n))) return n
  }
  return 0
}

/**
 * Strips `<think>…</think>` spans from a token stream, or marks them when
 * `revealThinking` is set. Tags are matched literally and do not nest.
 *
 * A fragment ending in a partial tag (`"<thi"`) holds that suffix back until
 * the next fragment shows whether it completes the tag; `flush()` releases it
 * once the stream ends.
 */
export class TokenStreamFilter {
  readonly revealThinking: boolean
  readonly marker: string
  private current: ThinkState = 'normal'
  private carry = ''

  constructor(opts: TokenStreamFilterOptions) {
    this.revealThinking = opts.revealThinking
    this.marker = opts.marker ?? DEFAULT_THINKING_MARKER
  }

  get state(): ThinkState {
    return this.current
  }

  reset(): void {
    this.current = 'normal'
    this.carry = ''
  }

  push(fragment: string): string {
    let remaining = this.carry + fragment
    this.carry = ''
    let out = ''

    while (remaining.length > 0) {
      if (this.current === 'normal') {
        const at = remaining.indexOf(THINK_OPEN)
        if (at >= 0) {
          out += remaining.slice(0, at)
          this.current = 'insideThink'
          if (this.revealThinking) out += this.marker
          remaining = remaining.slice(at + THINK_OPEN.length)
          continue
        }
        const held = partialTagSuffix(remaining, THINK_OPEN)
        out += remaining.slice(0, remaining.length - held)
        this.carry = remaining.slice(remaining.length - held)
        remaining = ''
      } else {
        const at = remaining.indexOf(THINK_CLOSE)
        if (at >= 0) {
          if (this.revealThinking) out += remaining.slice(0, at) + this.marker
          this.current = 'normal'
          remaining = remaining.slice(at + THINK_CLOSE.length)
          continue
        }
        const held = partialTagSuffix(remaining, THINK_CLOSE)
        if (this.revealThinking) out += remaining.slice(0, remaining.length - held)
        this.carry = remaining.slice(remaining.length - held)
        remaining = ''
      }
    }
    return out
  }

  flush(): string {
    const rest = this.carry
    this.carry = ''
    if (this.current === 'insideThink' && !this.revealThinking) return ''
    return rest
  }
}
