import type { ReadableStream } from 'node:stream/web'
import { TextDecoder } from 'node:util'
import { BackendProtocolError } from './errors'

/**
 * Yields complete lines from a byte stream. A line split across reads is
 * buffered until its newline arrives; a trailing line with no newline is
 * yielded at end of stream. Blank lines are skipped.
 */
export async function* readLines(body: ReadableStream<Uint8Array>): AsyncGenerator<string> {
  const reader = body.getReader()
  const decoder = new TextDecoder('utf-8')
  let buffer = ''
  let finished = false
  try {
    while (!finished) {
      const { value, done } = await reader.read()
      finished = done
      if (value) buffer += decoder.decode(value, { stream: true })
      if (finished) buffer += decoder.decode()
      let idx
      while ((idx = buffer.indexOf('\n')) >= 0) {
        const line = buffer.slice(0, idx).trim()
        buffer = buffer.slice(idx + 1)
        if (line) yield line
      }
    }
    const tail = buffer.trim()
    if (tail) yield tail
  } finally {
    // consumer stopped early: release the connection
    if (!finished) await reader.cancel().catch(() => undefined)
    reader.releaseLock()
  }
}

export async function* parseRecords<T>(
  lines: AsyncIterable<string>,
  parse: (raw: unknown, line: string) => T,
): AsyncGenerator<T> {
  for await (const line of lines) {
    let raw: unknown
    try {
      raw = JSON.parse(line)
    } catch (err) {
      throw new BackendProtocolError('Malformed record in response stream', { record: line, cause: err })
    }
    yield parse(raw, line)
  }
}
