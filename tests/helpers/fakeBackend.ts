import type { BackendClient, ChatRequest, GenerateRequest } from '../../src/lib/backend'
import { CancelledError } from '../../src/lib/errors'

export type Step = string | Error | 'hold'

// Plays a script of fragments; 'hold' parks the stream until its signal aborts.
async function* play(steps: Step[], signal?: AbortSignal): AsyncGenerator<string> {
  for (const step of steps) {
    if (step instanceof Error) throw step
    if (step === 'hold') {
      await new Promise<void>((_, reject) => {
        if (signal?.aborted) return reject(new CancelledError())
        signal?.addEventListener('abort', () => reject(new CancelledError()), { once: true })
      })
      continue
    }
    yield step
  }
}

export class ScriptedBackend implements BackendClient {
  readonly kind = 'remote' as const
  readonly capabilities = { retainsChatHistory: false }
  readonly generateRequests: GenerateRequest[] = []
  readonly chatRequests: ChatRequest[] = []
  models: string[] | Error = []
  resets = 0
  private readonly scripts: Step[][] = []

  enqueue(...steps: Step[]): this {
    this.scripts.push(steps)
    return this
  }

  generate(request: GenerateRequest): AsyncIterable<string> {
    this.generateRequests.push(request)
    return play(this.scripts.shift() ?? [], request.signal)
  }

  chat(request: ChatRequest): AsyncIterable<string> {
    this.chatRequests.push(request)
    return play(this.scripts.shift() ?? [], request.signal)
  }

  async listModels(): Promise<string[]> {
    if (this.models instanceof Error) throw this.models
    return this.models
  }

  reset(): void {
    this.resets++
  }
}

export const silentLogger = () => ({ info: jest.fn(), warn: jest.fn(), error: jest.fn() })
