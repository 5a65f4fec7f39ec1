import type { SamplingParams } from '../types'
import type { BackendCapabilities, BackendClient, ChatRequest, GenerateRequest } from './backend'
import { BackendProtocolError, BackendUnavailableError, CancelledError, ChatEngineError, errorMessage, isAbortError } from './errors'

/** A conversation held by the engine; it keeps its own KV-cache between prompts. */
export interface InferenceChat {
  streamResponse(prompt: string, signal: AbortSignal): AsyncIterable<string>
}

export interface InferenceEngine {
  createChat(sampling: SamplingParams): InferenceChat
  dispose?(): void
}

export interface InferenceEngineLoader {
  load(modelId: string): Promise<InferenceEngine>
  listModels?(): Promise<string[]>
}

export const foldSystemPrompt = (prompt: string, system?: string): string =>
  system ? `${system}\n\nUser: ${prompt}\nAssistant:` : prompt

/**
 * Runs generation in process through a pluggable engine. The requested model
 * is loaded on first use and reloaded when a request names another one.
 * `chat` reuses one engine-side conversation, so only the newest user turn is
 * sent each time.
 */
export class LocalInferenceBackend implements BackendClient {
  readonly kind = 'local' as const
  readonly capabilities: BackendCapabilities = { retainsChatHistory: true }
  private engine?: InferenceEngine
  private modelId?: string
  private retained?: InferenceChat

  constructor(private readonly loader: InferenceEngineLoader) {}

  get isLoaded(): boolean {
    return this.engine !== undefined
  }

  get loadedModelId(): string | undefined {
    return this.modelId
  }

  async load(modelId: string): Promise<void> {
    this.unload()
    try {
      this.engine = await this.loader.load(modelId)
    } catch (err) {
      throw new BackendUnavailableError(`Failed to load model ${modelId}: ${errorMessage(err)}`, { cause: err })
    }
    this.modelId = modelId
  }

  unload(): void {
    this.engine?.dispose?.()
    this.engine = undefined
    this.modelId = undefined
    this.retained = undefined
  }

  reset(): void {
    this.retained = undefined
  }

  async listModels(): Promise<string[]> {
    if (this.loader.listModels) return this.loader.listModels()
    return this.modelId ? [this.modelId] : []
  }

  generate(request: GenerateRequest): AsyncIterable<string> {
    const { model, prompt, system, sampling, signal } = request
    return this.run(model, signal, engine => ({
      chat: engine.createChat(sampling ?? {}),
      prompt: foldSystemPrompt(prompt, system),
    }))
  }

  chat(request: ChatRequest): AsyncIterable<string> {
    const { model, messages, sampling, signal } = request
    return this.run(model, signal, engine => {
      const last = messages[messages.length - 1]
      if (!last || last.role !== 'user') throw new BackendProtocolError('Chat request must end with a user turn')
      if (!this.retained) this.retained = engine.createChat(sampling ?? {})
      return { chat: this.retained, prompt: last.content }
    })
  }

  // Loads `modelId` unless it is already the loaded model; switching drops the retained chat.
  private async engineFor(modelId: string): Promise<InferenceEngine> {
    if (!this.engine || this.modelId !== modelId) await this.load(modelId)
    if (!this.engine) throw new BackendUnavailableError(`Model ${modelId} is not loaded`)
    return this.engine
  }

  private async *run(
    modelId: string,
    signal: AbortSignal | undefined,
    prepare: (engine: InferenceEngine) => { chat: InferenceChat; prompt: string },
  ): AsyncGenerator<string> {
    if (signal?.aborted) throw new CancelledError()
    const engine = await this.engineFor(modelId)
    if (signal?.aborted) throw new CancelledError()
    const { chat, prompt } = prepare(engine)
    const controller = new AbortController()
    const onAbort = () => controller.abort()
    signal?.addEventListener('abort', onAbort, { once: true })
    try {
      for await (const token of chat.streamResponse(prompt, controller.signal)) {
        if (controller.signal.aborted) throw new CancelledError()
        yield token
      }
      if (controller.signal.aborted) throw new CancelledError()
    } catch (err) {
      if (controller.signal.aborted || isAbortError(err)) throw new CancelledError()
      if (err instanceof ChatEngineError) throw err
      throw new BackendProtocolError(`Text generation failed: ${errorMessage(err)}`, { cause: err })
    } finally {
      signal?.removeEventListener('abort', onAbort)
      // consumer stopped pulling: stop the engine too
      controller.abort()
    }
  }
}
