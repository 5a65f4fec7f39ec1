import type { ChatMessage, SamplingParams } from '../types'

export type BackendKind = 'remote' | 'local'

export interface GenerateRequest {
  model: string
  prompt: string
  system?: string
  images?: string[]
  sampling?: SamplingParams
  signal?: AbortSignal
}

export interface ChatRequest {
  model: string
  messages: ChatMessage[]
  sampling?: SamplingParams
  signal?: AbortSignal
}

export interface BackendCapabilities {
  // the backend keeps conversation state itself and only needs the newest user turn
  readonly retainsChatHistory: boolean
}

/**
 * One completion backend. Both request shapes return a lazy token stream;
 * nothing is sent until the caller starts iterating.
 *
 * Streams fail with `BackendUnavailableError` or `BackendProtocolError`, and
 * with `CancelledError` once `signal` aborts.
 */
export interface BackendClient {
  readonly kind: BackendKind
  readonly capabilities: BackendCapabilities
  generate(request: GenerateRequest): AsyncIterable<string>
  chat(request: ChatRequest): AsyncIterable<string>
  listModels(): Promise<string[]>
  // drop any conversation state retained between calls
  reset?(): void
}
