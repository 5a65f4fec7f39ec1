import type { ReadableStream } from 'node:stream/web'
import type { z } from 'zod'
import type { ChatMessage, SamplingParams } from '../types'
import type { BackendCapabilities, BackendClient, ChatRequest, GenerateRequest } from './backend'
import { BackendProtocolError, BackendUnavailableError, CancelledError, ChatEngineError, errorMessage, isAbortError } from './errors'
import { parseRecords, readLines } from './ndjson'
import { chatRecordSchema, generateRecordSchema, tagsResponseSchema } from './schemas'

export interface HttpRequestInit {
  method: 'GET' | 'POST'
  headers: Record<string, string>
  body?: string
  signal?: AbortSignal
}

export interface HttpResponse {
  readonly ok: boolean
  readonly status: number
  readonly body: ReadableStream<Uint8Array> | null
  text(): Promise<string>
}

export type FetchLike = (url: string, init: HttpRequestInit) => Promise<HttpResponse>

export interface RemoteChatBackendConfig {
  readonly baseUrl: string
  readonly requestTimeoutMs?: number
  readonly fetch?: FetchLike
}

type WireOptions = {
  temperature?: number
  top_p?: number
  num_ctx?: number
  num_predict?: number
}

type WireMessage = { role: ChatMessage['role']; content: string; images?: string[] }

type StreamRecord = { done: boolean; error?: string }

export const toWireOptions = (sampling?: SamplingParams): WireOptions | undefined => {
  if (!sampling) return undefined
  const out: WireOptions = {}
  if (typeof sampling.temperature === 'number') out.temperature = sampling.temperature
  if (typeof sampling.topP === 'number') out.top_p = sampling.topP
  if (typeof sampling.numCtx === 'number') out.num_ctx = sampling.numCtx
  if (typeof sampling.maxTokens === 'number') out.num_predict = sampling.maxTokens
  return Object.keys(out).length > 0 ? out : undefined
}

const toWireMessage = (m: ChatMessage): WireMessage =>
  m.images && m.images.length > 0 ? { role: m.role, content: m.content, images: m.images } : { role: m.role, content: m.content }

// Ollama error bodies look like `{"error":"model 'x' not found"}`
const extractServerError = (text: string): string | undefined => {
  try {
    const json: unknown = JSON.parse(text)
    if (json && typeof json === 'object' && 'error' in json && typeof json.error === 'string') return json.error
  } catch {
    // plain-text body
  }
  return text.trim() || undefined
}

/**
 * Streams completions from an Ollama-compatible HTTP server. Requests go out
 * with `stream: true`; the body is newline-delimited JSON ending in a record
 * with `done: true`.
 */
export class RemoteChatBackend implements BackendClient {
  readonly kind = 'remote' as const
  readonly capabilities: BackendCapabilities = { retainsChatHistory: false }
  private readonly baseUrl: string
  private readonly requestTimeoutMs: number
  private readonly fetchImpl: FetchLike

  constructor(config: RemoteChatBackendConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '')
    this.requestTimeoutMs = config.requestTimeoutMs ?? 30_000
    this.fetchImpl = config.fetch ?? ((url, init) => fetch(url, init))
  }

  generate(request: GenerateRequest): AsyncIterable<string> {
    const { model, prompt, system, images, sampling, signal } = request
    const payload: Record<string, unknown> = { model, prompt, stream: true }
    if (system) payload.system = system
    if (images && images.length > 0) payload.images = images
    const options = toWireOptions(sampling)
    if (options) payload.options = options
    return this.stream('/api/generate', payload, signal, generateRecordSchema, rec => rec.response)
  }

  chat(request: ChatRequest): AsyncIterable<string> {
    const { model, messages, sampling, signal } = request
    const payload: Record<string, unknown> = { model, messages: messages.map(toWireMessage), stream: true }
    const options = toWireOptions(sampling)
    if (options) payload.options = options
    return this.stream('/api/chat', payload, signal, chatRecordSchema, rec => rec.message?.content)
  }

  async listModels(): Promise<string[]> {
    const controller = new AbortController()
    const timeout = setTimeout(() => controller.abort(), this.requestTimeoutMs)
    try {
      const res = await this.send('/api/tags', { method: 'GET', headers: {}, signal: controller.signal })
      const text = await res.text()
      let json: unknown
      try {
        json = JSON.parse(text)
      } catch (err) {
        throw new BackendProtocolError('Model list is not valid JSON', { record: text, cause: err })
      }
      const parsed = tagsResponseSchema.safeParse(json)
      if (!parsed.success) throw new BackendProtocolError('Unexpected model list shape', { record: text })
      return parsed.data.models.map(m => m.name)
    } catch (err) {
      if (err instanceof CancelledError || controller.signal.aborted) {
        throw new BackendUnavailableError(`Model list request timed out after ${this.requestTimeoutMs}ms`, { cause: err })
      }
      throw err
    } finally {
      clearTimeout(timeout)
    }
  }

  private async send(path: string, init: HttpRequestInit): Promise<HttpResponse> {
    let res: HttpResponse
    try {
      res = await this.fetchImpl(`${this.baseUrl}${path}`, init)
    } catch (err) {
      if (init.signal?.aborted || isAbortError(err)) throw new CancelledError()
      throw new BackendUnavailableError(`Cannot reach backend at ${this.baseUrl}: ${errorMessage(err)}`, { cause: err })
    }
    if (!res.ok) {
      const text = await res.text().catch(() => '')
      const detail = extractServerError(text)
      throw new BackendUnavailableError(detail ?? `Backend request failed: ${res.status}`, { status: res.status, body: text })
    }
    return res
  }

  private async *stream<T extends StreamRecord>(
    path: string,
    payload: Record<string, unknown>,
    signal: AbortSignal | undefined,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    pick: (record: T) => string | undefined,
  ): AsyncGenerator<string> {
    if (signal?.aborted) throw new CancelledError()
    const res = await this.send(path, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(payload),
      signal,
    })
    if (!res.body) throw new BackendProtocolError('Response has no body')

    const records = parseRecords(readLines(res.body), (raw, line) => {
      const parsed = schema.safeParse(raw)
      if (!parsed.success) throw new BackendProtocolError('Unexpected record shape', { record: line })
      return parsed.data
    })

    let completed = false
    try {
      for await (const record of records) {
        if (record.error) throw new BackendProtocolError(record.error)
        const text = pick(record)
        if (text) yield text
        if (record.done) {
          completed = true
          break
        }
      }
    } catch (err) {
      if (signal?.aborted || isAbortError(err)) throw new CancelledError()
      if (err instanceof ChatEngineError) throw err
      throw new BackendUnavailableError(`Connection to backend lost: ${errorMessage(err)}`, { cause: err })
    }
    if (!completed) {
      if (signal?.aborted) throw new CancelledError()
      throw new BackendProtocolError('Response stream ended before completion')
    }
  }
}
