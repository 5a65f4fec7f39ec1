export type Author = 'user' | 'assistant'

export type MessageRole = 'system' | 'user' | 'assistant'

export interface SamplingParams {
  temperature?: number
  topP?: number
  numCtx?: number
  maxTokens?: number
}

export interface Role {
  readonly id: string
  readonly displayName: string
  readonly systemPrompt: string
  readonly defaultModelId: string
  readonly usesMultiTurnChat: boolean
  // each send starts from an empty transcript
  readonly clearsHistoryOnSend: boolean
  readonly revealThinking: boolean
  readonly shortcut?: string
  readonly sampling: Readonly<SamplingParams>
}

export type AttachmentKind = 'image' | 'other'

export interface Attachment {
  readonly id: string
  readonly name: string
  readonly mime: string
  readonly kind: AttachmentKind
  readonly data: Uint8Array
}

export interface Turn {
  readonly id: string
  readonly author: Author
  text: string
  readonly attachments: readonly Attachment[]
  readonly createdAt: number
}

export interface ChatMessage {
  role: MessageRole
  content: string
  // base64-encoded image payloads
  images?: string[]
}

export interface SessionState {
  turns: Turn[]
  roleId: string
  modelId: string
  availableModels: string[]
  pendingAttachments: Attachment[]
  isStreaming: boolean
  lastError?: string
}
