import { z } from 'zod'

export const samplingSchema = z.object({
  temperature: z.number().min(0).max(2).optional(),
  topP: z.number().min(0).max(1).optional(),
  numCtx: z.number().int().positive().optional(),
  maxTokens: z.number().int().positive().optional(),
})

export const roleSchema = z.object({
  id: z.string().min(1),
  displayName: z.string().min(1),
  systemPrompt: z.string(),
  defaultModelId: z.string().min(1),
  usesMultiTurnChat: z.boolean(),
  clearsHistoryOnSend: z.boolean().default(false),
  revealThinking: z.boolean().default(false),
  shortcut: z.string().length(1).optional(),
  sampling: samplingSchema.default({}),
})

export const roleListSchema = z.array(roleSchema).min(1)

// role a session starts on when none is configured
export const DEFAULT_ROLE_ID = 'translate'

export const configSchema = z.object({
  baseUrl: z.string().url().default('http://localhost:11434'),
  backendKind: z.enum(['remote', 'local']).default('remote'),
  initialRoleId: z.string().min(1).default(DEFAULT_ROLE_ID),
  requestTimeoutMs: z.coerce.number().int().positive().default(30_000),
  maxContextTokens: z.coerce.number().int().positive().optional(),
  thinkingMarker: z.string().min(1).default('💭'),
})

export const modelIdSchema = z.string().trim().min(1)

export const messageInputSchema = z.object({
  content: z.string().trim().min(1),
})

// Streaming records. Ollama reports failures mid-stream as `{ error }`.
export const generateRecordSchema = z.object({
  response: z.string().optional(),
  done: z.boolean().default(false),
  error: z.string().optional(),
})

export const chatRecordSchema = z.object({
  message: z.object({ content: z.string().default('') }).optional(),
  done: z.boolean().default(false),
  error: z.string().optional(),
})

export const tagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() })),
})

export type RoleInput = z.input<typeof roleSchema>
export type EngineConfig = z.infer<typeof configSchema>
export type GenerateRecord = z.infer<typeof generateRecordSchema>
export type ChatRecord = z.infer<typeof chatRecordSchema>
export type MessageInput = z.infer<typeof messageInputSchema>
