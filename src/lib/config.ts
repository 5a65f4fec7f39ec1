import { configSchema, type EngineConfig } from './schemas'

const ENV_KEYS = {
  baseUrl: 'CHAT_BACKEND_URL',
  backendKind: 'CHAT_BACKEND_KIND',
  initialRoleId: 'CHAT_INITIAL_ROLE',
  requestTimeoutMs: 'CHAT_REQUEST_TIMEOUT_MS',
  maxContextTokens: 'CHAT_MAX_CONTEXT_TOKENS',
  thinkingMarker: 'CHAT_THINKING_MARKER',
} as const satisfies Record<keyof EngineConfig, string>

const readEnv = (env: NodeJS.ProcessEnv, key: string): string | undefined => {
  const raw = env[key]?.trim()
  return raw ? raw : undefined
}

/**
 * Reads engine configuration from environment variables. Unset or blank
 * variables fall back to the schema defaults; anything else must validate.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): EngineConfig => {
  const raw: Record<string, string | undefined> = {}
  for (const [field, key] of Object.entries(ENV_KEYS)) raw[field] = readEnv(env, key)
  return configSchema.parse(raw)
}

export const defaultConfig = (): EngineConfig => configSchema.parse({})
