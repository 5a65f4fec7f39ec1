import { ChatEngineError } from './lib/errors'
import type { BackendClient } from './lib/backend'
import { loadConfig } from './lib/config'
import { LocalInferenceBackend, type InferenceEngineLoader } from './lib/localInference'
import { RemoteChatBackend, type FetchLike } from './lib/ollamaClient'
import { createDefaultRoleCatalog, type RoleCatalog } from './lib/roles'
import type { EngineConfig } from './lib/schemas'
import { ConversationSession, type Logger } from './state/conversationSession'

export * from './types'
export * from './lib/errors'
export type { BackendCapabilities, BackendClient, BackendKind, ChatRequest, GenerateRequest } from './lib/backend'
export { loadConfig, defaultConfig } from './lib/config'
export { RoleCatalog, createDefaultRoleCatalog } from './lib/roles'
export { TokenStreamFilter, DEFAULT_THINKING_MARKER, type ThinkState, type TokenStreamFilterOptions } from './lib/thinkFilter'
export { RemoteChatBackend, type FetchLike, type HttpRequestInit, type HttpResponse, type RemoteChatBackendConfig } from './lib/ollamaClient'
export { LocalInferenceBackend, type InferenceChat, type InferenceEngine, type InferenceEngineLoader } from './lib/localInference'
export { buildChatMessages } from './lib/contextBuilder'
export { createAttachment, MAX_ATTACHMENTS, MAX_TOTAL_BYTES } from './lib/attachments'
export { reconcileModel, supportsImages } from './lib/models'
export type { EngineConfig, RoleInput } from './lib/schemas'
export { ConversationSession, type ConversationSessionOptions, type Logger } from './state/conversationSession'
export type { SessionAction, SessionListener } from './state/sessionStore'

export interface CreateSessionOverrides {
  backend?: BackendClient
  // required when the configured backend is `local`
  engineLoader?: InferenceEngineLoader
  fetch?: FetchLike
  roles?: RoleCatalog
  logger?: Logger
}

export const createBackend = (config: EngineConfig, overrides: CreateSessionOverrides = {}): BackendClient => {
  if (overrides.backend) return overrides.backend
  if (config.backendKind === 'local') {
    if (!overrides.engineLoader) throw new ChatEngineError('A local backend needs an inference engine loader')
    return new LocalInferenceBackend(overrides.engineLoader)
  }
  return new RemoteChatBackend({ baseUrl: config.baseUrl, requestTimeoutMs: config.requestTimeoutMs, fetch: overrides.fetch })
}

/**
 * Builds a session from configuration (environment variables by default).
 * The role catalog defaults to the built-in roles.
 */
export const createConversationSession = (
  config: EngineConfig = loadConfig(),
  overrides: CreateSessionOverrides = {},
): ConversationSession =>
  new ConversationSession({
    backend: createBackend(config, overrides),
    roles: overrides.roles ?? createDefaultRoleCatalog(),
    initialRoleId: config.initialRoleId,
    maxContextTokens: config.maxContextTokens,
    thinkingMarker: config.thinkingMarker,
    logger: overrides.logger,
  })
