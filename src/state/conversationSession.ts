import { nanoid } from 'nanoid'
import type { Attachment, Author, Role, SessionState, Turn } from '../types'
import type { BackendClient } from '../lib/backend'
import { checkAttachmentLimits, imagePayloads } from '../lib/attachments'
import { buildChatMessages } from '../lib/contextBuilder'
import { errorMessage, isAbortError } from '../lib/errors'
import { reconcileModel, supportsImages } from '../lib/models'
import { createDefaultRoleCatalog, type RoleCatalog } from '../lib/roles'
import { DEFAULT_ROLE_ID, messageInputSchema, modelIdSchema } from '../lib/schemas'
import { TokenStreamFilter } from '../lib/thinkFilter'
import { SessionStore, initialSessionState, type SessionListener } from './sessionStore'

export type Logger = Pick<Console, 'info' | 'warn' | 'error'>

export interface ConversationSessionOptions {
  backend: BackendClient
  roles?: RoleCatalog
  initialRoleId?: string
  maxContextTokens?: number
  thinkingMarker?: string
  logger?: Logger
}

interface PendingRequest {
  readonly controller: AbortController
  readonly assistantId: string
}

const createTurn = (author: Author, text: string, attachments: readonly Attachment[] = []): Turn => ({
  id: nanoid(),
  author,
  text,
  attachments,
  createdAt: Date.now(),
})

/**
 * Turns user messages into backend requests for the active role and streams
 * the reply into the transcript. At most one request is in flight: a new send,
 * a role switch or `cancelCurrent()` aborts the previous one.
 *
 * Backend failures never reject `send`; they land in `lastError`.
 */
export class ConversationSession {
  private readonly backend: BackendClient
  private readonly roles: RoleCatalog
  private readonly store: SessionStore
  private readonly maxContextTokens?: number
  private readonly thinkingMarker?: string
  private readonly logger: Logger
  private filter: TokenStreamFilter
  private pending?: PendingRequest

  constructor(opts: ConversationSessionOptions) {
    this.backend = opts.backend
    this.roles = opts.roles ?? createDefaultRoleCatalog()
    this.maxContextTokens = opts.maxContextTokens
    this.thinkingMarker = opts.thinkingMarker
    this.logger = opts.logger ?? console
    const role = opts.initialRoleId
      ? this.roles.roleById(opts.initialRoleId)
      : this.roles.hasRole(DEFAULT_ROLE_ID)
        ? this.roles.roleById(DEFAULT_ROLE_ID)
        : this.roles.listRoles()[0]
    this.store = new SessionStore(initialSessionState(role.id, role.defaultModelId))
    this.filter = this.filterFor(role)
  }

  get activeRole(): Role {
    return this.roles.roleById(this.store.getState().roleId)
  }

  get isStreaming(): boolean {
    return this.store.getState().isStreaming
  }

  get roleCatalog(): RoleCatalog {
    return this.roles
  }

  getState(): Readonly<SessionState> {
    return this.store.getState()
  }

  subscribe(listener: SessionListener): () => void {
    return this.store.subscribe(listener)
  }

  async send(text: string, attachments?: readonly Attachment[]): Promise<void> {
    if (!messageInputSchema.safeParse({ content: text }).success) return

    const role = this.activeRole
    const files = [...(attachments ?? this.store.getState().pendingAttachments)]
    try {
      checkAttachmentLimits(files)
    } catch (err) {
      this.store.dispatch({ type: 'setError', message: errorMessage(err) })
      return
    }

    if (role.clearsHistoryOnSend) this.store.dispatch({ type: 'clearTranscript' })
    this.cancelCurrent()

    const history = this.store.getState().turns
    const model = this.store.getState().modelId
    const userTurn = createTurn('user', text, files)
    const assistantTurn = createTurn('assistant', '')
    this.store.dispatch({ type: 'addTurn', turn: userTurn })
    if (attachments === undefined) this.store.dispatch({ type: 'clearAttachments' })
    this.store.dispatch({ type: 'addTurn', turn: assistantTurn })
    this.store.dispatch({ type: 'setError', message: undefined })
    this.store.dispatch({ type: 'setStreaming', value: true })
    this.filter.reset()

    const controller = new AbortController()
    const request: PendingRequest = { controller, assistantId: assistantTurn.id }
    this.pending = request

    const images = imagePayloads(files)
    if (images.length > 0 && !supportsImages(model)) {
      this.logger.warn(`Model ${model} may not accept images; sending ${images.length} anyway`)
    }

    const stream = role.usesMultiTurnChat
      ? this.backend.chat({
          model,
          messages: buildChatMessages({ role, history, userText: text, attachments: files, maxContextTokens: this.maxContextTokens }),
          sampling: role.sampling,
          signal: controller.signal,
        })
      : this.backend.generate({
          model,
          prompt: text,
          system: role.systemPrompt || undefined,
          images,
          sampling: role.sampling,
          signal: controller.signal,
        })

    try {
      for await (const fragment of stream) {
        if (controller.signal.aborted) break
        this.append(request, this.filter.push(fragment))
      }
      if (controller.signal.aborted) {
        this.logger.info(`Request for ${model} was cancelled`)
      } else {
        this.append(request, this.filter.flush())
      }
    } catch (err) {
      if (controller.signal.aborted || isAbortError(err)) {
        this.logger.info(`Request for ${model} was cancelled`)
      } else {
        this.fail(request, err)
      }
    } finally {
      if (this.pending === request) {
        this.pending = undefined
        this.store.dispatch({ type: 'setStreaming', value: false })
      }
    }
  }

  cancelCurrent(): void {
    const request = this.pending
    if (!request) return
    this.pending = undefined
    request.controller.abort()
    this.store.dispatch({ type: 'setStreaming', value: false })
  }

  clear(): void {
    this.store.dispatch({ type: 'clearTranscript' })
    this.backend.reset?.()
  }

  setRole(roleId: string): void {
    const role = this.roles.roleById(roleId)
    if (role.id === this.store.getState().roleId) return
    this.cancelCurrent()
    this.filter = this.filterFor(role)
    this.store.dispatch({ type: 'selectRole', roleId: role.id, modelId: role.defaultModelId })
    this.backend.reset?.()
  }

  setModel(modelId: string): void {
    const id = modelIdSchema.parse(modelId)
    if (id === this.store.getState().modelId) return
    this.store.dispatch({ type: 'setModel', modelId: id })
    this.backend.reset?.()
  }

  attach(...attachments: Attachment[]): void {
    checkAttachmentLimits([...this.store.getState().pendingAttachments, ...attachments])
    this.store.dispatch({ type: 'attach', attachments })
  }

  detach(id: string): void {
    this.store.dispatch({ type: 'detach', id })
  }

  acknowledgeError(): void {
    this.store.dispatch({ type: 'setError', message: undefined })
  }

  async refreshModels(): Promise<void> {
    try {
      const models = await this.backend.listModels()
      this.store.dispatch({ type: 'setAvailableModels', models })
      const { modelId } = this.store.getState()
      const next = reconcileModel(modelId, this.activeRole, models)
      if (next !== modelId) this.setModel(next)
    } catch (err) {
      this.logger.error('Failed to load models', err)
      this.store.dispatch({ type: 'setError', message: `Failed to load models: ${errorMessage(err)}` })
    }
  }

  private filterFor(role: Role): TokenStreamFilter {
    return new TokenStreamFilter({ revealThinking: role.revealThinking, marker: this.thinkingMarker })
  }

  private append(request: PendingRequest, text: string): void {
    if (text) this.store.dispatch({ type: 'appendText', id: request.assistantId, text })
  }

  private fail(request: PendingRequest, err: unknown): void {
    this.logger.error('Failed to send message', err)
    this.store.dispatch({ type: 'setError', message: `Failed to send message: ${errorMessage(err)}` })
    const placeholder = this.store.getState().turns.find(t => t.id === request.assistantId)
    if (placeholder && placeholder.text === '') this.store.dispatch({ type: 'removeTurn', id: request.assistantId })
  }
}
