import type { Attachment, ChatMessage, Role, Turn } from '../types'
import { imagePayloads } from './attachments'

const approxTokenCount = (text: string): number => {
  // crude approximation: 1 token ~ 4 chars
  return Math.ceil(text.length / 4)
}

export const countMessagesTokens = (msgs: ChatMessage[]): number => msgs.reduce((acc, m) => acc + approxTokenCount(m.content), 0)

const toChatMessage = (turn: Pick<Turn, 'author' | 'text' | 'attachments'>): ChatMessage => {
  const msg: ChatMessage = { role: turn.author, content: turn.text }
  if (turn.author === 'user') {
    const images = imagePayloads(turn.attachments)
    if (images.length > 0) msg.images = images
  }
  return msg
}

export interface BuildChatMessagesParams {
  role: Role
  history: readonly Turn[]
  userText: string
  attachments?: readonly Attachment[]
  maxContextTokens?: number
}

/**
 * Messages for a multi-turn chat request: system prompt, prior turns, then the
 * new user turn. Assistant turns that never received text are skipped. With
 * `maxContextTokens`, the oldest history goes first; the system prompt and the
 * new user turn always stay.
 */
export const buildChatMessages = (params: BuildChatMessagesParams): ChatMessage[] => {
  const { role, history, userText, attachments = [], maxContextTokens } = params
  const system: ChatMessage[] = role.systemPrompt ? [{ role: 'system', content: role.systemPrompt }] : []
  const prior = history.filter(t => t.author === 'user' || t.text.length > 0).map(toChatMessage)
  const current = toChatMessage({ author: 'user', text: userText, attachments })

  if (typeof maxContextTokens === 'number') {
    while (prior.length > 0 && countMessagesTokens([...system, ...prior, current]) > maxContextTokens) {
      prior.shift()
    }
  }
  return [...system, ...prior, current]
}
