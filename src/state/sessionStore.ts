import type { Attachment, SessionState, Turn } from '../types'

export type SessionAction =
  | { type: 'addTurn'; turn: Turn }
  | { type: 'appendText'; id: string; text: string }
  | { type: 'removeTurn'; id: string }
  | { type: 'clearTranscript' }
  | { type: 'selectRole'; roleId: string; modelId: string }
  | { type: 'setModel'; modelId: string }
  | { type: 'setAvailableModels'; models: string[] }
  | { type: 'attach'; attachments: Attachment[] }
  | { type: 'detach'; id: string }
  | { type: 'clearAttachments' }
  | { type: 'setStreaming'; value: boolean }
  | { type: 'setError'; message?: string }

export type SessionListener = (state: Readonly<SessionState>, action: SessionAction) => void

export const initialSessionState = (roleId: string, modelId: string): SessionState => ({
  turns: [],
  roleId,
  modelId,
  availableModels: [],
  pendingAttachments: [],
  isStreaming: false,
})

export const reducer = (state: SessionState, action: SessionAction): SessionState => {
  switch (action.type) {
    case 'addTurn': {
      return { ...state, turns: [...state.turns, action.turn] }
    }
    case 'appendText': {
      // only the newest turn may grow; a stale id means its stream was superseded
      const last = state.turns[state.turns.length - 1]
      if (!last || last.id !== action.id || !action.text) return state
      return { ...state, turns: [...state.turns.slice(0, -1), { ...last, text: last.text + action.text }] }
    }
    case 'removeTurn': {
      const turns = state.turns.filter(t => t.id !== action.id)
      return turns.length === state.turns.length ? state : { ...state, turns }
    }
    case 'clearTranscript': {
      return { ...state, turns: [], pendingAttachments: [] }
    }
    case 'selectRole': {
      return { ...state, roleId: action.roleId, modelId: action.modelId, turns: [], pendingAttachments: [] }
    }
    case 'setModel': {
      return { ...state, modelId: action.modelId }
    }
    case 'setAvailableModels': {
      return { ...state, availableModels: [...action.models] }
    }
    case 'attach': {
      return { ...state, pendingAttachments: [...state.pendingAttachments, ...action.attachments] }
    }
    case 'detach': {
      return { ...state, pendingAttachments: state.pendingAttachments.filter(a => a.id !== action.id) }
    }
    case 'clearAttachments': {
      return state.pendingAttachments.length === 0 ? state : { ...state, pendingAttachments: [] }
    }
    case 'setStreaming': {
      return state.isStreaming === action.value ? state : { ...state, isStreaming: action.value }
    }
    case 'setError': {
      return state.lastError === action.message ? state : { ...state, lastError: action.message }
    }
    default:
      return state
  }
}

/**
 * Holds session state and notifies listeners after each action, so a UI can
 * render streamed text as it arrives.
 */
export class SessionStore {
  private state: SessionState
  private readonly listeners = new Set<SessionListener>()

  constructor(initial: SessionState) {
    this.state = initial
  }

  getState(): Readonly<SessionState> {
    return this.state
  }

  dispatch(action: SessionAction): void {
    const next = reducer(this.state, action)
    if (next === this.state) return
    this.state = next
    for (const listener of [...this.listeners]) listener(next, action)
  }

  subscribe(listener: SessionListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }
}
