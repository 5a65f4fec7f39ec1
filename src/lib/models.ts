import type { Role } from '../types'

// Ollama tags default to `latest`, so `llama3` and `llama3:latest` name the same model.
export const normalizeModelId = (id: string): string => {
  const trimmed = id.trim()
  return trimmed.includes(':') ? trimmed : `${trimmed}:latest`
}

export const isModelAvailable = (id: string, available: readonly string[]): boolean => {
  const wanted = normalizeModelId(id)
  return available.some(m => normalizeModelId(m) === wanted)
}

/**
 * Picks the model to keep selected after the server's model list changes:
 * the current one if still listed, else the role default, else the first
 * listed model. An empty list keeps the current selection.
 */
export const reconcileModel = (current: string, role: Role, available: readonly string[]): string => {
  if (available.length === 0) return current
  if (isModelAvailable(current, available)) return current
  if (isModelAvailable(role.defaultModelId, available)) return role.defaultModelId
  return available[0]
}

// Vision-capable families the local server ships; images sent to others are ignored by the model.
const VISION_FAMILIES = ['gemma3', 'llava', 'llama3.2-vision', 'qwen2.5vl', 'minicpm-v', 'moondream']

export const supportsImages = (model: string): boolean => {
  const family = model.trim().toLowerCase().split(':')[0]
  return VISION_FAMILIES.includes(family)
}
