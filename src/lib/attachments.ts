import { nanoid } from 'nanoid'
import type { Attachment, AttachmentKind } from '../types'

export const MAX_ATTACHMENTS = 5
export const MAX_TOTAL_BYTES = 50 * 1024 * 1024 // 50MB

const IMAGE_EXTENSIONS: Record<string, string> = {
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  gif: 'image/gif',
  webp: 'image/webp',
  bmp: 'image/bmp',
}

const extensionOf = (name: string): string => {
  const dot = name.lastIndexOf('.')
  return dot >= 0 ? name.slice(dot + 1).toLowerCase() : ''
}

export const guessMime = (name: string): string => IMAGE_EXTENSIONS[extensionOf(name)] ?? 'application/octet-stream'

export const sniffKind = (mime: string, name: string): AttachmentKind => {
  if (mime.startsWith('image/')) return 'image'
  if (extensionOf(name) in IMAGE_EXTENSIONS) return 'image'
  return 'other'
}

export const createAttachment = (name: string, data: Uint8Array, mime?: string): Attachment => {
  const type = mime || guessMime(name)
  return { id: nanoid(), name, mime: type, kind: sniffKind(type, name), data }
}

export const toBase64 = (data: Uint8Array): string => Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString('base64')

// Only images travel to the model; other kinds stay on the turn for display.
export const imagePayloads = (attachments: readonly Attachment[]): string[] =>
  attachments.filter(a => a.kind === 'image').map(a => toBase64(a.data))

export const checkAttachmentLimits = (attachments: readonly Attachment[]): void => {
  if (attachments.length > MAX_ATTACHMENTS) {
    throw new RangeError(`At most ${MAX_ATTACHMENTS} attachments per message`)
  }
  const total = attachments.reduce((acc, a) => acc + a.data.byteLength, 0)
  if (total > MAX_TOTAL_BYTES) {
    throw new RangeError(`Attachments exceed ${MAX_TOTAL_BYTES} bytes in total`)
  }
}
