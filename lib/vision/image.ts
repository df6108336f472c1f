import { InputError } from '@/lib/errors'
import type { VisionImage } from './types'

export const SUPPORTED_IMAGE_TYPES = ['image/png', 'image/jpeg', 'image/webp'] as const

export type SupportedImageType = (typeof SUPPORTED_IMAGE_TYPES)[number]

const MIME_ALIASES: Record<string, SupportedImageType> = {
  'image/jpg': 'image/jpeg',
  'image/pjpeg': 'image/jpeg',
}

function normalizeMimeType(mimeType: string): string {
  const base = mimeType.split(';')[0]?.trim().toLowerCase() ?? ''
  return MIME_ALIASES[base] ?? base
}

function isSupportedImageType(mimeType: string): mimeType is SupportedImageType {
  return SUPPORTED_IMAGE_TYPES.some((type) => type === mimeType)
}

export function validateImage(image: { bytes: Uint8Array; mimeType: string }, maxBytes: number): VisionImage {
  if (image.bytes.byteLength === 0) {
    throw new InputError('The uploaded image is empty.', 'empty_image')
  }

  const mimeType = normalizeMimeType(image.mimeType)
  if (!isSupportedImageType(mimeType)) {
    throw new InputError(
      `Unsupported image type "${image.mimeType || 'unknown'}". Use PNG, JPEG or WebP.`,
      'invalid_image_type',
    )
  }

  if (image.bytes.byteLength > maxBytes) {
    throw new InputError(`Image exceeds the ${maxBytes} byte upload limit.`, 'image_too_large')
  }

  return { bytes: image.bytes, mimeType }
}

export function toDataUrl(image: Pick<VisionImage, 'bytes' | 'mimeType'>): string {
  return `data:${image.mimeType};base64,${Buffer.from(image.bytes).toString('base64')}`
}
