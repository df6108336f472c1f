import type { Detection, SourcePass } from '@/lib/detection/types'

export type VisionImage = {
  bytes: Uint8Array
  mimeType: string
  width?: number
  height?: number
}

export type DetectOptions = {
  confidenceThreshold: number
  sourcePass: SourcePass
  signal?: AbortSignal
}

export interface VisionClient {
  detect(image: VisionImage, options: DetectOptions): Promise<Detection[]>
}
