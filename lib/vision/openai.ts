import OpenAI from 'openai'
import { z } from 'zod'
import type { Detection } from '@/lib/detection/types'
import { ServiceError, parseRetryAfterSeconds } from '@/lib/errors'
import { isValidBox, type BoundingBox } from '@/lib/geometry/bbox'
import { toDataUrl } from './image'
import type { DetectOptions, VisionClient, VisionImage } from './types'

const DEFAULT_MODEL = 'gpt-4.1-mini'
const DEFAULT_TIMEOUT_MS = 30_000

/** The slice of the OpenAI SDK the adapter calls. */
export type ChatCompletionsApi = {
  chat: {
    completions: {
      create(
        body: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal; timeout?: number },
      ): Promise<{ choices: Array<{ message: { content: string | null } }> }>
    }
  }
}

export type OpenAIVisionClientOptions = {
  model?: string
  timeoutMs?: number
}

const detectionEntrySchema = z.object({
  label: z.string().trim().min(1),
  confidence: z.coerce.number().min(0).max(1),
  box: z.array(z.coerce.number()).length(4),
})

const detectionResponseSchema = z.object({
  detections: z.array(z.unknown()),
})

function buildSystemPrompt() {
  return [
    'You detect food items in photos of the inside of a refrigerator.',
    'Return valid JSON only, with no markdown or surrounding text.',
    'Schema requirements:',
    '{',
    '  "detections": [{ "label": string, "confidence": number, "box": [x1, y1, x2, y2] }]',
    '}',
    'Use short, generic, lowercase English labels such as "apple", "milk" or "bell pepper".',
    'Report one detection per visible item, including repeated items.',
    'Label packaging by what it holds when you can tell, otherwise by the container ("bottle", "jar").',
    'Boxes are absolute pixel coordinates, top-left (x1, y1) to bottom-right (x2, y2).',
    'Confidence is between 0 and 1.',
  ].join('\n')
}

function buildUserPrompt(image: VisionImage, options: DetectOptions): string {
  return [
    image.width && image.height ? `Image size: ${image.width}x${image.height} pixels.` : '',
    `Only report detections with confidence of at least ${options.confidenceThreshold}.`,
  ]
    .filter(Boolean)
    .join('\n')
}

function clampBox(box: BoundingBox, image: VisionImage): BoundingBox {
  const { width, height } = image
  if (!width || !height) return box
  const clamp = (value: number, max: number) => Math.min(Math.max(value, 0), max)
  return { x1: clamp(box.x1, width), y1: clamp(box.y1, height), x2: clamp(box.x2, width), y2: clamp(box.y2, height) }
}

export function parseDetectionContent(
  content: string | null | undefined,
  image: VisionImage,
  options: DetectOptions,
): Detection[] {
  if (!content) {
    throw new ServiceError('Vision model did not return a response payload.', 'vision', 'invalid_response')
  }

  let parsedJson: unknown
  try {
    parsedJson = JSON.parse(content)
  } catch (error) {
    throw new ServiceError('Vision model response was not valid JSON.', 'vision', 'invalid_response', { cause: error })
  }

  const parsed = detectionResponseSchema.safeParse(parsedJson)
  if (!parsed.success) {
    throw new ServiceError('Vision model output did not match the detection schema.', 'vision', 'invalid_response', {
      cause: parsed.error,
    })
  }

  const detections: Detection[] = []
  for (const entry of parsed.data.detections) {
    const item = detectionEntrySchema.safeParse(entry)
    if (!item.success) continue

    const [x1 = NaN, y1 = NaN, x2 = NaN, y2 = NaN] = item.data.box
    const bbox = clampBox({ x1, y1, x2, y2 }, image)
    if (!isValidBox(bbox)) continue

    detections.push({
      label: item.data.label,
      confidence: item.data.confidence,
      bbox,
      sourcePass: options.sourcePass,
    })
  }

  return detections
}

export function toVisionServiceError(error: unknown): ServiceError {
  if (error instanceof ServiceError) return error

  if (error instanceof OpenAI.APIConnectionTimeoutError || error instanceof OpenAI.APIUserAbortError) {
    return new ServiceError('Vision request timed out.', 'vision', 'timeout', { cause: error })
  }

  if (error instanceof OpenAI.APIError) {
    const status = error.status
    if (status === 429 || status === 402) {
      return new ServiceError('Vision service quota exceeded.', 'vision', 'quota_exceeded', {
        status,
        retryAfterSeconds: parseRetryAfterSeconds(error.headers?.['retry-after']),
        cause: error,
      })
    }
    if (status === 400 || status === 413 || status === 415) {
      return new ServiceError('Vision service rejected the image.', 'vision', 'invalid_image', { status, cause: error })
    }
    if (status === undefined || status >= 500) {
      return new ServiceError('Vision service is unavailable.', 'vision', 'unavailable', { status, cause: error })
    }
    return new ServiceError(`Vision request failed with status ${status}.`, 'vision', 'unknown', {
      status,
      cause: error,
    })
  }

  return new ServiceError('Vision request failed.', 'vision', 'unknown', { cause: error })
}

export class OpenAIVisionClient implements VisionClient {
  private readonly api: ChatCompletionsApi
  private readonly model: string
  private readonly timeoutMs: number

  constructor(api: ChatCompletionsApi, options: OpenAIVisionClientOptions = {}) {
    this.api = api
    this.model = options.model ?? DEFAULT_MODEL
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
  }

  async detect(image: VisionImage, options: DetectOptions): Promise<Detection[]> {
    const userContent: OpenAI.Chat.Completions.ChatCompletionContentPart[] = [
      { type: 'text', text: buildUserPrompt(image, options) },
      { type: 'image_url', image_url: { url: toDataUrl(image), detail: 'high' } },
    ]

    let content: string | null | undefined
    try {
      const completion = await this.api.chat.completions.create(
        {
          model: this.model,
          temperature: 0,
          response_format: { type: 'json_object' },
          messages: [
            { role: 'system', content: buildSystemPrompt() },
            { role: 'user', content: userContent },
          ],
        },
        { signal: options.signal, timeout: this.timeoutMs },
      )
      content = completion.choices[0]?.message.content
    } catch (error) {
      throw toVisionServiceError(error)
    }

    return parseDetectionContent(content, image, options)
  }
}

export function createOpenAIVisionClient(apiKey: string, options: OpenAIVisionClientOptions = {}): OpenAIVisionClient {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
  return new OpenAIVisionClient(new OpenAI({ apiKey, timeout: timeoutMs, maxRetries: 0 }), { ...options, timeoutMs })
}
