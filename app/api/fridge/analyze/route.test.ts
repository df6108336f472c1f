import { beforeEach, describe, expect, it, vi } from 'vitest'
import { ConfigError, InputError, ServiceError } from '@/lib/errors'

const analyzeFridgeImageMock = vi.hoisted(() => vi.fn())
const getFridgeServicesMock = vi.hoisted(() => vi.fn())

vi.mock('@/lib/fridge/analyze', () => ({
  analyzeFridgeImage: analyzeFridgeImageMock,
}))

vi.mock('@/lib/fridge/runtime', () => ({
  getFridgeServices: getFridgeServicesMock,
}))

const SERVICES = { config: { maxRecipes: 10 } }

function makeUploadRequest(fields: Record<string, string> = {}, image?: File) {
  const formData = new FormData()
  if (image) formData.set('image', image)
  for (const [key, value] of Object.entries(fields)) {
    formData.set(key, value)
  }
  return new Request('http://localhost/api/fridge/analyze', { method: 'POST', body: formData })
}

function fridgePhoto() {
  return new File([new Uint8Array([1, 2, 3])], 'fridge.jpg', { type: 'image/jpeg' })
}

describe('POST /api/fridge/analyze', () => {
  beforeEach(() => {
    vi.resetAllMocks()
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)
    vi.spyOn(console, 'error').mockImplementation(() => undefined)
    getFridgeServicesMock.mockReturnValue(SERVICES)
  })

  it('analyzes the uploaded image with the submitted preferences', async () => {
    const analysis = {
      ingredients: [{ name: 'egg', confidence: 0.9, occurrenceCount: 2 }],
      recipes: [],
      recipeSource: 'fallback',
      summary: { itemsDetected: 1, recipesFound: 0, averageConfidence: 0.9 },
    }
    analyzeFridgeImageMock.mockResolvedValue(analysis)

    const { POST } = await import('./route')
    const response = await POST(
      makeUploadRequest({ cuisine: 'Mexican', diet: '', maxReadyMinutes: '30', count: '5' }, fridgePhoto()),
    )

    expect(response.status).toBe(200)
    await expect(response.json()).resolves.toEqual(analysis)
    expect(analyzeFridgeImageMock).toHaveBeenCalledWith(
      { bytes: new Uint8Array([1, 2, 3]), mimeType: 'image/jpeg' },
      { cuisine: 'Mexican', diet: undefined, maxReadyMinutes: 30, count: 5 },
      SERVICES,
    )
  })

  it('returns 415 for non-multipart requests', async () => {
    const { POST } = await import('./route')
    const response = await POST(
      new Request('http://localhost/api/fridge/analyze', {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify({}),
      }),
    )

    expect(response.status).toBe(415)
    await expect(response.json()).resolves.toEqual({
      error: 'Upload the image as multipart/form-data.',
      code: 'unsupported_media_type',
    })
  })

  it('returns 400 when no image is attached', async () => {
    const { POST } = await import('./route')
    const response = await POST(makeUploadRequest({ cuisine: 'thai' }))

    expect(response.status).toBe(400)
    await expect(response.json()).resolves.toEqual({ error: 'An image file is required.', code: 'missing_image' })
    expect(analyzeFridgeImageMock).not.toHaveBeenCalled()
  })

  it('returns 400 for invalid preferences', async () => {
    const { POST } = await import('./route')
    const response = await POST(makeUploadRequest({ count: 'lots' }, fridgePhoto()))

    expect(response.status).toBe(400)
    await expect(response.json()).resolves.toMatchObject({ code: 'invalid_payload' })
  })

  it('returns 400 with the input error code for rejected images', async () => {
    analyzeFridgeImageMock.mockRejectedValue(new InputError('Image exceeds the 3 byte upload limit.', 'image_too_large'))

    const { POST } = await import('./route')
    const response = await POST(makeUploadRequest({}, fridgePhoto()))

    expect(response.status).toBe(400)
    await expect(response.json()).resolves.toEqual({
      error: 'Image exceeds the 3 byte upload limit.',
      code: 'image_too_large',
    })
  })

  it('returns 429 with Retry-After when the vision quota is exhausted', async () => {
    analyzeFridgeImageMock.mockRejectedValue(
      new ServiceError('Vision service quota exceeded.', 'vision', 'quota_exceeded', {
        status: 429,
        retryAfterSeconds: 30,
      }),
    )

    const { POST } = await import('./route')
    const response = await POST(makeUploadRequest({}, fridgePhoto()))

    expect(response.status).toBe(429)
    expect(response.headers.get('Retry-After')).toBe('30')
    await expect(response.json()).resolves.toEqual({
      error: 'Vision service quota exceeded.',
      code: 'quota_exceeded',
      service: 'vision',
      retryAfterSeconds: 30,
    })
  })

  it('returns 504 when the vision service times out', async () => {
    analyzeFridgeImageMock.mockRejectedValue(new ServiceError('Vision request timed out.', 'vision', 'timeout'))

    const { POST } = await import('./route')
    const response = await POST(makeUploadRequest({}, fridgePhoto()))

    expect(response.status).toBe(504)
    expect(response.headers.get('Retry-After')).toBeNull()
  })

  it('returns 500 config_error when the service is misconfigured', async () => {
    getFridgeServicesMock.mockImplementation(() => {
      throw new ConfigError('Invalid fridge configuration: FRIDGE_CONFIDENCE_THRESHOLD: is required', [
        'FRIDGE_CONFIDENCE_THRESHOLD: is required',
      ])
    })

    const { POST } = await import('./route')
    const response = await POST(makeUploadRequest({}, fridgePhoto()))

    expect(response.status).toBe(500)
    await expect(response.json()).resolves.toEqual({ error: 'Service is not configured.', code: 'config_error' })
  })
})
