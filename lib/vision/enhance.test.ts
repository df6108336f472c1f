import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

const pipeline = vi.hoisted(() => ({
  median: vi.fn(),
  normalize: vi.fn(),
  sharpen: vi.fn(),
  jpeg: vi.fn(),
  toBuffer: vi.fn(),
  metadata: vi.fn(),
}))
const sharpMock = vi.hoisted(() => vi.fn())

vi.mock('sharp', () => ({ default: sharpMock }))

import { enhanceImage, readImageDimensions } from './enhance'

const BYTES = Buffer.from('fake-image')

describe('image enhancement', () => {
  beforeEach(() => {
    pipeline.median.mockReturnValue(pipeline)
    pipeline.normalize.mockReturnValue(pipeline)
    pipeline.sharpen.mockReturnValue(pipeline)
    pipeline.jpeg.mockReturnValue(pipeline)
    pipeline.toBuffer.mockResolvedValue(Buffer.from('enhanced'))
    sharpMock.mockReturnValue(pipeline)
  })

  afterEach(() => {
    vi.clearAllMocks()
    vi.restoreAllMocks()
  })

  it('denoises, normalizes and sharpens into a JPEG', async () => {
    const result = await enhanceImage(BYTES)

    expect(result.toString()).toBe('enhanced')
    expect(sharpMock).toHaveBeenCalledWith(BYTES, { failOnError: false })
    expect(pipeline.median).toHaveBeenCalledWith(3)
    expect(pipeline.normalize).toHaveBeenCalledTimes(1)
    expect(pipeline.sharpen).toHaveBeenCalledTimes(1)
    expect(pipeline.jpeg).toHaveBeenCalledWith({ quality: 92 })
  })

  it('propagates decoder failures', async () => {
    pipeline.toBuffer.mockRejectedValue(new Error('Input buffer contains unsupported image format'))

    await expect(enhanceImage(BYTES)).rejects.toThrow('unsupported image format')
  })

  it('reads the image dimensions', async () => {
    pipeline.metadata.mockResolvedValue({ width: 640, height: 480 })

    await expect(readImageDimensions(BYTES)).resolves.toEqual({ width: 640, height: 480 })
  })

  it('returns null when the dimensions cannot be read', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined)
    pipeline.metadata.mockRejectedValue(new Error('corrupt header'))

    await expect(readImageDimensions(BYTES)).resolves.toBeNull()
    expect(warn).toHaveBeenCalledWith('[vision] unable to read image dimensions', { message: 'corrupt header' })
  })

  it('returns null when the metadata has no size', async () => {
    pipeline.metadata.mockResolvedValue({ format: 'png' })

    await expect(readImageDimensions(BYTES)).resolves.toBeNull()
  })
})
