import type { Detection } from '@/lib/detection/types'
import { ServiceError, isTransientServiceError } from '@/lib/errors'
import type { ServiceRateLimiter } from '@/lib/services/rate-limit'
import { withRetry, withTimeout, type RetryOptions } from '@/lib/services/retry'
import type { DetectOptions, VisionClient, VisionImage } from './types'

const DEFAULT_TIMEOUT_MS = 30_000

export type RateLimitedVisionClientOptions = {
  client: VisionClient
  limiter: ServiceRateLimiter
  timeoutMs?: number
  retry?: Pick<RetryOptions, 'maxAttempts' | 'baseDelayMs' | 'maxDelayMs' | 'sleep'>
}

/**
 * Puts a vision client behind the same limiter, retry and timeout discipline
 * as the recipe service. While the limiter cools down, calls fail fast with a
 * quota error instead of reaching the model.
 */
export class RateLimitedVisionClient implements VisionClient {
  private readonly client: VisionClient
  private readonly limiter: ServiceRateLimiter
  private readonly timeoutMs: number
  private readonly retry: RateLimitedVisionClientOptions['retry']

  constructor(options: RateLimitedVisionClientOptions) {
    this.client = options.client
    this.limiter = options.limiter
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.retry = options.retry
  }

  async detect(image: VisionImage, options: DetectOptions): Promise<Detection[]> {
    if (!this.limiter.allowRequest()) throw this.coolingDownError()

    try {
      return await withRetry(
        async () => {
          const granted = await this.limiter.acquire()
          if (!granted) throw this.coolingDownError()

          try {
            const detections = await withTimeout(
              (signal) => this.client.detect(image, { ...options, signal }),
              this.timeoutMs,
              () => new ServiceError('Vision request timed out.', 'vision', 'timeout'),
            )
            this.limiter.recordSuccess()
            return detections
          } catch (error) {
            const serviceError = error instanceof ServiceError ? error : null
            this.limiter.recordFailure(serviceError?.isQuotaError ?? false, serviceError?.retryAfterSeconds)
            throw error
          }
        },
        {
          ...this.retry,
          onRetry: (error, attempt, delayMs) => {
            console.warn('[vision] detection failed, retrying', {
              attempt,
              delayMs,
              sourcePass: options.sourcePass,
              kind: error instanceof ServiceError ? error.kind : null,
              message: error instanceof Error ? error.message : String(error),
            })
          },
        },
      )
    } catch (error) {
      if (isTransientServiceError(error)) this.limiter.recordPersistentFailure()
      throw error
    }
  }

  private coolingDownError(): ServiceError {
    const remainingMs = this.limiter.cooldownRemainingMs()
    return new ServiceError('Vision service is cooling down.', 'vision', 'quota_exceeded', {
      retryAfterSeconds: remainingMs > 0 ? Math.ceil(remainingMs / 1000) : undefined,
    })
  }
}
