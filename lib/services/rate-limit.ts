import { sleep as defaultSleep, type Sleep } from './retry'

export type RateLimiterState = 'open' | 'cooling_down'

export type ServiceRateLimiterOptions = {
  name: string
  minIntervalMs: number
  defaultCooldownMs: number
  now?: () => number
  sleep?: Sleep
}

/**
 * Spacing and cooldown state for one external service. Instances are meant to
 * be shared process-wide by whoever constructs them; every mutation of the
 * spacing timestamp goes through the `acquire` queue.
 */
export class ServiceRateLimiter {
  readonly name: string
  private readonly minIntervalMs: number
  private readonly defaultCooldownMs: number
  private readonly now: () => number
  private readonly sleep: Sleep
  private lastGrantedAt: number | null = null
  private cooldownUntil: number | null = null
  private failures = 0
  private queue: Promise<unknown> = Promise.resolve()

  constructor(options: ServiceRateLimiterOptions) {
    this.name = options.name
    this.minIntervalMs = Math.max(0, options.minIntervalMs)
    this.defaultCooldownMs = Math.max(0, options.defaultCooldownMs)
    this.now = options.now ?? Date.now
    this.sleep = options.sleep ?? defaultSleep
  }

  getState(): RateLimiterState {
    if (this.cooldownUntil === null) return 'open'
    if (this.now() < this.cooldownUntil) return 'cooling_down'

    this.cooldownUntil = null
    return 'open'
  }

  allowRequest(): boolean {
    return this.getState() === 'open'
  }

  cooldownRemainingMs(): number {
    if (this.getState() === 'open' || this.cooldownUntil === null) return 0
    return this.cooldownUntil - this.now()
  }

  /**
   * Waits for the next request slot. Resolves false without waiting while the
   * service is cooling down; callers are queued in arrival order otherwise.
   */
  acquire(): Promise<boolean> {
    const slot = this.queue.then(() => this.reserveSlot())
    this.queue = slot.catch(() => undefined)
    return slot
  }

  get consecutiveFailures(): number {
    return this.failures
  }

  recordSuccess(): void {
    this.failures = 0
  }

  recordFailure(isQuotaError: boolean, retryAfterSeconds?: number): void {
    this.failures += 1
    if (!isQuotaError) return

    const cooldownMs =
      retryAfterSeconds !== undefined && Number.isFinite(retryAfterSeconds) && retryAfterSeconds > 0
        ? retryAfterSeconds * 1000
        : this.defaultCooldownMs
    this.startCooldown(cooldownMs, 'quota exhausted')
  }

  /** Call once a transient failure has survived every retry attempt. */
  recordPersistentFailure(): void {
    this.startCooldown(this.defaultCooldownMs, 'retries exhausted')
  }

  private startCooldown(cooldownMs: number, reason: string): void {
    const until = this.now() + cooldownMs
    this.cooldownUntil = Math.max(this.cooldownUntil ?? 0, until)

    console.warn(`[rate-limit:${this.name}] ${reason}, cooling down`, {
      cooldownMs,
      consecutiveFailures: this.failures,
      cooldownUntil: new Date(this.cooldownUntil).toISOString(),
    })
  }

  private async reserveSlot(): Promise<boolean> {
    if (!this.allowRequest()) return false

    if (this.lastGrantedAt !== null) {
      const waitMs = this.lastGrantedAt + this.minIntervalMs - this.now()
      if (waitMs > 0) {
        await this.sleep(waitMs)
        if (!this.allowRequest()) return false
      }
    }

    this.lastGrantedAt = this.now()
    return true
  }
}
