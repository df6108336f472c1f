export type ExternalService = 'vision' | 'recipes'

export type ServiceErrorKind =
  | 'timeout'
  | 'quota_exceeded'
  | 'invalid_image'
  | 'invalid_response'
  | 'unavailable'
  | 'unknown'

const TRANSIENT_KINDS: ReadonlySet<ServiceErrorKind> = new Set(['timeout', 'unavailable'])

export class InputError extends Error {
  code: string

  constructor(message: string, code = 'invalid_input') {
    super(message)
    this.name = 'InputError'
    this.code = code
  }
}

export class ConfigError extends Error {
  issues: string[]

  constructor(message: string, issues: string[] = []) {
    super(message)
    this.name = 'ConfigError'
    this.issues = issues
  }
}

export class ServiceError extends Error {
  service: ExternalService
  kind: ServiceErrorKind
  status?: number
  retryAfterSeconds?: number

  constructor(
    message: string,
    service: ExternalService,
    kind: ServiceErrorKind,
    options?: {
      status?: number
      retryAfterSeconds?: number
      cause?: unknown
    },
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause })
    this.name = 'ServiceError'
    this.service = service
    this.kind = kind
    this.status = options?.status
    this.retryAfterSeconds = options?.retryAfterSeconds
  }

  get transient(): boolean {
    return TRANSIENT_KINDS.has(this.kind)
  }

  get isQuotaError(): boolean {
    return this.kind === 'quota_exceeded'
  }
}

export function isTransientServiceError(error: unknown): boolean {
  return error instanceof ServiceError && error.transient
}

export function parseRetryAfterSeconds(value: string | null | undefined): number | undefined {
  if (!value) return undefined
  const trimmed = value.trim()
  if (!trimmed) return undefined

  const seconds = Number(trimmed)
  if (Number.isFinite(seconds)) {
    return seconds > 0 ? Math.ceil(seconds) : undefined
  }

  const dateMs = Date.parse(trimmed)
  if (Number.isNaN(dateMs)) return undefined
  const deltaSeconds = Math.ceil((dateMs - Date.now()) / 1000)
  return deltaSeconds > 0 ? deltaSeconds : undefined
}
