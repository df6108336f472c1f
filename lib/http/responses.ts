import { NextResponse } from 'next/server'
import { ZodError } from 'zod'
import { ConfigError, InputError, ServiceError, type ServiceErrorKind } from '@/lib/errors'

export class HttpError extends Error {
  status: number
  code: string

  constructor(message: string, status: number, options?: { code?: string }) {
    super(message)
    this.name = 'HttpError'
    this.status = status
    this.code = options?.code ?? 'request_error'
  }
}

const SERVICE_ERROR_STATUS: Record<ServiceErrorKind, number> = {
  quota_exceeded: 429,
  timeout: 504,
  invalid_image: 422,
  unavailable: 503,
  invalid_response: 502,
  unknown: 502,
}

/**
 * Maps anything a route handler throws to a JSON error body of the form
 * `{ error, code }`. Server-side failures are logged under `tag`.
 */
export function errorResponse(error: unknown, tag: string): NextResponse {
  if (error instanceof ZodError) {
    return NextResponse.json(
      {
        error: 'Invalid request payload.',
        code: 'invalid_payload',
        details: error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`),
      },
      { status: 400 },
    )
  }

  if (error instanceof HttpError) {
    return NextResponse.json({ error: error.message, code: error.code }, { status: error.status })
  }

  if (error instanceof InputError) {
    return NextResponse.json({ error: error.message, code: error.code }, { status: 400 })
  }

  if (error instanceof ConfigError) {
    console.error(`${tag} server misconfigured`, { issues: error.issues })
    return NextResponse.json({ error: 'Service is not configured.', code: 'config_error' }, { status: 500 })
  }

  if (error instanceof ServiceError) {
    const status = SERVICE_ERROR_STATUS[error.kind]
    console.warn(`${tag} ${error.service} service failed`, {
      kind: error.kind,
      status: error.status ?? null,
      message: error.message,
    })

    const retryAfterSeconds = error.isQuotaError ? error.retryAfterSeconds : undefined
    return NextResponse.json(
      {
        error: error.message,
        code: error.kind,
        service: error.service,
        ...(retryAfterSeconds ? { retryAfterSeconds } : {}),
      },
      {
        status,
        headers: retryAfterSeconds ? { 'Retry-After': String(retryAfterSeconds) } : undefined,
      },
    )
  }

  console.error(`${tag} unexpected error`, error)
  return NextResponse.json({ error: 'Unexpected server error.', code: 'server_error' }, { status: 500 })
}

export async function readJsonBody(request: Request): Promise<unknown> {
  try {
    return await request.json()
  } catch {
    throw new HttpError('Request body must be valid JSON.', 400, { code: 'invalid_json' })
  }
}
