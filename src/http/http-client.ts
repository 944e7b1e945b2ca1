import { TransportError } from '../errors'

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH'

export interface HttpRequest {
  method: HttpMethod
  url: string
  headers?: Record<string, string>
  query?: Record<string, string | number | boolean>
  /** Sent as application/x-www-form-urlencoded */
  form?: Record<string, string>
  /** Sent as application/json */
  json?: unknown
}

export interface HttpResponse {
  status: number
  body: string
}

/**
 * Thin wrapper over the platform fetch. Every status comes back to the
 * caller; deciding what counts as success is the caller's job.
 */
export class HttpClient {
  async send(request: HttpRequest): Promise<HttpResponse> {
    const url = withQuery(request.url, request.query)
    const headers: Record<string, string> = { ...request.headers }
    let body: string | undefined

    if (request.form) {
      headers['Content-Type'] = 'application/x-www-form-urlencoded'
      body = new URLSearchParams(request.form).toString()
    } else if (request.json !== undefined) {
      headers['Content-Type'] = 'application/json'
      body = JSON.stringify(request.json)
    }

    let response: Response
    try {
      response = await fetch(url, { method: request.method, headers, body })
    } catch (err) {
      throw new TransportError(request.method, url, err)
    }

    return { status: response.status, body: await response.text() }
  }
}

export function withQuery(url: string, query?: HttpRequest['query']): string {
  if (!query) return url
  const params = new URLSearchParams()
  for (const [key, value] of Object.entries(query)) {
    params.set(key, String(value))
  }
  const search = params.toString()
  if (!search) return url
  return `${url}${url.includes('?') ? '&' : '?'}${search}`
}

export function bearer(accessToken: string): Record<string, string> {
  return { Authorization: `Bearer ${accessToken}` }
}

export function parseJson(body: string): unknown {
  try {
    return JSON.parse(body)
  } catch {
    return undefined
  }
}
