import type { z } from 'zod'
import type { ResourceError } from '../errors'
import { parseJson, type HttpResponse } from '../http/http-client'

export type ResourceErrorClass = new (message: string, status: number, body: string) => ResourceError

export function assertStatus(
  response: HttpResponse,
  okStatuses: readonly number[],
  operation: string,
  ErrorClass: ResourceErrorClass
): void {
  if (okStatuses.includes(response.status)) return
  throw new ErrorClass(`${operation} failed: ${response.status} ${response.body}`, response.status, response.body)
}

export function parseBody<T extends z.ZodTypeAny>(
  response: HttpResponse,
  schema: T,
  operation: string,
  ErrorClass: ResourceErrorClass
): z.output<T> {
  const result = schema.safeParse(parseJson(response.body) ?? {})
  if (!result.success) {
    throw new ErrorClass(`${operation} failed: unexpected response body`, response.status, response.body)
  }
  return result.data
}
