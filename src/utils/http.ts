/**
 * JSON over HTTP with a fixed timeout and typed failures
 */

import type { z } from 'zod';
import { HttpError, NetworkError, UnexpectedResponseError } from '../errors';
import { logger } from './logger';

export const HTTP_TIMEOUT_MS = 30_000;

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'PUT' | 'DELETE';

export interface JsonRequest {
  readonly method: HttpMethod;
  readonly url: string;
  readonly headers: Record<string, string>;
  readonly body?: unknown;
  readonly contentType?: string;
  readonly timeoutMs?: number;
}

/**
 * Sends a request and returns the decoded body
 *
 * An empty body yields null and a body that is not JSON is returned as text.
 *
 * @throws {NetworkError} If no complete response arrives (including the timeout)
 * @throws {HttpError} For any non-2xx status
 */
export async function requestJson(request: JsonRequest): Promise<unknown> {
  const headers: Record<string, string> = { Accept: 'application/json', ...request.headers };
  let body: string | undefined;

  if (request.body !== undefined) {
    body = JSON.stringify(request.body);
    headers['Content-Type'] = request.contentType ?? 'application/json';
  }

  logger.debug('HTTP request', { method: request.method, url: request.url });

  let response: Response;
  let raw: string;
  try {
    response = await fetch(request.url, {
      method: request.method,
      headers,
      body,
      signal: AbortSignal.timeout(request.timeoutMs ?? HTTP_TIMEOUT_MS)
    });
    // the timeout also covers reading the body
    raw = await response.text();
  } catch (error) {
    throw new NetworkError(request.url, error instanceof Error ? error : undefined);
  }

  if (!response.ok) {
    throw new HttpError(response.status, response.statusText, request.url, raw);
  }

  if (!raw) {
    return null;
  }

  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

/**
 * Validates a decoded response body against a schema
 *
 * @throws {UnexpectedResponseError} If the body does not match
 */
export function parseResponse<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  context: string
): z.infer<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new UnexpectedResponseError(
      context,
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
}
