import type { z } from 'zod';
import { describeIssues } from './validation.js';

export type FetchFn = typeof fetch;

/**
 * Raised for non-2xx responses from an external HTTP service
 */
export class HttpError extends Error {
  constructor(
    readonly service: string,
    readonly status: number
  ) {
    super(`${service} request failed with status ${status}`);
    this.name = 'HttpError';
  }
}

/**
 * Raised when a 2xx body doesn't have the shape the adapter reads
 */
export class ResponseShapeError extends Error {
  constructor(
    readonly service: string,
    readonly detail: string
  ) {
    super(`${service} response is malformed: ${detail}`);
    this.name = 'ResponseShapeError';
  }
}

/**
 * Fetch and parse a JSON body, throwing HttpError on non-2xx
 */
export async function fetchJson(
  fetchFn: FetchFn,
  service: string,
  url: string | URL,
  init: RequestInit = {}
): Promise<unknown> {
  const response = await fetchFn(url, init);
  if (!response.ok) {
    throw new HttpError(service, response.status);
  }
  const body: unknown = await response.json();
  return body;
}

/**
 * fetchJson, then validate the body against a schema
 */
export async function fetchParsed<S extends z.ZodTypeAny>(
  fetchFn: FetchFn,
  service: string,
  url: string | URL,
  schema: S,
  init: RequestInit = {}
): Promise<z.output<S>> {
  const result = schema.safeParse(await fetchJson(fetchFn, service, url, init));
  if (!result.success) {
    throw new ResponseShapeError(service, describeIssues(result.error));
  }
  return result.data;
}
