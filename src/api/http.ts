import { z } from 'zod';
import { ApiErrorBodySchema } from './schemas.js';
import { DomainApiError, TransportError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface PostJsonOptions {
  apiKey?: string;
}

/**
 * POST a JSON body and validate the JSON reply.
 *
 * 4xx replies (and 5xx replies carrying an `{ error, code }` body) raise
 * DomainApiError; unreachable hosts, bare 5xx and malformed replies raise
 * TransportError.
 */
export async function postJson<S extends z.ZodTypeAny>(
  url: string,
  body: object,
  schema: S,
  options: PostJsonOptions = {}
): Promise<z.infer<S>> {
  logger.debug(`POST ${url} ${JSON.stringify(body)}`);

  let response: Response;
  try {
    response = await fetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Accept': 'application/json',
        ...(options.apiKey ? { 'Authorization': `Bearer ${options.apiKey}` } : {}),
      },
      body: JSON.stringify(body),
    });
  } catch (error) {
    throw new TransportError(
      `Service unreachable at ${url}: ${error instanceof Error ? error.message : String(error)}`,
      url,
      { cause: error }
    );
  }

  const text = await response.text();
  const payload = parseJson(text);

  if (!response.ok) {
    const apiError = ApiErrorBodySchema.safeParse(payload);
    if (apiError.success) {
      throw new DomainApiError(apiError.data.error, apiError.data.code ?? String(response.status), response.status, text);
    }
    if (response.status >= 500) {
      throw new TransportError(`Service error (${response.status}) at ${url}: ${text}`, url);
    }
    throw new DomainApiError(text || response.statusText, String(response.status), response.status, text);
  }

  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw new TransportError(`Unexpected response shape from ${url}: ${parsed.error.message}`, url);
  }
  return parsed.data;
}

export function joinUrl(base: string, ...segments: string[]): string {
  return [base.replace(/\/+$/, ''), ...segments.map((s) => s.replace(/^\/+|\/+$/g, ''))].join('/');
}

function parseJson(text: string): unknown {
  if (!text) {
    return {};
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}
