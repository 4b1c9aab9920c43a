// Shared JSON POST for the OpenAI-compatible clients.
//
// Two failure categories:
//   Unavailable: the server could not be reached, refused our credentials, or a gateway is down
//   Rejected:    the server answered but refused the request (rate limit, bad request, 500)

import { BackendError, BackendUnavailableError } from '../errors.js';
import { describeError, isAbortError } from '../helpers.js';
import { Logger } from '../logger.js';

const UNAVAILABLE_STATUSES = new Set([401, 403, 502, 503, 504]);

export type PostJsonOptions = {
  backendName: string;
  apiKey?: string;
  signal?: AbortSignal;
};

export const isUnavailableStatus = (status: number): boolean => UNAVAILABLE_STATUSES.has(status);

export const joinUrl = (baseUrl: string, path: string): string => (
  `${baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`
);

/**
 * POSTs a JSON body and returns the parsed payload untouched.
 */
export async function postJson(
  url: string,
  body: Record<string, unknown>,
  options: PostJsonOptions,
): Promise<unknown> {
  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
  };
  if (options.apiKey) {
    headers.Authorization = `Bearer ${options.apiKey}`;
  }

  let response: Response;
  try {
    response = await fetch(url, {
      method: 'POST',
      headers,
      body: JSON.stringify(body),
      signal: options.signal,
    });
  } catch (error) {
    if (isAbortError(error)) {
      throw error;
    }
    Logger.error('backend', `${options.backendName} unreachable`, { url, error: describeError(error) });
    throw new BackendUnavailableError(
      `${options.backendName} is unreachable at ${url}: ${describeError(error)}`,
      undefined,
      error,
    );
  }

  if (!response.ok) {
    const detail = await response.text();
    const message = `${options.backendName} request failed (${response.status} ${response.statusText}): ${detail}`;
    Logger.error('backend', message);
    if (isUnavailableStatus(response.status)) {
      throw new BackendUnavailableError(message, response.status);
    }
    throw new BackendError(message, response.status);
  }

  const payloadText = await response.text();
  try {
    const payload: unknown = JSON.parse(payloadText);
    return payload;
  } catch (error) {
    throw new BackendError(`${options.backendName} returned invalid JSON`, response.status, error);
  }
}
