/**
 * Maps axios failures of third-party calls onto the error taxonomy.
 */

import { AxiosError } from 'axios';
import { ExternalApiError, TimeoutError, UpstreamUnavailableError, isTransientError } from './errors.js';

export function toUpstreamError(err: unknown, label: string, timeoutMs: number): unknown {
  if (!(err instanceof AxiosError)) return err;

  // the request may have been processed before the client gave up
  if (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT') {
    return new TimeoutError(label, timeoutMs);
  }

  const detail = err.response ? `HTTP ${err.response.status}` : (err.code ?? err.message);
  if (isTransientError(err)) {
    return new UpstreamUnavailableError(`${label} failed: ${detail}`);
  }
  return new ExternalApiError(`${label} failed: ${detail}`);
}
