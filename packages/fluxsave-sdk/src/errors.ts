import { resolveErrorCode } from './error-codes';
import type { FluxsaveErrorCode } from './error-codes';
import type { ApiPayload } from './types';

/** Base error for all Fluxsave SDK errors */
export class FluxsaveApiError extends Error {
  public readonly status: number;
  public readonly code: FluxsaveErrorCode;
  public readonly payload: ApiPayload;

  constructor(message: string, status: number, payload?: ApiPayload) {
    super(message);
    this.name = 'FluxsaveApiError';
    this.status = status;
    this.payload = payload;
    this.code = resolveErrorCode(status, message);
  }

  toString(): string {
    return `${this.status} [${this.code}]: ${this.message}`;
  }
}

/** Thrown when the API rejects the credentials (401) or they are not configured */
export class FluxsaveAuthError extends FluxsaveApiError {
  constructor(message = 'API key and secret are required', payload?: ApiPayload) {
    super(message, 401, payload);
    this.name = 'FluxsaveAuthError';
  }
}

export function isFluxsaveApiError(value: unknown): value is FluxsaveApiError {
  return value instanceof FluxsaveApiError;
}
