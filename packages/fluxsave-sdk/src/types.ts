import type { LoggerService } from '@nestjs/common';

// ────────────────────────────────────────────────
// Payloads
// ────────────────────────────────────────────────

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonObject | JsonArray;

export interface JsonObject {
  [key: string]: JsonValue;
}

export type JsonArray = JsonValue[];

/**
 * Decoded response body.
 *
 * Structured JSON (object or array) is kept as-is; any other body is kept as
 * its raw text, and an empty body is `undefined`.
 */
export type ApiPayload = JsonObject | JsonArray | string | undefined;

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

// ────────────────────────────────────────────────
// Request Options
// ────────────────────────────────────────────────

/** Optional metadata sent alongside an uploaded file */
export interface UploadOptions {
  /** Display name stored with the file (ignored when empty) */
  name?: string;
  /** Compression level permitted by the account's plan */
  compression?: string;
  /** Folder to place the file in */
  folderId?: string;
}

/** Metadata accepted when replacing a file's content */
export type UpdateFileOptions = Omit<UploadOptions, 'folderId'>;

/** Query options appended verbatim to a file URL (e.g. `{ w: 100, h: 50 }`) */
export type FileUrlOptions = Record<string, string | number | boolean>;

// ────────────────────────────────────────────────
// Client Configuration
// ────────────────────────────────────────────────

/** Configuration for FluxsaveClient */
export interface FluxsaveClientConfig {
  /** Base URL of the Fluxsave API (e.g. "https://storage.example.com") */
  baseUrl: string;

  /** Sent as `x-api-key` on every request */
  apiKey?: string;

  /** Sent as `x-api-secret` on every request */
  apiSecret?: string;

  /** Per-request timeout in milliseconds (defaults to 30000) */
  timeoutMs?: number;

  /** Optional custom fetch implementation (defaults to globalThis.fetch) */
  fetch?: typeof globalThis.fetch;

  /** Logger for request tracing (defaults to a Nest `Logger` named after the client) */
  logger?: LoggerService;
}
