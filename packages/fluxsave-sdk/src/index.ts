// Client
export { FluxsaveClient } from './client';

// Configuration
export { DEFAULT_TIMEOUT_MS, loadClientConfig } from './config';

// Errors
export { FluxsaveApiError, FluxsaveAuthError, isFluxsaveApiError } from './errors';
export { FLUXSAVE_ERROR_CODES, isFluxsaveErrorCode, resolveErrorCode } from './error-codes';
export type { FluxsaveErrorCode } from './error-codes';

// Upload helpers
export { buildUploadForm, withOpenFiles } from './uploads';
export type { OpenedFile } from './uploads';

// Types (re-export everything)
export type {
  ApiPayload,
  FileUrlOptions,
  FluxsaveClientConfig,
  HttpMethod,
  JsonArray,
  JsonObject,
  JsonPrimitive,
  JsonValue,
  UpdateFileOptions,
  UploadOptions,
} from './types';
