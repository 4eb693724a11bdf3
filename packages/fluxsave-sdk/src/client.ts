import { Logger } from '@nestjs/common';
import type { LoggerService } from '@nestjs/common';

import { DEFAULT_TIMEOUT_MS, loadClientConfig } from './config';
import { FluxsaveApiError, FluxsaveAuthError } from './errors';
import { buildUploadForm, withOpenFiles } from './uploads';
import type {
  ApiPayload,
  FileUrlOptions,
  FluxsaveClientConfig,
  HttpMethod,
  JsonArray,
  JsonObject,
  UpdateFileOptions,
  UploadOptions,
} from './types';

interface Credentials {
  apiKey: string;
  apiSecret: string;
}

/**
 * Typed HTTP client for the Fluxsave file-storage API.
 *
 * Uses native `fetch` and `FormData`. Every call requires an API key and
 * secret; failures surface as {@link FluxsaveApiError} with a resolved `code`.
 *
 * @example
 * ```ts
 * const fluxsave = new FluxsaveClient({
 *   baseUrl: 'https://storage.example.com',
 *   apiKey: 'key',
 *   apiSecret: 'secret',
 * });
 *
 * await fluxsave.uploadFile('./report.pdf', { folderId: 'fld_1' });
 * const thumb = fluxsave.buildFileUrl('file_1', { w: 200 });
 * ```
 */
export class FluxsaveClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly _fetch: typeof globalThis.fetch;
  private readonly logger: LoggerService;
  private credentials: Partial<Credentials>;

  constructor(config: FluxsaveClientConfig) {
    // Strip trailing slash
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this._fetch = config.fetch ?? globalThis.fetch;
    this.logger = config.logger ?? new Logger(FluxsaveClient.name);
    this.credentials = { apiKey: config.apiKey, apiSecret: config.apiSecret };
  }

  /** Build a client from `FLUXSAVE_*` environment variables; defined overrides win. */
  static fromEnv(
    overrides: Partial<FluxsaveClientConfig> = {},
    env: NodeJS.ProcessEnv = process.env,
  ): FluxsaveClient {
    const config = loadClientConfig(env);
    return new FluxsaveClient({
      baseUrl: overrides.baseUrl ?? config.baseUrl,
      apiKey: overrides.apiKey ?? config.apiKey,
      apiSecret: overrides.apiSecret ?? config.apiSecret,
      timeoutMs: overrides.timeoutMs ?? config.timeoutMs,
      fetch: overrides.fetch,
      logger: overrides.logger,
    });
  }

  /** Replace both credentials at once. */
  setCredentials(apiKey: string, apiSecret: string): void {
    this.credentials = { apiKey, apiSecret };
  }

  hasCredentials(): boolean {
    return Boolean(this.credentials.apiKey && this.credentials.apiSecret);
  }

  // ────────────────────────────────────────────
  // Files
  // ────────────────────────────────────────────

  /** Upload a single local file. */
  async uploadFile(filePath: string, options: UploadOptions = {}): Promise<ApiPayload> {
    this.requireCredentials();
    return withOpenFiles([filePath], (files) =>
      this.request('POST', '/api/v1/files/upload', buildUploadForm('file', files, options)),
    );
  }

  /** Upload several local files in one request; they share the same metadata. */
  async uploadFiles(filePaths: readonly string[], options: UploadOptions = {}): Promise<ApiPayload> {
    this.requireCredentials();
    return withOpenFiles(filePaths, (files) =>
      this.request('POST', '/api/v1/files/upload', buildUploadForm('files', files, options)),
    );
  }

  /** List files, optionally restricted to one folder. */
  async listFiles(folderId?: string): Promise<ApiPayload> {
    const query = folderId ? `?folderId=${encodeURIComponent(folderId)}` : '';
    return this.request('GET', `/api/v1/files${query}`);
  }

  async getFileMetadata(fileId: string): Promise<ApiPayload> {
    return this.request('GET', `/api/v1/files/metadata/${encodeURIComponent(fileId)}`);
  }

  /** Replace a file's content (and optionally its name/compression). */
  async updateFile(
    fileId: string,
    filePath: string,
    options: UpdateFileOptions = {},
  ): Promise<ApiPayload> {
    this.requireCredentials();
    const { name, compression } = options;
    return withOpenFiles([filePath], (files) =>
      this.request(
        'PUT',
        `/api/v1/files/${encodeURIComponent(fileId)}`,
        buildUploadForm('file', files, { name, compression }),
      ),
    );
  }

  async deleteFile(fileId: string): Promise<ApiPayload> {
    return this.request('DELETE', `/api/v1/files/${encodeURIComponent(fileId)}`);
  }

  /**
   * Build a public URL for a file. Options are appended unencoded, e.g.
   * `{ w: 100, h: 50 }` → `?w=100&h=50`.
   * Pure string building, nothing is sent.
   */
  buildFileUrl(fileId: string, options: FileUrlOptions = {}): string {
    const url = `${this.baseUrl}/api/v1/files/${fileId}`;
    const query = Object.entries(options)
      .map(([key, value]) => `${key}=${value}`)
      .join('&');
    return query ? `${url}?${query}` : url;
  }

  // ────────────────────────────────────────────
  // Folders
  // ────────────────────────────────────────────

  async listFolders(): Promise<ApiPayload> {
    return this.request('GET', '/api/v1/folders');
  }

  async createFolder(name: string, parentId?: string): Promise<ApiPayload> {
    const body: JsonObject = { name };
    if (parentId !== undefined) {
      body.parentId = parentId;
    }
    return this.request('POST', '/api/v1/folders', body);
  }

  async renameFolder(folderId: string, name: string): Promise<ApiPayload> {
    return this.request('PATCH', `/api/v1/folders/${encodeURIComponent(folderId)}`, { name });
  }

  async deleteFolder(folderId: string): Promise<ApiPayload> {
    return this.request('DELETE', `/api/v1/folders/${encodeURIComponent(folderId)}`);
  }

  // ────────────────────────────────────────────
  // Account
  // ────────────────────────────────────────────

  /** Storage and usage metrics for the account. */
  async getMetrics(): Promise<ApiPayload> {
    return this.request('GET', '/api/v1/metrics');
  }

  // ────────────────────────────────────────────
  // Internal
  // ────────────────────────────────────────────

  private requireCredentials(): Credentials {
    const { apiKey, apiSecret } = this.credentials;
    if (!apiKey || !apiSecret) {
      throw new FluxsaveAuthError();
    }
    return { apiKey, apiSecret };
  }

  private async request(
    method: HttpMethod,
    path: string,
    body?: JsonObject | FormData,
  ): Promise<ApiPayload> {
    const { apiKey, apiSecret } = this.requireCredentials();

    const headers: Record<string, string> = {
      'Accept': 'application/json',
      'x-api-key': apiKey,
      'x-api-secret': apiSecret,
    };

    // Multipart bodies get their boundary header from fetch
    let requestBody: string | FormData | undefined;
    if (body instanceof FormData) {
      requestBody = body;
    } else if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
      requestBody = JSON.stringify(body);
    }

    this.logger.debug?.(`${method} ${path}`);

    const res = await this._fetch(`${this.baseUrl}${path}`, {
      method,
      headers,
      body: requestBody,
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    const payload = decodePayload(await res.text());

    if (!res.ok) {
      const message = errorMessage(payload, res);
      const error =
        res.status === 401
          ? new FluxsaveAuthError(message, payload)
          : new FluxsaveApiError(message, res.status, payload);

      this.logger.warn(`${method} ${path} failed: ${error.toString()}`);
      throw error;
    }

    return payload;
  }
}

// ── Helpers ──────────────────────────────────────

/** JSON.parse only yields plain objects and arrays for non-null objects */
function isJsonContainer(value: unknown): value is JsonObject | JsonArray {
  return typeof value === 'object' && value !== null;
}

function decodePayload(text: string): ApiPayload {
  if (text === '') {
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return text;
  }

  return isJsonContainer(parsed) ? parsed : text;
}

function errorMessage(payload: ApiPayload, res: Response): string {
  if (isJsonContainer(payload) && !Array.isArray(payload)) {
    const { message } = payload;
    if (typeof message === 'string' && message) {
      return message;
    }
  }
  return res.statusText || `HTTP ${res.status}`;
}
