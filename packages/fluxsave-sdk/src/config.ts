import type { FluxsaveClientConfig } from './types';

export const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * =============================================================================
 * Fluxsave Client Configuration
 * =============================================================================
 * Reads client settings from the environment:
 *   FLUXSAVE_BASE_URL     API root (required)
 *   FLUXSAVE_API_KEY      sent as x-api-key
 *   FLUXSAVE_API_SECRET   sent as x-api-secret
 *   FLUXSAVE_TIMEOUT_MS   per-request timeout (default 30000)
 * =============================================================================
 */
export function loadClientConfig(env: NodeJS.ProcessEnv = process.env): FluxsaveClientConfig {
  const baseUrl = env.FLUXSAVE_BASE_URL?.trim();
  if (!baseUrl) {
    throw new Error('FLUXSAVE_BASE_URL is required');
  }

  const rawTimeout = env.FLUXSAVE_TIMEOUT_MS || String(DEFAULT_TIMEOUT_MS);
  const timeoutMs = parseInt(rawTimeout, 10);
  if (!/^\d+$/.test(rawTimeout) || timeoutMs <= 0) {
    throw new Error(`FLUXSAVE_TIMEOUT_MS must be a positive integer, got "${env.FLUXSAVE_TIMEOUT_MS}"`);
  }

  return {
    baseUrl,
    apiKey: env.FLUXSAVE_API_KEY || undefined,
    apiSecret: env.FLUXSAVE_API_SECRET || undefined,
    timeoutMs,
  };
}
