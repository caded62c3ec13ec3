/**
 * Resolve client configuration from explicit values and the environment
 */

import type { GigasheetConfig, ResolvedConfig } from '../types/config.js';
import { ValidationError } from '../utils/errors.js';

export const API_KEY_ENV = 'GIGASHEET_API_KEY';
export const API_URL_ENV = 'GIGASHEET_API_URL';
export const UI_URL_ENV = 'GIGASHEET_UI_URL';

export const DEFAULT_API_BASE_URL = 'https://api.gigasheet.com';
export const DEFAULT_UI_BASE_URL = 'https://app.gigasheet.com';

export function resolveConfig(
  config: GigasheetConfig = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedConfig {
  const apiKey = config.apiKey || env[API_KEY_ENV];
  if (!apiKey) {
    throw new ValidationError(
      `No API key, provide in constructor or set env ${API_KEY_ENV}`,
      'apiKey'
    );
  }

  return {
    apiKey,
    apiBaseUrl: config.apiBaseUrl || env[API_URL_ENV] || DEFAULT_API_BASE_URL,
    uiBaseUrl: config.uiBaseUrl || env[UI_URL_ENV] || DEFAULT_UI_BASE_URL,
    timeout: config.timeout ?? 30000, // 30 seconds
    maxRetries: config.maxRetries ?? 2,
    retryInitialDelay: config.retryInitialDelay ?? 500,
    retryMaxDelay: config.retryMaxDelay ?? 5000,
    debug: config.debug ?? false,
  };
}
