/**
 * SDK Configuration Types
 */

import type { DatasetInfo } from './api.js';

/**
 * Configuration for the Gigasheet client
 */
export interface GigasheetConfig {
  /**
   * API token sent as X-GIGASHEET-TOKEN
   * Falls back to the GIGASHEET_API_KEY environment variable
   */
  apiKey?: string;

  /**
   * Base URL of the REST API
   * @default 'https://api.gigasheet.com'
   */
  apiBaseUrl?: string;

  /**
   * Base URL of the web application, used to build sheet links
   * @default 'https://app.gigasheet.com'
   */
  uiBaseUrl?: string;

  /**
   * Per-request timeout in milliseconds
   * @default 30000
   */
  timeout?: number;

  /**
   * Retries for GET requests that fail with a network error, 429 or 5xx
   * @default 2
   */
  maxRetries?: number;

  /**
   * First backoff delay in milliseconds
   * @default 500
   */
  retryInitialDelay?: number;

  /**
   * Upper bound on the backoff delay in milliseconds
   * @default 5000
   */
  retryMaxDelay?: number;

  /**
   * Log every request and response
   * @default false
   */
  debug?: boolean;
}

/**
 * Configuration with every default applied
 */
export type ResolvedConfig = Required<GigasheetConfig>;

/**
 * Options for waitForFileToFinish
 */
export interface WaitOptions {
  /**
   * Count a 400 "deleted" response as success. Append jobs run in a
   * transient sheet that the server removes once the rows are merged.
   * @default false
   */
  deletionIsSuccess?: boolean;

  /**
   * Delay between polls in milliseconds
   * @default 1000
   */
  pollIntervalMs?: number;

  /**
   * Polls before giving up
   * @default 1000
   */
  maxTries?: number;

  /**
   * Called after every successful poll with the observed status
   */
  onPoll?: (attempt: number, status: unknown) => void;
}

/**
 * Terminal result of a polled job
 */
export type JobResult =
  | { outcome: 'processed'; attempts: number; info: DatasetInfo }
  | { outcome: 'deleted'; attempts: number };
