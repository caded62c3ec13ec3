/**
 * Gigasheet Client SDK
 * Client for the Gigasheet REST API
 */

// Main SDK class
export { Gigasheet, ENRICHMENT_DATA_TYPES } from './gigasheet.js';

// Helpers usable without a client instance
export { getSheetUrl, getHandleFromUrl } from './lib/sheet-url.js';
export { waitForJob, WAIT_STATUSES, SUCCESS_STATUS } from './lib/wait-for-job.js';
export { validateFilterModel, EXPECTED_FILTER_KEY } from './lib/validation.js';
export { downloadToFile } from './lib/download.js';
export { API_KEY_ENV } from './lib/config.js';

// Type exports
export type {
  // Config types
  GigasheetConfig,
  ResolvedConfig,
  WaitOptions,
  JobResult,

  // API types
  FilterModel,
  SortModel,
  SortModelEntry,
  GridState,
  DatasetInfo,
  ColumnInfo,
  RowsResponse,
} from './types/index.js';

export { SharePermission } from './types/index.js';

// Error classes
export {
  ValidationError,
  GigasheetApiError,
  NetworkError,
  ResponseFormatError,
  JobFailedError,
  JobTimeoutError,
} from './utils/errors.js';

// Logging
export { initLogger, getLogger } from './utils/logger.js';
