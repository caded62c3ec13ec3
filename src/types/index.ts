/**
 * Type Definitions Export
 */

// SDK Configuration Types
export type {
  GigasheetConfig,
  ResolvedConfig,
  WaitOptions,
  JobResult,
} from './config.js';

// API Types
export type {
  FilterModel,
  SortModel,
  SortModelEntry,
  GridState,
  UploadUrlRequest,
  UploadDirectRequest,
  CreateExportRequest,
  DeduplicateRowsRequest,
  FilterRowsRequest,
  RenameRequest,
  ShareRequest,
  EnrichmentRequest,
  DatasetInfo,
  ColumnInfo,
  RowsResponse,
} from './api.js';

export { SharePermission } from './api.js';
