/**
 * Request and response types for the Gigasheet REST API
 */

/**
 * Row filter passed to the filter endpoint. Only an empty object or a
 * single `_cnf_` key is accepted.
 */
export type FilterModel = Record<string, unknown>;

export interface SortModelEntry {
  colId: string;
  sort: 'asc' | 'desc';
}

export type SortModel = SortModelEntry[];

/**
 * Saved view state of a sheet, as found in DatasetInfo.ClientState
 */
export type GridState = Record<string, unknown>;

export enum SharePermission {
  Read = 0,
  Write = 1,
}

export interface UploadUrlRequest {
  url: string;
  name: string;
  targetHandle?: string;
}

export interface UploadDirectRequest {
  name: string;
  contents: string;
  parentDirectory: string;
  targetHandle?: string;
}

export interface CreateExportRequest {
  filename: string;
  folderHandle: string;
  gridState: GridState;
}

export interface DeduplicateRowsRequest {
  columns: string[];
  sortModel: SortModel;
}

export interface FilterRowsRequest {
  startRow: number;
  endRow: number;
  filterModel: FilterModel | null;
}

export interface RenameRequest {
  uuid: string;
  filename: string;
}

export interface ShareRequest {
  emails: string[];
  permissions: SharePermission[];
  message: string;
}

export interface EnrichmentRequest {
  filterModel: FilterModel | null;
  enrichments: Array<{
    provider: string;
    type: string;
    key: null;
  }>;
}

/**
 * Metadata returned by GET /dataset/{handle}. Only the fields the client
 * reads are typed; everything else passes through untouched.
 */
export interface DatasetInfo {
  /** Job status; usually a string, but passed through as sent */
  Status?: unknown;
  ClientState?: GridState;
  [key: string]: unknown;
}

export interface ColumnInfo {
  Name: string;
  Id: string;
  FieldType?: string;
  AtIndex?: number;
  Hidden?: boolean;
}

/**
 * Response of the filter endpoint. `lastRow` is the total matching row count.
 */
export interface RowsResponse {
  lastRow: number;
  rows?: unknown[];
  [key: string]: unknown;
}
