/**
 * Main Gigasheet SDK class
 */

import type { GigasheetConfig, JobResult, ResolvedConfig, WaitOptions } from './types/config.js';
import {
  SharePermission,
  type ColumnInfo,
  type CreateExportRequest,
  type DatasetInfo,
  type DeduplicateRowsRequest,
  type EnrichmentRequest,
  type FilterModel,
  type FilterRowsRequest,
  type GridState,
  type RenameRequest,
  type RowsResponse,
  type ShareRequest,
  type SortModel,
  type UploadDirectRequest,
  type UploadUrlRequest,
} from './types/api.js';
import { ApiClient } from './lib/api-client-fetch.js';
import { resolveConfig } from './lib/config.js';
import { getHandleFromUrl, getSheetUrl } from './lib/sheet-url.js';
import {
  parseColumns,
  parseDatasetInfo,
  readFilterModel,
  readNumber,
  readObject,
  readString,
  requireHandle,
  validateFilterModel,
} from './lib/validation.js';
import { waitForJob } from './lib/wait-for-job.js';
import { encodeFileBase64, encodeStreamBase64 } from './utils/encoding.js';
import { ValidationError } from './utils/errors.js';

/**
 * Built-in enrichment providers and the data type each one produces
 */
export const ENRICHMENT_DATA_TYPES: Readonly<Record<string, string>> = {
  'email-format-check': 'EMAIL',
};

/**
 * Client for the Gigasheet REST API
 *
 * Reads the API key from GIGASHEET_API_KEY when none is configured.
 * Every API call rejects when the server responds with a non-2xx status.
 */
export class Gigasheet {
  private config: ResolvedConfig;
  private api: ApiClient;

  constructor(config: GigasheetConfig = {}) {
    this.config = resolveConfig(config);

    this.api = new ApiClient({
      baseUrl: this.config.apiBaseUrl,
      apiKey: this.config.apiKey,
      timeout: this.config.timeout,
      maxRetries: this.config.maxRetries,
      retryInitialDelay: this.config.retryInitialDelay,
      retryMaxDelay: this.config.retryMaxDelay,
      debug: this.config.debug,
    });
  }

  /**
   * URL of a sheet in the web application
   * See getHandleFromUrl for the opposite direction
   */
  static getSheetUrl(handle: string): string {
    return getSheetUrl(handle);
  }

  /**
   * Handle of a sheet from its web application URL
   * See getSheetUrl for the opposite direction
   */
  static getHandleFromUrl(url: string): string {
    return getHandleFromUrl(url);
  }

  /**
   * Sheet URL against the configured web application host
   */
  sheetUrl(handle: string): string {
    return getSheetUrl(handle, this.config.uiBaseUrl);
  }

  /**
   * Upload from a world-readable URL
   * @param name - Name after upload; ignored when successfully appended
   * @param appendToHandle - Existing sheet to append the records to
   * @returns Handle of the upload job
   */
  async uploadUrl(url: string, name: string, appendToHandle?: string): Promise<string> {
    const body: UploadUrlRequest = { url, name };
    if (appendToHandle) {
      body.targetHandle = appendToHandle;
    }
    const resp = await this.api.post('/upload/url', body);
    return readString(resp, 'Handle', 'upload from URL');
  }

  /**
   * Upload a local file
   *
   * The whole file is sent base64 encoded in a single request, so very
   * large files may not make it. For those, put the data in cloud storage
   * and use uploadUrl with a presigned link.
   */
  async uploadFile(pathOnDisk: string, name: string, appendToHandle?: string): Promise<string> {
    const contents = await encodeFileBase64(pathOnDisk);
    return this.uploadDirect(contents, name, appendToHandle);
  }

  /**
   * Upload the contents of a stream such as process.stdin
   */
  async uploadFilelike(
    stream: AsyncIterable<Uint8Array | string>,
    name: string,
    appendToHandle?: string
  ): Promise<string> {
    const contents = await encodeStreamBase64(stream);
    return this.uploadDirect(contents, name, appendToHandle);
  }

  private async uploadDirect(contents: string, name: string, appendToHandle?: string): Promise<string> {
    const body: UploadDirectRequest = {
      name,
      contents,
      parentDirectory: '',
    };
    if (appendToHandle) {
      body.targetHandle = appendToHandle;
    }
    const resp = await this.api.post('/upload/direct', body);
    return readString(resp, 'Handle', 'direct upload');
  }

  /**
   * Sheet metadata: filename, column types, last modified, Status, ClientState
   */
  async info(handle: string): Promise<DatasetInfo> {
    const resp = await this.api.get(`/dataset/${handle}`);
    return parseDatasetInfo(resp);
  }

  /**
   * Create an export of a sheet, for use with downloadExport
   * @param state - View state to apply, see ClientState in info()
   * @param folderHandle - Folder to place the export into
   * @returns Handle of the export job
   */
  async createExport(
    handle: string,
    state: GridState = {},
    name: string = 'export.csv',
    folderHandle: string = ''
  ): Promise<string> {
    const body: CreateExportRequest = {
      filename: name,
      folderHandle,
      gridState: state,
    };
    const resp = await this.api.post(`/dataset/${handle}/export`, body);
    return readString(resp, 'handle', 'create export');
  }

  /**
   * Same as createExport, using the sheet's current view state
   */
  async createExportCurrentState(
    handle: string,
    name: string = 'export.csv',
    folderHandle: string = ''
  ): Promise<string> {
    const info = await this.info(handle);
    return this.createExport(handle, info.ClientState ?? {}, name, folderHandle);
  }

  /**
   * Presigned URL of a finished export
   * Wait for the export handle with waitForFileToFinish first.
   */
  async downloadExport(exportHandle: string): Promise<string> {
    const resp = await this.api.get(`dataset/${exportHandle}/download-export`);
    return readString(resp, 'presignedUrl', 'download export');
  }

  /**
   * All columns of a sheet, hidden ones included
   */
  async getColumns(handle: string): Promise<ColumnInfo[]> {
    requireHandle(handle);
    const resp = await this.api.get(`/dataset/${handle}/columns`, { showHidden: true });
    return parseColumns(resp);
  }

  /**
   * Map column names to column IDs
   * Each name must match exactly one column.
   */
  async columnIdsForNames(handle: string, columnNames: string[]): Promise<string[]> {
    const columns = await this.getColumns(handle);

    const nameToIds = new Map<string, string[]>();
    for (const column of columns) {
      const ids = nameToIds.get(column.Name) ?? [];
      ids.push(column.Id);
      nameToIds.set(column.Name, ids);
    }

    return columnNames.map((name) => {
      const ids = nameToIds.get(name) ?? [];
      if (ids.length === 0) {
        throw new ValidationError(`No column found with name: ${name}`, 'columnNames');
      }
      if (ids.length > 1) {
        throw new ValidationError(`Multiple matches for column name: ${name}`, 'columnNames');
      }
      return ids[0];
    });
  }

  /**
   * Remove duplicate rows, keeping the first row of each group under sortModel
   * @param columnIds - Columns that together form the duplicate key
   * @example
   * await giga.deduplicateRows(handle, ['B'], [{ colId: 'A', sort: 'desc' }]);
   */
  async deduplicateRows(handle: string, columnIds: string[], sortModel: SortModel): Promise<void> {
    const body: DeduplicateRowsRequest = {
      columns: columnIds,
      sortModel,
    };
    await this.api.delete(`/dataset/${handle}/deduplicate-rows`, body);
  }

  /**
   * Query rows [startRow, endRow) of a sheet
   */
  async getRows(
    handle: string,
    startRow: number,
    endRow: number,
    filterModel: FilterModel | null = null
  ): Promise<RowsResponse> {
    requireHandle(handle);
    validateFilterModel(filterModel);

    const body: FilterRowsRequest = {
      startRow,
      endRow,
      filterModel,
    };
    const resp = readObject(await this.api.post(`/file/${handle}/filter`, body), 'filter rows');
    const lastRow = readNumber(resp, 'lastRow', 'filter rows');
    const rows: unknown = resp['rows'];
    return { ...resp, lastRow, rows: Array.isArray(rows) ? rows : undefined };
  }

  /**
   * Row count, optionally under a filter
   */
  async countRows(handle: string, filterModel: FilterModel | null = null): Promise<number> {
    const resp = await this.getRows(handle, 0, 1, filterModel);
    return resp.lastRow;
  }

  async rename(handle: string, newName: string): Promise<unknown> {
    const body: RenameRequest = { uuid: handle, filename: newName };
    return this.api.post(`/rename/${handle}`, body);
  }

  async setDescription(handle: string, description: string): Promise<void> {
    await this.api.put(`/dataset/${handle}/note`, { note: description });
  }

  async listSavedFilters(): Promise<unknown> {
    return this.api.get('/filter-templates');
  }

  /**
   * Filter model of a saved filter, resolved against a sheet's columns
   */
  async getFilterModelForSavedFilterOnSheet(
    sheetHandle: string,
    savedFilterHandle: string
  ): Promise<FilterModel> {
    requireHandle(sheetHandle, 'sheet handle');
    requireHandle(savedFilterHandle, 'saved filter handle');
    const resp = await this.api.get(`/filter-templates/${savedFilterHandle}/on-sheet/${sheetHandle}`);
    return readFilterModel(resp, 'saved filter on sheet');
  }

  async getRowsWithSavedFilter(
    sheetHandle: string,
    savedFilterHandle: string,
    startRow: number,
    endRow: number
  ): Promise<RowsResponse> {
    const filterModel = await this.getFilterModelForSavedFilterOnSheet(sheetHandle, savedFilterHandle);
    return this.getRows(sheetHandle, startRow, endRow, filterModel);
  }

  /**
   * Share a sheet by email
   * @param withWrite - Grant write access in addition to read
   */
  async share(
    handle: string,
    recipients: string[],
    withWrite: boolean = false,
    message: string = ''
  ): Promise<void> {
    const permissions = [SharePermission.Read];
    if (withWrite) {
      permissions.push(SharePermission.Write);
    }
    const body: ShareRequest = {
      emails: recipients,
      permissions,
      message,
    };
    await this.api.put(`/file/${handle}/share/file`, body);
  }

  async setPublic(handle: string, isPublic: boolean): Promise<void> {
    await this.api.put(`/file/${handle}/share/public`, { isPublic });
  }

  /**
   * Revoke public access to a sheet
   */
  async unshare(handle: string): Promise<void> {
    await this.setPublic(handle, false);
  }

  /**
   * Run a built-in enrichment over a column
   * @param provider - One of the keys of ENRICHMENT_DATA_TYPES
   */
  async enrichBuiltin(
    handle: string,
    columnId: string,
    provider: string,
    filterModel: FilterModel | null = null
  ): Promise<unknown> {
    requireHandle(handle, 'sheet handle');
    if (!Object.hasOwn(ENRICHMENT_DATA_TYPES, provider)) {
      throw new ValidationError(`Unknown enrichment service provider: ${provider}`, 'provider');
    }
    const type = ENRICHMENT_DATA_TYPES[provider];

    const body: EnrichmentRequest = {
      filterModel,
      enrichments: [{ provider, type, key: null }],
    };
    return this.api.post(`/enrichments/${handle}/${columnId}`, body);
  }

  async enrichEmailFormat(
    handle: string,
    columnId: string,
    filterModel: FilterModel | null = null
  ): Promise<unknown> {
    return this.enrichBuiltin(handle, columnId, 'email-format-check', filterModel);
  }

  /**
   * Poll a handle until the job behind it has finished
   * Set deletionIsSuccess for append jobs, whose handle is deleted on completion.
   */
  async waitForFileToFinish(handle: string, options: WaitOptions = {}): Promise<JobResult> {
    return waitForJob(handle, (h) => this.info(h), options);
  }
}

