/**
 * Conversions between sheet handles and web application URLs
 */

import { ValidationError } from '../utils/errors.js';
import { DEFAULT_UI_BASE_URL } from './config.js';

export function getSheetUrl(handle: string, uiBaseUrl: string = DEFAULT_UI_BASE_URL): string {
  return `${uiBaseUrl}/spreadsheet/id/${handle}`;
}

/**
 * Extract the handle from a sheet URL such as
 * https://app.gigasheet.com/spreadsheet/id/<handle>
 */
export function getHandleFromUrl(url: string, uiBaseUrl: string = DEFAULT_UI_BASE_URL): string {
  if (!url.startsWith(`${uiBaseUrl}/spreadsheet`)) {
    throw new ValidationError('Must be a complete URL of a sheet in the Gigasheet UI', 'url');
  }

  // ['', 'spreadsheet', 'id', '<handle>', ...]
  const parts = new URL(url).pathname.split('/');
  const handle = parts[3];
  if (!handle) {
    throw new ValidationError('No handle found in URL', 'url');
  }
  return handle;
}
