/**
 * Validation utilities for handles, filter models and API responses
 */

import type { ColumnInfo, DatasetInfo, FilterModel } from '../types/api.js';
import { ResponseFormatError, ValidationError } from '../utils/errors.js';

export const EXPECTED_FILTER_KEY = '_cnf_';

/**
 * Checks if input is an object and not null.
 */
export function isARealObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Throw if a handle is empty
 */
export function requireHandle(value: string | undefined | null, label: string = 'handle'): string {
  if (!value) {
    throw new ValidationError(`Empty value for ${label}`, label);
  }
  return value;
}

/**
 * Validate filter model shape
 * Accepts nothing, an empty object, or an object with the single key `_cnf_`
 */
export function validateFilterModel(filterModel: unknown): void {
  if (filterModel === null || filterModel === undefined) {
    return;
  }

  if (isARealObject(filterModel)) {
    const keys = Object.keys(filterModel);
    if (keys.length === 0 || (keys.length === 1 && keys[0] === EXPECTED_FILTER_KEY)) {
      return;
    }
  }

  throw new ValidationError(
    `Invalid filter model, should be empty dict or dict with one key ${EXPECTED_FILTER_KEY}`,
    'filterModel'
  );
}

/**
 * Narrow a response body to an object
 */
export function readObject(raw: unknown, context: string): Record<string, unknown> {
  if (!isARealObject(raw)) {
    throw new ResponseFormatError(`Expected an object in response to ${context}`);
  }
  return raw;
}

/**
 * Read a required string field from a response body
 */
export function readString(raw: unknown, field: string, context: string): string {
  const value = readObject(raw, context)[field];
  if (typeof value !== 'string') {
    throw new ResponseFormatError(`Missing '${field}' in response to ${context}`, field);
  }
  return value;
}

/**
 * Read a required numeric field from a response body
 */
export function readNumber(raw: unknown, field: string, context: string): number {
  const value = readObject(raw, context)[field];
  if (typeof value !== 'number') {
    throw new ResponseFormatError(`Missing '${field}' in response to ${context}`, field);
  }
  return value;
}

/**
 * Read a filter model field, which must be an object when present
 */
export function readFilterModel(raw: unknown, context: string): FilterModel {
  const value = readObject(raw, context)['filterModel'];
  if (!isARealObject(value)) {
    throw new ResponseFormatError(`Missing 'filterModel' in response to ${context}`, 'filterModel');
  }
  return value;
}

/**
 * Parse the column listing of a sheet
 */
export function parseColumns(raw: unknown): ColumnInfo[] {
  if (!Array.isArray(raw)) {
    throw new ResponseFormatError('Expected a list of columns');
  }

  return raw.map((entry: unknown, i) => {
    if (!isARealObject(entry)) {
      throw new ResponseFormatError(`Column ${i} is not an object`);
    }
    const { Name, Id, FieldType, AtIndex, Hidden } = entry;
    if (typeof Name !== 'string' || typeof Id !== 'string') {
      throw new ResponseFormatError(`Column ${i} is missing Name or Id`);
    }
    const column: ColumnInfo = { Name, Id };
    if (typeof FieldType === 'string') column.FieldType = FieldType;
    if (typeof AtIndex === 'number') column.AtIndex = AtIndex;
    if (typeof Hidden === 'boolean') column.Hidden = Hidden;
    return column;
  });
}

/**
 * Parse dataset metadata, keeping every field the server sent
 */
export function parseDatasetInfo(raw: unknown): DatasetInfo {
  const obj = readObject(raw, 'dataset info');
  const { Status, ClientState, ...rest } = obj;
  const info: DatasetInfo = { ...rest };
  if (Status !== undefined) info.Status = Status;
  if (isARealObject(ClientState)) info.ClientState = ClientState;
  return info;
}
