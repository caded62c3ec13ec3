/**
 * Append a local file to an existing sheet, optionally deduplicating
 * afterwards to keep either the older or the newer copy of each row.
 */

import type { Command } from 'commander';
import type { Gigasheet } from '../../gigasheet.js';
import type { SortModel } from '../../types/api.js';
import { ValidationError } from '../../utils/errors.js';
import type { Reporter } from '../reporter.js';
import { collect, type ClientFactory } from '../common.js';

// Built-in row number column, used as the dedupe sort key
export const ROW_NUMBER_COLUMN = '#';

export interface AppendCommandOptions {
  handle: string;
  inputFile: string;
  deduplicateByColNames: string[];
  upsert: boolean;
  description?: string;
}

export async function appendFromFile(
  giga: Gigasheet,
  options: AppendCommandOptions,
  reporter: Reporter
): Promise<void> {
  const { handle, inputFile, deduplicateByColNames, upsert, description } = options;

  if (upsert && deduplicateByColNames.length === 0) {
    throw new ValidationError('Must specify --deduplicate-by-col-names to upsert', 'upsert');
  }

  // Resolve column names up front so a bad name fails before any rows move
  let dedupeColIds: string[] = [];
  let sortColId = '';
  if (deduplicateByColNames.length > 0) {
    dedupeColIds = await giga.columnIdsForNames(handle, deduplicateByColNames);
    [sortColId] = await giga.columnIdsForNames(handle, [ROW_NUMBER_COLUMN]);
  }

  reporter.note(`Appending to handle ${handle} with current row count: ${await giga.countRows(handle)}`);

  // Only used as the sheet name if the append fails
  const nameIfFailed = `failed append to ${handle}`;
  const jobHandle = await reporter.task(
    `Uploading ${inputFile}`,
    () => giga.uploadFile(inputFile, nameIfFailed, handle),
    (job) => `Uploading as job: ${job}`
  );

  await reporter.task(
    'Waiting for appended rows to be parsed',
    () => giga.waitForFileToFinish(jobHandle, { deletionIsSuccess: true }),
    () => 'Uploaded data parsed'
  );
  reporter.note(`New combined row count: ${await giga.countRows(handle)}`);

  if (dedupeColIds.length > 0) {
    const behavior = upsert ? 'keeping newer rows' : 'keeping older rows';
    const sortModel: SortModel = [{ colId: sortColId, sort: upsert ? 'desc' : 'asc' }];
    await reporter.task(
      `Deduplicating ${behavior} on handle: ${handle}`,
      () => giga.deduplicateRows(handle, dedupeColIds, sortModel),
      () => 'Deduplication finished'
    );
    reporter.note(`Deduplicated row count: ${await giga.countRows(handle)}`);
  }

  if (description !== undefined) {
    await reporter.task(
      'Updating description',
      () => giga.setDescription(handle, description),
      () => 'Updated description'
    );
  }

  reporter.result(giga.sheetUrl(handle));
}

export function registerAppendCommand(program: Command, getClient: ClientFactory, reporter: Reporter): void {
  program
    .command('append')
    .description('Append a local file to an existing sheet, optionally upserting')
    .requiredOption('--handle <handle>', 'sheet handle to append or upsert onto')
    .requiredOption('--input-file <path>', 'path to local file to append')
    .option(
      '--deduplicate-by-col-names <name>',
      'column name that, with the others given, uniquely identifies a row; repeatable. Duplicates are dropped sheet-wide, including rows from before the append',
      collect,
      []
    )
    .option('--upsert', 'keep the newly appended row instead of the existing one', false)
    .option('--description <text>', 'text to set as the sheet description')
    .action(async (options: AppendCommandOptions) => {
      await appendFromFile(getClient(), options, reporter);
    });
}
