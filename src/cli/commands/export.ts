/**
 * Export a sheet in its current view state, then print the presigned URL
 * or save the file locally.
 */

import fs from 'fs';
import path from 'path';
import type { Command } from 'commander';
import type { Gigasheet } from '../../gigasheet.js';
import { downloadToFile } from '../../lib/download.js';
import { ValidationError } from '../../utils/errors.js';
import type { Reporter } from '../reporter.js';
import type { ClientFactory } from '../common.js';

export const EXPORT_FILE_NAME = 'export.zip';

export interface ExportCommandOptions {
  handle: string;
  outputDir?: string;
}

/**
 * @returns Presigned URL of the export
 */
export async function exportSheet(
  giga: Gigasheet,
  options: ExportCommandOptions,
  reporter: Reporter,
  download: (url: string, outputPath: string) => Promise<void> = downloadToFile
): Promise<string> {
  // Check before doing any work on the server
  let outputPath: string | null = null;
  if (options.outputDir) {
    outputPath = path.join(options.outputDir, EXPORT_FILE_NAME);
    if (fs.existsSync(outputPath)) {
      throw new ValidationError(
        `Rename existing file or choose new directory, file already exists: ${outputPath}`,
        'outputDir'
      );
    }
  }

  const exportHandle = await reporter.task(
    'Creating export',
    () => giga.createExportCurrentState(options.handle),
    (handle) => `Unique ID of export: ${handle}`
  );

  await reporter.task(
    'Waiting for export to complete',
    () => giga.waitForFileToFinish(exportHandle),
    () => 'Export complete'
  );

  const url = await giga.downloadExport(exportHandle);
  reporter.note('Presigned URL:');
  // On its own line; these URLs are long
  reporter.result(url);

  if (outputPath) {
    const target = outputPath;
    await reporter.task('Downloading file', () => download(url, target), () => `Saved to: ${target}`);
  }

  return url;
}

export function registerExportCommand(program: Command, getClient: ClientFactory, reporter: Reporter): void {
  program
    .command('export')
    .description('Export a sheet and print its download URL or save it locally')
    .requiredOption('--handle <handle>', 'sheet handle to export')
    .option('--output-dir <dir>', 'directory to save export.zip into; omit to only print the presigned URL')
    .action(async (options: ExportCommandOptions) => {
      await exportSheet(getClient(), options, reporter);
    });
}
