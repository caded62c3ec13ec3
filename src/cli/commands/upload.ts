/**
 * Upload a file, URL or stdin into a new sheet (or pick an existing one),
 * then optionally rename, describe and share it.
 */

import path from 'path';
import type { Command } from 'commander';
import type { Gigasheet } from '../../gigasheet.js';
import { ValidationError } from '../../utils/errors.js';
import type { Reporter } from '../reporter.js';
import { collect, type ClientFactory } from '../common.js';

export const DEFAULT_UPLOAD_NAME = 'Upload from gigasheet-cli';

export interface UploadCommandOptions {
  inputUrl?: string;
  inputFile?: string;
  inputStdin?: boolean;
  inputHandle?: string;
  shareTo: string[];
  shareWrite: boolean;
  shareMessage: string;
  name?: string;
  description?: string;
  info: boolean;
}

/**
 * @returns Handle of the sheet that was operated on
 */
export async function uploadAndShare(
  giga: Gigasheet,
  options: UploadCommandOptions,
  reporter: Reporter,
  stdin: AsyncIterable<Uint8Array | string> = process.stdin
): Promise<string> {
  const inputs = [options.inputUrl, options.inputFile, options.inputStdin, options.inputHandle];
  if (inputs.filter(Boolean).length !== 1) {
    throw new ValidationError(
      'Provide exactly one of --input-url, --input-file, --input-stdin or --input-handle',
      'input'
    );
  }

  let sheet: string;
  const name = options.name;
  const alreadyUploaded = Boolean(options.inputHandle);

  if (options.inputHandle) {
    reporter.note(`operating on handle: ${options.inputHandle}`);
    sheet = options.inputHandle;
  } else if (options.inputUrl) {
    const url = options.inputUrl;
    const uploadName = name ?? DEFAULT_UPLOAD_NAME;
    sheet = await reporter.task(`Uploading from URL: ${url}`, () => giga.uploadUrl(url, uploadName));
  } else if (options.inputFile) {
    const file = options.inputFile;
    const uploadName = name ?? path.basename(file);
    sheet = await reporter.task(`Uploading file: ${file}`, () => giga.uploadFile(file, uploadName));
  } else {
    const uploadName = name ?? DEFAULT_UPLOAD_NAME;
    sheet = await reporter.task('Uploading from stdin', () => giga.uploadFilelike(stdin, uploadName));
  }

  if (!alreadyUploaded) {
    reporter.note(`uploaded file: ${sheet}`);
    await reporter.task(
      'Waiting for parsing to complete',
      () => giga.waitForFileToFinish(sheet),
      () => 'Sheet loaded'
    );
  }

  if (alreadyUploaded && name) {
    await reporter.task(`Renaming to: ${name}`, () => giga.rename(sheet, name), () => 'Sheet renamed');
  }

  if (options.description !== undefined) {
    const description = options.description;
    await reporter.task(
      'Updating description',
      () => giga.setDescription(sheet, description),
      () => 'Updated sheet description'
    );
  }

  if (options.shareTo.length > 0) {
    await reporter.task(
      'Sharing',
      () => giga.share(sheet, options.shareTo, options.shareWrite, options.shareMessage),
      () => `Shared to ${options.shareTo.length} recipients`
    );
  }

  if (options.info) {
    const info = await giga.info(sheet);
    reporter.result(JSON.stringify(info, null, 2));
  }

  return sheet;
}

export function registerUploadCommand(program: Command, getClient: ClientFactory, reporter: Reporter): void {
  program
    .command('upload')
    .description('Upload a file, URL or stdin to Gigasheet and optionally share it')
    .option('--input-url <url>', 'URL of file to upload')
    .option('--input-file <path>', 'path to local file to upload (max ~50MB depending on connection speed)')
    .option('--input-stdin', 'read file contents from stdin (max ~50MB depending on connection speed)', false)
    .option('--input-handle <handle>', 'operate on an already uploaded sheet instead of uploading')
    .option('--share-to <email>', 'email address to share with, repeat for multiple recipients', collect, [])
    .option('--share-write', 'share with write permission as well as read', false)
    .option('--share-message <text>', 'message to send with the share', '')
    .option('--name <name>', 'name for the sheet; renames it when used with --input-handle')
    .option('--description <text>', 'update the sheet description')
    .option('--info', 'print sheet info at the end', false)
    .action(async (options: UploadCommandOptions) => {
      const sheet = await uploadAndShare(getClient(), options, reporter);
      reporter.result(getClient().sheetUrl(sheet));
    });
}
