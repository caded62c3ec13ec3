/**
 * Import an S3 object through a presigned URL and give collaborators edit
 * access. Needs AWS credentials in the environment
 * (AWS_ACCESS_KEY_ID / AWS_SECRET_ACCESS_KEY or any other SDK source).
 */

import { GetObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import type { Command } from 'commander';
import type { Gigasheet } from '../../gigasheet.js';
import type { Reporter } from '../reporter.js';
import type { ClientFactory } from '../common.js';

export const LINK_EXPIRATION_SECONDS = 3600;

export interface UploadS3CommandOptions {
  s3Bucket: string;
  s3Key: string;
  recipients: string[];
}

export type Presigner = (bucket: string, key: string) => Promise<string>;

export async function makeS3PresignedUrl(
  bucket: string,
  key: string,
  client: S3Client = new S3Client({})
): Promise<string> {
  return getSignedUrl(client, new GetObjectCommand({ Bucket: bucket, Key: key }), {
    expiresIn: LINK_EXPIRATION_SECONDS,
  });
}

/**
 * Upload by URL, wait for parsing, share with write access
 * @returns Handle of the imported sheet
 */
export async function uploadAndShareUrl(
  giga: Gigasheet,
  url: string,
  name: string,
  recipients: string[],
  reporter: Reporter
): Promise<string> {
  const sheet = await reporter.task(`Importing ${name}`, () => giga.uploadUrl(url, name));
  await reporter.task('Waiting for parsing to complete', () => giga.waitForFileToFinish(sheet));
  if (recipients.length > 0) {
    await reporter.task(
      `Sharing with ${recipients.length} editors`,
      () => giga.share(sheet, recipients, true)
    );
  }
  return sheet;
}

export async function uploadFromS3(
  giga: Gigasheet,
  options: UploadS3CommandOptions,
  reporter: Reporter,
  presign: Presigner = makeS3PresignedUrl
): Promise<string> {
  const url = await presign(options.s3Bucket, options.s3Key);
  reporter.note('Obtained presigned URL:');
  reporter.note(url);

  const sheet = await uploadAndShareUrl(giga, url, options.s3Key, options.recipients, reporter);
  reporter.note('Success! Gigasheet URL:');
  reporter.result(giga.sheetUrl(sheet));
  return sheet;
}

export function registerUploadS3Command(program: Command, getClient: ClientFactory, reporter: Reporter): void {
  program
    .command('upload-s3')
    .description('Import an S3 object into Gigasheet and share it with editors')
    .requiredOption('--s3-bucket <bucket>', 'S3 bucket to load from')
    .requiredOption('--s3-key <key>', 'S3 object key to load from')
    .option('--recipients <emails...>', 'email addresses to share with', [])
    .action(async (options: UploadS3CommandOptions) => {
      await uploadFromS3(getClient(), options, reporter);
    });
}
