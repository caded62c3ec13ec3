import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { S3Client } from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import {
  LINK_EXPIRATION_SECONDS,
  makeS3PresignedUrl,
  uploadFromS3,
} from '../../src/cli/commands/upload-s3.js';
import type { Gigasheet } from '../../src/gigasheet.js';
import { createClient, createRecordingReporter, type RecordingReporter } from '../helpers.js';

vi.mock('@aws-sdk/s3-request-presigner', () => ({
  getSignedUrl: vi.fn(),
}));

const PRESIGNED = 'https://bucket.s3.amazonaws.com/data/people.csv?X-Amz-Signature=test';

let giga: Gigasheet;
let reporter: RecordingReporter;

beforeEach(() => {
  giga = createClient();
  reporter = createRecordingReporter();
  vi.spyOn(giga, 'uploadUrl').mockResolvedValue('h1');
  vi.spyOn(giga, 'waitForFileToFinish').mockResolvedValue({ outcome: 'processed', attempts: 1, info: {} });
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('makeS3PresignedUrl', () => {
  it('presigns a GetObject request for one hour', async () => {
    vi.mocked(getSignedUrl).mockResolvedValue(PRESIGNED);
    const client = new S3Client({ region: 'us-east-1' });

    await expect(makeS3PresignedUrl('bucket', 'data/people.csv', client)).resolves.toBe(PRESIGNED);

    const [usedClient, command, options] = vi.mocked(getSignedUrl).mock.calls[0];
    expect(usedClient).toBe(client);
    expect(command.input).toEqual({ Bucket: 'bucket', Key: 'data/people.csv' });
    expect(options).toEqual({ expiresIn: LINK_EXPIRATION_SECONDS });
  });
});

describe('uploadFromS3', () => {
  it('imports by URL named after the key and shares with write access', async () => {
    const presign = vi.fn().mockResolvedValue(PRESIGNED);
    const share = vi.spyOn(giga, 'share').mockResolvedValue();

    await expect(
      uploadFromS3(giga, { s3Bucket: 'bucket', s3Key: 'data/people.csv', recipients: ['a@example.com'] }, reporter, presign)
    ).resolves.toBe('h1');

    expect(presign).toHaveBeenCalledWith('bucket', 'data/people.csv');
    expect(giga.uploadUrl).toHaveBeenCalledWith(PRESIGNED, 'data/people.csv');
    expect(giga.waitForFileToFinish).toHaveBeenCalledWith('h1');
    expect(share).toHaveBeenCalledWith('h1', ['a@example.com'], true);
    expect(reporter.results).toEqual(['https://app.gigasheet.com/spreadsheet/id/h1']);
  });

  it('skips sharing without recipients', async () => {
    const share = vi.spyOn(giga, 'share');

    await uploadFromS3(giga, { s3Bucket: 'bucket', s3Key: 'k.csv', recipients: [] }, reporter, vi.fn().mockResolvedValue(PRESIGNED));

    expect(share).not.toHaveBeenCalled();
  });
});
