import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { exportSheet } from '../../src/cli/commands/export.js';
import type { Gigasheet } from '../../src/gigasheet.js';
import { ValidationError } from '../../src/utils/errors.js';
import { HANDLE, createClient, createRecordingReporter, type RecordingReporter } from '../helpers.js';

const PRESIGNED = 'https://exports.example.com/export.zip?X-Amz-Signature=test';

let giga: Gigasheet;
let reporter: RecordingReporter;
let dir: string;

beforeEach(() => {
  giga = createClient();
  reporter = createRecordingReporter();
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'gigasheet-export-'));
  vi.spyOn(giga, 'createExportCurrentState').mockResolvedValue('export-1');
  vi.spyOn(giga, 'waitForFileToFinish').mockResolvedValue({ outcome: 'processed', attempts: 2, info: {} });
  vi.spyOn(giga, 'downloadExport').mockResolvedValue(PRESIGNED);
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
  vi.restoreAllMocks();
});

describe('exportSheet', () => {
  it('creates an export, waits for it and prints the URL', async () => {
    const download = vi.fn();

    await expect(exportSheet(giga, { handle: HANDLE }, reporter, download)).resolves.toBe(PRESIGNED);

    expect(giga.createExportCurrentState).toHaveBeenCalledWith(HANDLE);
    expect(giga.waitForFileToFinish).toHaveBeenCalledWith('export-1');
    expect(giga.downloadExport).toHaveBeenCalledWith('export-1');
    expect(reporter.tasks).toEqual(['Unique ID of export: export-1', 'Export complete']);
    expect(reporter.results).toEqual([PRESIGNED]);
    expect(download).not.toHaveBeenCalled();
  });

  it('downloads into the output directory', async () => {
    const download = vi.fn().mockResolvedValue(undefined);

    await exportSheet(giga, { handle: HANDLE, outputDir: dir }, reporter, download);

    expect(download).toHaveBeenCalledWith(PRESIGNED, path.join(dir, 'export.zip'));
    expect(reporter.tasks).toContain(`Saved to: ${path.join(dir, 'export.zip')}`);
  });

  it('refuses an existing export.zip before creating an export', async () => {
    fs.writeFileSync(path.join(dir, 'export.zip'), 'old');

    await expect(exportSheet(giga, { handle: HANDLE, outputDir: dir }, reporter, vi.fn())).rejects.toBeInstanceOf(
      ValidationError
    );
    expect(giga.createExportCurrentState).not.toHaveBeenCalled();
  });
});
