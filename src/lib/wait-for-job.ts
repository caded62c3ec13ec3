/**
 * Job polling
 *
 * Uploads, exports and appends run asynchronously on the server. Their
 * progress is observed by fetching the dataset metadata for the job handle
 * until its Status leaves the transient states.
 */

import type { DatasetInfo } from '../types/api.js';
import type { JobResult, WaitOptions } from '../types/config.js';
import { GigasheetApiError, JobFailedError, JobTimeoutError, errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { sleep } from '../utils/retry.js';
import { requireHandle } from './validation.js';

export const WAIT_STATUSES: readonly string[] = ['uploading', 'loading', 'processing'];
export const SUCCESS_STATUS = 'processed';

export const DEFAULT_POLL_INTERVAL_MS = 1000;
export const DEFAULT_MAX_TRIES = 1000;

/**
 * True when the server reports that the polled sheet no longer exists
 */
export function isDeletedResponse(error: unknown): boolean {
  return (
    error instanceof GigasheetApiError &&
    error.statusCode === 400 &&
    error.responseText.includes('deleted')
  );
}

/**
 * Poll a handle until it is in a successful state
 *
 * Errors fetching the status are ignored and polling continues. The one
 * exception is a 400 response mentioning "deleted" when deletionIsSuccess
 * is set: append jobs delete their transient sheet on completion, so that
 * response means the job is done.
 *
 * @param fetchInfo - Fetches dataset metadata for the handle
 * @throws JobFailedError when the job reaches a non-transient, non-success status
 * @throws JobTimeoutError when maxTries polls pass without a terminal status
 */
export async function waitForJob(
  handle: string,
  fetchInfo: (handle: string) => Promise<DatasetInfo>,
  options: WaitOptions = {}
): Promise<JobResult> {
  requireHandle(handle);

  const {
    deletionIsSuccess = false,
    pollIntervalMs = DEFAULT_POLL_INTERVAL_MS,
    maxTries = DEFAULT_MAX_TRIES,
    onPoll,
  } = options;
  const logger = getLogger();

  let status: unknown = undefined;

  for (let attempt = 0; attempt < maxTries; attempt++) {
    if (attempt !== 0) {
      await sleep(pollIntervalMs);
    }

    let info: DatasetInfo;
    try {
      info = await fetchInfo(handle);
    } catch (error) {
      if (deletionIsSuccess && isDeletedResponse(error)) {
        logger.debug(`Handle ${handle} was deleted, treating as complete`, { attempt });
        return { outcome: 'deleted', attempts: attempt + 1 };
      }
      logger.debug(`Poll of ${handle} failed, retrying`, { attempt, error: errorMessage(error) });
      continue;
    }

    status = info.Status;
    logger.debug(`Handle ${handle} status: ${String(status)}`, { attempt });
    onPoll?.(attempt + 1, status);

    if (status === SUCCESS_STATUS) {
      return { outcome: 'processed', attempts: attempt + 1, info };
    }

    if (typeof status !== 'string' || !WAIT_STATUSES.includes(status)) {
      throw new JobFailedError(`Bad status on handle ${handle}: ${String(status)}`, handle, status);
    }
  }

  throw new JobTimeoutError(
    `Handle ${handle} still not done after ${maxTries} tries, last status was: ${String(status)}`,
    handle,
    maxTries,
    status
  );
}
