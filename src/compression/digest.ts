/**
 * sha256 file digests computed on a worker thread
 */

import * as path from 'path';
import {z} from 'zod';
import {IOFailureError} from '../errors';
import {BackgroundTask, runWorkerTask, waitForTask} from './background';
import {StatusReporter} from './status';

export const DIGEST_ALGORITHM = 'sha256';

// Runs inside the worker, so it is plain CommonJS
const DIGEST_SCRIPT = `
const {parentPort, workerData} = require('worker_threads');
const crypto = require('crypto');
const fs = require('fs');

const hash = crypto.createHash(workerData.algorithm);
fs.createReadStream(workerData.filePath)
  .on('data', chunk => hash.update(chunk))
  .on('error', error => {
    parentPort.postMessage({ok: false, error: {message: error.message, code: error.code}});
  })
  .on('end', () => {
    parentPort.postMessage({ok: true, value: hash.digest('hex')});
  });
`;

/**
 * Start hashing a file in the background
 */
export function startDigest(filePath: string): BackgroundTask<string> {
  return runWorkerTask(`digest ${path.basename(filePath)}`, DIGEST_SCRIPT, {
    workerData: {filePath, algorithm: DIGEST_ALGORITHM},
    schema: z.string().regex(/^[0-9a-f]+$/),
    onFailure: failure =>
      new IOFailureError('read', filePath, Object.assign(new Error(failure.message), {
        code: failure.code,
      })),
  });
}

/**
 * Hash a file, ticking the status sink until the digest is ready
 */
export async function digestFile(
  filePath: string,
  status: StatusReporter = new StatusReporter()
): Promise<string> {
  status.phase(`Digesting (${DIGEST_ALGORITHM})`, undefined, path.basename(filePath));
  return waitForTask(startDigest(filePath), status);
}

export function digestsEqual(expected: string, actual: string): boolean {
  return expected.trim().toLowerCase() === actual.toLowerCase();
}
