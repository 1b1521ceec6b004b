/**
 * Background execution of slow operations with cooperative progress polling.
 *
 * A task starts as soon as it is created and cannot be cancelled: a caller
 * that stops polling simply leaves it running to completion.
 */

import * as core from '@actions/core';
import {setTimeout as sleep} from 'timers/promises';
import {Worker} from 'worker_threads';
import {z} from 'zod';
import {TaskFailureError} from '../errors';
import {StatusReporter} from './status';

export const POLL_INTERVAL_MS = 50;

type Outcome<T> =
  | {status: 'fulfilled'; value: T}
  | {status: 'rejected'; reason: unknown};

export class BackgroundTask<T> {
  private outcome?: Outcome<T>;
  private readonly settled: Promise<Outcome<T>>;

  private constructor(
    readonly name: string,
    work: Promise<T>
  ) {
    this.settled = work.then(
      value => this.settle({status: 'fulfilled', value}),
      reason => this.settle({status: 'rejected', reason})
    );
  }

  private settle(outcome: Outcome<T>): Outcome<T> {
    this.outcome = outcome;
    core.debug(`[task:${this.name}] ${outcome.status}`);
    return outcome;
  }

  static run<T>(name: string, fn: () => Promise<T>): BackgroundTask<T> {
    core.debug(`[task:${name}] started`);
    return new BackgroundTask(name, new Promise<T>(resolve => resolve(fn())));
  }

  static fromPromise<T>(name: string, work: Promise<T>): BackgroundTask<T> {
    core.debug(`[task:${name}] started`);
    return new BackgroundTask(name, work);
  }

  /**
   * Non-blocking completion check
   */
  isDone(): boolean {
    return this.outcome !== undefined;
  }

  /**
   * Resolves with the operation's result or rejects with its error
   */
  async join(): Promise<T> {
    const outcome = await this.settled;
    if (outcome.status === 'rejected') {
      throw outcome.reason;
    }
    return outcome.value;
  }
}

/**
 * Poll a task to completion, emitting an indeterminate tick per interval.
 * Without a status sink the task is awaited directly.
 */
export async function waitForTask<T>(
  task: BackgroundTask<T>,
  status: StatusReporter,
  intervalMs: number = POLL_INTERVAL_MS
): Promise<T> {
  if (!status.enabled) {
    return task.join();
  }

  let polls = 0;
  while (!task.isDone()) {
    status.tick();
    polls++;
    await sleep(intervalMs);
  }
  core.debug(`[task:${task.name}] finished after ${polls} polls`);
  return task.join();
}

const failureSchema = z.object({
  message: z.string(),
  code: z.string().optional(),
});

export type WorkerFailure = z.infer<typeof failureSchema>;

const replySchema = z.discriminatedUnion('ok', [
  z.object({ok: z.literal(true), value: z.unknown()}),
  z.object({ok: z.literal(false), error: failureSchema}),
]);

export interface WorkerTaskOptions<T> {
  workerData?: unknown;
  /**
   * Validates the value the script replies with
   */
  schema: z.ZodType<T>;
  /**
   * Turns a failure reported by the script into the operation's own error
   */
  onFailure: (failure: WorkerFailure) => Error;
}

/**
 * Run a CommonJS script on a worker thread. The script must post exactly
 * one reply: `{ok: true, value}` or `{ok: false, error: {message, code?}}`.
 *
 * A reported failure is the operation's error; a worker that crashes or
 * exits without replying is a TaskFailureError.
 */
export function runWorkerTask<T>(
  name: string,
  script: string,
  options: WorkerTaskOptions<T>
): BackgroundTask<T> {
  const work = new Promise<T>((resolve, reject) => {
    const worker = new Worker(script, {
      eval: true,
      workerData: options.workerData,
    });
    let replied = false;

    worker.once('message', (message: unknown) => {
      replied = true;
      const reply = replySchema.safeParse(message);
      if (!reply.success) {
        reject(new TaskFailureError(name, 'sent a malformed reply', reply.error));
        return;
      }
      if (!reply.data.ok) {
        reject(options.onFailure(reply.data.error));
        return;
      }
      const value = options.schema.safeParse(reply.data.value);
      if (value.success) {
        resolve(value.data);
      } else {
        reject(new TaskFailureError(name, 'replied with an invalid value', value.error));
      }
    });

    worker.once('error', error => {
      replied = true;
      reject(new TaskFailureError(name, 'terminated abnormally', error));
    });

    worker.once('exit', code => {
      if (!replied) {
        reject(new TaskFailureError(name, `exited with code ${code} before replying`));
      }
    });
  });

  return BackgroundTask.fromPromise(name, work);
}
