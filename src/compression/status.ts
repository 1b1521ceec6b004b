/**
 * Progress reporting around an optional status sink
 */

import {StatusSink, UpdateStatus} from './types';

/**
 * Wraps an optional sink so call sites never check for its presence.
 * Without a sink every method is a no-op.
 */
export class StatusReporter {
  constructor(private readonly sink?: StatusSink) {}

  get enabled(): boolean {
    return this.sink !== undefined;
  }

  update(status: UpdateStatus): void {
    if (this.sink) {
      this.sink(status);
    }
  }

  /**
   * Start a phase. With a total the phase is determinate.
   */
  phase(brief: string, total?: number, detail?: string): void {
    const status: UpdateStatus = {brief};
    if (detail !== undefined) status.detail = detail;
    if (total !== undefined) status.total = total;
    this.update(status);
  }

  detail(detail: string): void {
    this.update({detail});
  }

  tick(increment = 1): void {
    this.update({increment});
  }
}

/**
 * Maps bytes processed onto a fixed number of progress steps, so the
 * increments of one phase always sum to exactly `steps`.
 */
export class ByteProgress {
  private processed = 0;
  private emitted = 0;

  constructor(
    private readonly reporter: StatusReporter,
    private readonly totalBytes: number,
    readonly steps: number
  ) {}

  advance(bytes: number): void {
    this.processed = Math.min(this.totalBytes, this.processed + bytes);
    const reached =
      this.totalBytes === 0
        ? this.steps
        : Math.floor((this.processed * this.steps) / this.totalBytes);
    this.emit(reached);
  }

  complete(): void {
    this.emit(this.steps);
  }

  private emit(reached: number): void {
    if (reached > this.emitted) {
      this.reporter.tick(reached - this.emitted);
      this.emitted = reached;
    }
  }
}
