import * as core from '@actions/core';
import {StatusSink, UpdateStatus} from './compression';

const MILESTONE_PERCENT = 25;
const TICKS_PER_REPORT = 100;

/**
 * Renders status updates to the action log.
 *
 * A new brief starts a phase (info), details go to debug. Determinate phases
 * log every 25% milestone; indeterminate phases report every 100 ticks and
 * once more when the phase ends.
 */
export class LogProgress {
  private brief?: string;
  private total?: number;
  private done = 0;
  private milestone = 0;
  private ticks = 0;

  readonly sink: StatusSink = status => this.update(status);

  update(status: UpdateStatus): void {
    if (status.brief !== undefined && status.brief !== this.brief) {
      this.end();
      this.brief = status.brief;
      core.info(`${status.brief}...`);
    }
    if (status.total !== undefined) {
      this.total = status.total;
      this.done = 0;
      this.milestone = 0;
    }
    if (status.detail !== undefined) {
      core.debug(`  ${status.detail}`);
    }
    if (status.increment !== undefined) {
      this.advance(status.increment);
    }
  }

  /**
   * Close the current phase
   */
  end(): void {
    if (this.brief !== undefined && this.total === undefined && this.ticks > 0) {
      core.info(`${this.brief}: done`);
    }
    this.brief = undefined;
    this.total = undefined;
    this.done = 0;
    this.milestone = 0;
    this.ticks = 0;
  }

  private advance(increment: number): void {
    const brief = this.brief ?? 'Working';

    if (this.total === undefined) {
      const before = Math.floor(this.ticks / TICKS_PER_REPORT);
      this.ticks += increment;
      if (Math.floor(this.ticks / TICKS_PER_REPORT) > before) {
        core.info(`${brief}: still running`);
      }
      return;
    }

    this.done = Math.min(this.total, this.done + increment);
    const percent =
      this.total === 0 ? 100 : Math.floor((this.done * 100) / this.total);
    const reached = Math.floor(percent / MILESTONE_PERCENT) * MILESTONE_PERCENT;
    if (reached > this.milestone) {
      this.milestone = reached;
      core.info(`${brief}: ${reached}%`);
    }
  }
}
