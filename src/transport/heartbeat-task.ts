// src/transport/heartbeat-task.ts

import { KEEPALIVE } from '../constants/constants.js';
import { rootLogger } from '../logger.js';
import { toError } from '../utils/utils.js';
import type { HeartbeatStats } from '../types/link-types.js';

export interface HeartbeatTaskOptions {
  intervalMs: number;
  /** Sends one keepalive carrying the given nonce */
  send: (nonce: number) => Promise<void>;
  /** First nonce sent; later ones count up and wrap at MAX_NONCE */
  initialNonce: number;
  /** Checked before every run; a `false` skips the send */
  shouldRun?: () => boolean;
  sessionId?: string;
}

/**
 * Periodic keepalive for one session. Runs are chained with `setTimeout`, so
 * a slow write delays the next keepalive instead of overlapping it.
 */
export class HeartbeatTask {
  private readonly options: HeartbeatTaskOptions;
  private readonly logger = rootLogger.createLogger('Heartbeat');
  private timerId: NodeJS.Timeout | null = null;
  private nonce: number;
  private _stopped: boolean = true;
  private executionInProgress: boolean = false;

  public readonly stats: HeartbeatStats = {
    totalRuns: 0,
    failures: 0,
    lastNonce: null,
    lastError: null,
    lastRunTime: null,
  };

  constructor(options: HeartbeatTaskOptions) {
    this.options = options;
    this.nonce = options.initialNonce & KEEPALIVE.MAX_NONCE;
  }

  public get isRunning(): boolean {
    return !this._stopped;
  }

  start(): void {
    if (!this._stopped) {
      this.logger.debug('Heartbeat already running');
      return;
    }
    this._stopped = false;
    this.logger.debug(`Heartbeat started, every ${this.options.intervalMs} ms`, {
      sessionId: this.options.sessionId,
    });
    this._scheduleNextRun();
  }

  stop(): void {
    if (this._stopped) return;
    this._stopped = true;
    if (this.timerId) {
      clearTimeout(this.timerId);
      this.timerId = null;
    }
    this.logger.debug('Heartbeat stopped', { sessionId: this.options.sessionId });
  }

  private _scheduleNextRun(): void {
    if (this._stopped) return;
    if (this.timerId) clearTimeout(this.timerId);

    this.timerId = setTimeout(() => {
      this.timerId = null;
      if (this._stopped) return;
      this.execute().catch((err: unknown) => {
        this.logger.error('Heartbeat run failed', toError(err));
      });
    }, this.options.intervalMs);
  }

  async execute(): Promise<void> {
    if (this._stopped || this.executionInProgress) return;
    if (this.options.shouldRun && !this.options.shouldRun()) {
      this._scheduleNextRun();
      return;
    }

    this.executionInProgress = true;
    const nonce = this.nonce;
    this.nonce = (this.nonce + 1) & KEEPALIVE.MAX_NONCE;
    this.stats.totalRuns += 1;
    this.stats.lastNonce = nonce;
    this.stats.lastRunTime = Date.now();

    try {
      await this.options.send(nonce);
      this.logger.trace(`Keepalive sent, nonce=${nonce}`, { sessionId: this.options.sessionId });
    } catch (err: unknown) {
      const error = toError(err);
      this.stats.failures += 1;
      this.stats.lastError = error;
      this.logger.warn(`Keepalive ${nonce} failed: ${error.message}`, { sessionId: this.options.sessionId });
    } finally {
      this.executionInProgress = false;
      this._scheduleNextRun();
    }
  }
}
