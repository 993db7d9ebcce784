// src/utils/link-stats.ts

import type { LinkStatsSnapshot } from '../types/link-types.js';

/**
 * Counters for traffic over one session.
 */
export class LinkStats {
  private bytesReceived: number = 0;
  private bytesSent: number = 0;
  private framesReceived: number = 0;
  private framesSent: number = 0;
  private bytesDiscarded: number = 0;
  private sendErrors: number = 0;
  private lastReceiveAt: number | null = null;
  private lastSendAt: number | null = null;

  recordReceived(chunkLength: number, frames: number): void {
    this.bytesReceived += chunkLength;
    this.framesReceived += frames;
    this.lastReceiveAt = Date.now();
  }

  recordSent(frameLength: number): void {
    this.bytesSent += frameLength;
    this.framesSent += 1;
    this.lastSendAt = Date.now();
  }

  recordDiscarded(count: number): void {
    this.bytesDiscarded += count;
  }

  recordSendError(): void {
    this.sendErrors += 1;
  }

  snapshot(): LinkStatsSnapshot {
    return {
      bytesReceived: this.bytesReceived,
      bytesSent: this.bytesSent,
      framesReceived: this.framesReceived,
      framesSent: this.framesSent,
      bytesDiscarded: this.bytesDiscarded,
      sendErrors: this.sendErrors,
      lastReceiveAt: this.lastReceiveAt,
      lastSendAt: this.lastSendAt,
    };
  }
}
