/**
 * @fileoverview Audible alert cue.
 */

import { setTimeout as delay } from 'node:timers/promises';
import type { AudioCue } from '@price-sentinel/contracts';

export interface TerminalBellOptions {
  /** @default process.stdout */
  output?: NodeJS.WritableStream;

  /** @default 2 */
  rings?: number;

  /** Pause between rings. @default 200 */
  gapMs?: number;

  sleep?: (ms: number) => Promise<void>;
}

/**
 * Rings the terminal bell (BEL, `\x07`) a few times.
 */
export class TerminalBell implements AudioCue {
  private readonly output: NodeJS.WritableStream;
  private readonly rings: number;
  private readonly gapMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: TerminalBellOptions = {}) {
    this.output = options.output ?? process.stdout;
    this.rings = options.rings ?? 2;
    this.gapMs = options.gapMs ?? 200;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
  }

  async play(): Promise<void> {
    for (let ring = 0; ring < this.rings; ring++) {
      if (ring > 0) {
        await this.sleep(this.gapMs);
      }
      this.output.write('\x07');
    }
  }
}
