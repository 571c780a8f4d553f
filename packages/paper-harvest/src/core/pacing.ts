import { setTimeout as sleep } from 'node:timers/promises';

export type Sleeper = (ms: number) => Promise<void>;
export type RandomSource = () => number;

export const defaultSleep: Sleeper = async (ms) => {
  if (ms > 0) {
    await sleep(ms);
  }
};

/**
 * Fixed base delay plus uniform jitter. Randomness is confined here so that every caller on the
 * decision path stays deterministic.
 */
export class Pacer {
  constructor(
    private readonly sleepFn: Sleeper = defaultSleep,
    private readonly random: RandomSource = Math.random
  ) {}

  delayFor(baseMs: number, jitterMs: number): number {
    const jitter = jitterMs > 0 ? Math.round(this.random() * jitterMs) : 0;
    return Math.max(0, baseMs) + jitter;
  }

  async pause(baseMs: number, jitterMs = 0): Promise<number> {
    const delay = this.delayFor(baseMs, jitterMs);
    await this.sleepFn(delay);
    return delay;
  }

  async wait(ms: number): Promise<void> {
    await this.sleepFn(ms);
  }
}

export const immediatePacer = (): Pacer => new Pacer(async () => undefined, () => 0);
