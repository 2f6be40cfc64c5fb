import { singleton } from 'tsyringe';
import type { Clock } from '../ports/clock.js';

@singleton()
export class SystemClock implements Clock {
  nowMs(): number {
    return Date.now();
  }

  sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
