import type { ProcessSignal, ProcessSignals } from '../ports/process-signals.js';

/** Used under test: the vitest worker owns the process signals. */
export class NoopProcessSignals implements ProcessSignals {
  on(_signal: ProcessSignal, _handler: () => void | Promise<void>): void {}
}
