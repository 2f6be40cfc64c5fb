import type { ProcessSignal, ProcessSignals } from '../ports/process-signals.js';

/**
 * Registers handlers on the real Node process.
 * The signal name Node passes to listeners is dropped.
 */
export class NodeProcessSignals implements ProcessSignals {
  on(signal: ProcessSignal, handler: () => void | Promise<void>): void {
    process.on(signal, () => {
      void handler();
    });
  }
}
