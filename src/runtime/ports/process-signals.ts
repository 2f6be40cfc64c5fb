/**
 * Port over `process.on(signal)`, so services can ask for shutdown hooks
 * without touching the global process object.
 */
export type ProcessSignal = 'SIGINT' | 'SIGTERM' | 'SIGHUP';

export interface ProcessSignals {
  on(signal: ProcessSignal, handler: () => void | Promise<void>): void;
}
