import type { ProcessSignal } from './process-signals.js';

export type ShutdownEvent = { readonly kind: 'shutdown_requested'; readonly signal: ProcessSignal };

export type Unsubscribe = () => void;

/**
 * Typed "please shut down" bus. Signal handlers emit, the entry point listens
 * and decides how to stop the HTTP listener and exit.
 */
export interface ShutdownEvents {
  onShutdown(listener: (event: ShutdownEvent) => void): Unsubscribe;
  emit(event: ShutdownEvent): void;
}
