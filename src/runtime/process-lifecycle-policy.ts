/**
 * Whether this process owns its signal handling.
 * Tests share the vitest worker process and must not install handlers.
 */
export type ProcessLifecyclePolicy =
  | { readonly kind: 'install_signal_handlers' }
  | { readonly kind: 'no_signal_handlers' };
