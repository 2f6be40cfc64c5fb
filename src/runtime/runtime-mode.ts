/**
 * Which composition root started the process.
 *
 * Decides process-level policies (signal handlers, how termination happens).
 * It is unrelated to the simulate/live `OperatingMode`, which decides how
 * requests are fulfilled.
 */
export type RuntimeMode =
  | { readonly kind: 'server' }
  | { readonly kind: 'cli' }
  | { readonly kind: 'test' };
