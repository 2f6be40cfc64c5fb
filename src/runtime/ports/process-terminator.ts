/**
 * Port for ending the process. Only entry points call it.
 */
export type ExitCode =
  | { readonly kind: 'success' }
  | { readonly kind: 'failure' }
  | { readonly kind: 'misuse' };

export interface ProcessTerminator {
  terminate(code: ExitCode): never;
}
