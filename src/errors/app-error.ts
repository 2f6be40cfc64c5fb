import type { Brand } from '../runtime/brand.js';

export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

export type ConfigInvalidError = Readonly<{
  readonly _tag: 'ConfigInvalid';
  readonly source: string;
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}>;

/**
 * The process cannot serve. `phase` names the startup step that failed
 * (`settings`, `live-prerequisites`, `listen`) and `missing` lists absent
 * prerequisites when that is the reason.
 */
export type StartupFailedError = Readonly<{
  readonly _tag: 'StartupFailed';
  readonly phase: string;
  readonly message: string;
  readonly missing?: readonly string[];
  readonly cause?: unknown;
}>;

export type UnexpectedError = Readonly<{
  readonly _tag: 'Unexpected';
  readonly message: string;
  readonly cause: unknown;
}>;

export type AppError = ConfigInvalidError | StartupFailedError | UnexpectedError;

/** Marks configuration that went through `loadConfig`. */
export type ValidatedAppConfig<T> = Brand<T, 'ValidatedAppConfig'>;
