/**
 * Operating mode of the running service.
 *
 * `simulate` fulfils every request in-process (console speech, rule-based
 * recognition, simulated treat dispenser). `live` talks to the real speech API
 * and dispenser controller.
 *
 * The mode is resolved once by the composition root and injected as an
 * immutable value. Nothing below the composition root reads `VCT_SIMULATE`.
 */

export type OperatingMode = { readonly kind: 'simulate' } | { readonly kind: 'live' };

export const SIMULATE_MODE: OperatingMode = Object.freeze({ kind: 'simulate' });
export const LIVE_MODE: OperatingMode = Object.freeze({ kind: 'live' });

export const SIMULATE_FLAG = 'VCT_SIMULATE';

const TRUTHY = new Set(['1', 'true', 'yes']);
const FALSY = new Set(['0', 'false', 'no', '']);

export type EnvSnapshot = Readonly<Record<string, string | undefined>>;

/** How the raw flag value was classified. */
export type ModeFlagReading =
  | { readonly kind: 'unset' }
  | { readonly kind: 'truthy'; readonly raw: string }
  | { readonly kind: 'falsy'; readonly raw: string }
  | { readonly kind: 'unrecognized'; readonly raw: string };

/**
 * Receiver for the structured notices emitted during resolution.
 * A pino logger satisfies it.
 */
export interface ModeNoticeSink {
  info(obj: object, msg: string): void;
  warn(obj: object, msg: string): void;
}

export interface ResolveModeOptions {
  /** Mode used when the flag is absent. Simulate must be opted into, so this is live unless overridden. */
  readonly defaultMode?: OperatingMode;
  readonly notices?: ModeNoticeSink;
}

export function readModeFlag(env: EnvSnapshot): ModeFlagReading {
  const raw = env[SIMULATE_FLAG];
  if (raw === undefined) return { kind: 'unset' };

  const normalized = raw.trim().toLowerCase();
  if (TRUTHY.has(normalized)) return { kind: 'truthy', raw };
  if (FALSY.has(normalized)) return { kind: 'falsy', raw };
  return { kind: 'unrecognized', raw };
}

export function resolveOperatingMode(env: EnvSnapshot, options: ResolveModeOptions = {}): OperatingMode {
  const reading = readModeFlag(env);
  const mode = modeFor(reading, options.defaultMode ?? LIVE_MODE);

  if (reading.kind === 'unrecognized') {
    options.notices?.warn(
      { flag: SIMULATE_FLAG, value: reading.raw, resolved: mode.kind },
      `Unrecognized ${SIMULATE_FLAG} value; falling back to ${mode.kind} mode`
    );
  }
  options.notices?.info({ flag: SIMULATE_FLAG, resolved: mode.kind }, `Operating mode resolved: ${mode.kind}`);

  return mode;
}

function modeFor(reading: ModeFlagReading, defaultMode: OperatingMode): OperatingMode {
  switch (reading.kind) {
    case 'unset':
      return defaultMode;
    case 'truthy':
      return SIMULATE_MODE;
    case 'falsy':
    case 'unrecognized':
      return LIVE_MODE;
  }
}

export function isSimulate(mode: OperatingMode): boolean {
  return mode.kind === 'simulate';
}
