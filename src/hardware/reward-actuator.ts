import { ResultAsync } from 'neverthrow';
import type { Logger } from '../core/logging/index.js';
import type { Clock } from '../runtime/ports/clock.js';
import type { FetchLike, HttpCallError } from '../infrastructure/http/fetch-client.js';
import { fetchChecked } from '../infrastructure/http/fetch-client.js';

export type ActuatorError = { readonly code: 'ACTUATOR_UNAVAILABLE'; readonly message: string; readonly cause: HttpCallError };

/** Treat dispenser. `seconds` is how long the dispenser stays open. */
export interface RewardActuator {
  readonly name: string;
  trigger(seconds: number): ResultAsync<void, ActuatorError>;
}

const SIMULATED_MAX_WAIT_MS = 50;

export class SimulatedActuator implements RewardActuator {
  readonly name = 'simulated';

  constructor(
    private readonly logger: Logger,
    private readonly clock: Clock
  ) {}

  trigger(seconds: number): ResultAsync<void, ActuatorError> {
    this.logger.info({ seconds }, `[REWARD] Simulated dispenser ${seconds.toFixed(2)}s`);
    return ResultAsync.fromSafePromise(this.clock.sleep(Math.min(seconds * 1000, SIMULATED_MAX_WAIT_MS)));
  }
}

export interface HttpActuatorConfig {
  readonly baseUrl: string;
  readonly apiKey?: string;
  readonly timeoutMs?: number;
}

/** Dispenser controller reachable over HTTP: `POST <baseUrl>/trigger { seconds }`. */
export class HttpRewardActuator implements RewardActuator {
  readonly name = 'http';

  constructor(
    private readonly config: HttpActuatorConfig,
    private readonly fetchFn: FetchLike
  ) {}

  trigger(seconds: number): ResultAsync<void, ActuatorError> {
    return fetchChecked(
      this.fetchFn,
      `${this.config.baseUrl}/trigger`,
      {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          ...(this.config.apiKey ? { Authorization: `Bearer ${this.config.apiKey}` } : {}),
        },
        body: JSON.stringify({ seconds }),
      },
      { timeoutMs: this.config.timeoutMs ?? 5_000 }
    )
      .map(() => undefined)
      .mapErr((cause): ActuatorError => ({
        code: 'ACTUATOR_UNAVAILABLE',
        message: `Reward actuator did not respond: ${cause.message}`,
        cause,
      }));
  }
}
