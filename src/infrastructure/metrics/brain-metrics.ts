import client from 'prom-client';

export type CommandSource = 'api' | 'cli' | 'simulation';

/** What the brain and the HTTP layer report; tests can pass a no-op. */
export interface MetricsRecorder {
  recordApiRequest(endpoint: string, method: string, status: number): void;
  observeCommandLatency(endpoint: string, seconds: number): void;
  recordCommand(source: CommandSource): void;
  recordReward(action: string, rewarded: boolean): void;
}

export interface BrainMetricsOptions {
  /** Also collect Node.js process metrics into this registry. */
  readonly collectDefaults?: boolean;
}

export const LATENCY_BUCKETS = [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10];

/**
 * prom-client instruments on a registry owned by this instance, so several
 * apps (or tests) in one process never collide on metric names.
 */
export class BrainMetrics implements MetricsRecorder {
  readonly registry = new client.Registry();

  private readonly apiRequests = new client.Counter({
    name: 'vct_api_requests_total',
    help: 'Total number of HTTP requests handled by the VCT API',
    labelNames: ['endpoint', 'method', 'status'],
    registers: [this.registry],
  });

  private readonly commandLatency = new client.Histogram({
    name: 'vct_command_latency_seconds',
    help: 'Time spent handling RoboDog commands',
    labelNames: ['endpoint'],
    buckets: LATENCY_BUCKETS,
    registers: [this.registry],
  });

  private readonly commands = new client.Counter({
    name: 'vct_commands_total',
    help: 'Commands processed by the RoboDog brain',
    labelNames: ['source'],
    registers: [this.registry],
  });

  private readonly rewards = new client.Counter({
    name: 'vct_rewards_total',
    help: 'Reward actuator outcomes',
    labelNames: ['action', 'outcome'],
    registers: [this.registry],
  });

  constructor(options: BrainMetricsOptions = {}) {
    if (options.collectDefaults) {
      client.collectDefaultMetrics({ register: this.registry });
    }
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  recordApiRequest(endpoint: string, method: string, status: number): void {
    this.apiRequests.inc({ endpoint, method: method.toUpperCase(), status: String(status) });
  }

  observeCommandLatency(endpoint: string, seconds: number): void {
    this.commandLatency.observe({ endpoint }, seconds);
  }

  recordCommand(source: CommandSource): void {
    this.commands.inc({ source });
  }

  recordReward(action: string, rewarded: boolean): void {
    this.rewards.inc({ action: action || 'UNKNOWN', outcome: rewarded ? 'rewarded' : 'skipped' });
  }

  render(): Promise<string> {
    return this.registry.metrics();
  }
}

export const noopMetrics: MetricsRecorder = {
  recordApiRequest: () => undefined,
  observeCommandLatency: () => undefined,
  recordCommand: () => undefined,
  recordReward: () => undefined,
};
