/**
 * Pipeline Configuration
 *
 * Chooses the queue, store and notifier adapters and tunes the workers that
 * consume the ticket queue.
 *
 * @example
 * ```typescript
 * constructor(
 *   @Inject(pipelineConfig.KEY)
 *   private readonly config: ConfigType<typeof pipelineConfig>,
 * ) {}
 * ```
 */
import { registerAs } from '@nestjs/config';

export const QUEUE_DRIVERS = ['memory', 'bullmq'] as const;
export const STORE_DRIVERS = ['memory', 'typeorm'] as const;
export const NOTIFIER_DRIVERS = ['log', 'mail'] as const;

export type QueueDriver = (typeof QUEUE_DRIVERS)[number];
export type StoreDriver = (typeof STORE_DRIVERS)[number];
export type NotifierDriver = (typeof NOTIFIER_DRIVERS)[number];

/** Injection token for the drivers the application was composed with */
export const PIPELINE_DRIVERS = 'PIPELINE_DRIVERS';

export interface PipelineDrivers {
  queue: QueueDriver;
  store: StoreDriver;
  notifier: NotifierDriver;
}

export interface PipelineConfig {
  /** Time an unacknowledged delivery stays invisible before it is redelivered */
  visibilityTimeoutMs: number;
  /** Deliveries per draft before it is parked as a dead letter */
  maxAttempts: number;
  /** Concurrent consumer loops per process */
  workerConcurrency: number;
}

function pickDriver<T extends string>(name: string, value: string | undefined, allowed: readonly T[], fallback: T): T {
  if (value === undefined || value === '') {
    return fallback;
  }
  const match = allowed.find((candidate) => candidate === value.toLowerCase());
  if (!match) {
    throw new Error(`${name} must be one of ${allowed.join(', ')} (got "${value}")`);
  }
  return match;
}

/**
 * Resolves the adapters for the composition root. Drivers decide which
 * modules get imported, so they are read before the Nest container exists,
 * once the environment file has been loaded.
 */
export function resolvePipelineDrivers(env: Record<string, string | undefined>): PipelineDrivers {
  return {
    queue: pickDriver('QUEUE_DRIVER', env.QUEUE_DRIVER, QUEUE_DRIVERS, 'memory'),
    store: pickDriver('STORE_DRIVER', env.STORE_DRIVER, STORE_DRIVERS, 'memory'),
    notifier: pickDriver('NOTIFIER_DRIVER', env.NOTIFIER_DRIVER, NOTIFIER_DRIVERS, 'log'),
  };
}

export default registerAs(
  'pipeline',
  (): PipelineConfig => ({
    visibilityTimeoutMs: parseInt(process.env.QUEUE_VISIBILITY_TIMEOUT_MS || '30000', 10),
    maxAttempts: parseInt(process.env.QUEUE_MAX_ATTEMPTS || '5', 10),
    workerConcurrency: parseInt(process.env.TICKET_WORKER_CONCURRENCY || '2', 10),
  }),
);
