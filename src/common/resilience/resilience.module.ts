import { DynamicModule, Global, Module } from '@nestjs/common';
import CircuitBreaker from 'opossum';

/** A unit of outbound I/O run through a breaker. */
export type GuardedCall = () => Promise<unknown>;

export type CallBreaker = CircuitBreaker<[GuardedCall], unknown>;

export interface CircuitBreakerOptions extends CircuitBreaker.Options {
  name: string;
}

export function circuitBreakerToken(name: string): string {
  return `CIRCUIT_BREAKER_${name.toUpperCase()}`;
}

export function createCallBreaker(options: CircuitBreakerOptions): CallBreaker {
  const { name, ...breakerOptions } = options;
  return new CircuitBreaker<[GuardedCall], unknown>(async (call: GuardedCall) => call(), {
    ...breakerOptions,
    name,
    errorThresholdPercentage: breakerOptions.errorThresholdPercentage || 50,
    resetTimeout: breakerOptions.resetTimeout || 30000,
  });
}

@Global()
@Module({})
export class ResilienceModule {
  static forRoot(options: CircuitBreakerOptions[]): DynamicModule {
    const providers = options.map((opt) => ({
      provide: circuitBreakerToken(opt.name),
      useFactory: () => createCallBreaker(opt),
    }));

    return {
      module: ResilienceModule,
      providers,
      exports: providers.map((p) => p.provide),
    };
  }
}
