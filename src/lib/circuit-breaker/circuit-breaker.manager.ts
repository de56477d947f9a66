/**
 * Circuit Breaker Manager
 * Circuit breaker implementation using opossum library
 */

import CircuitBreakerLib from 'opossum';
import {
  CircuitBreakerConfig,
  CircuitBreakerStats,
  CircuitState,
} from './circuit-breaker.types';
import { env } from '../../config/env';

export class CircuitBreaker<TArgs extends unknown[], TResult> {
  private readonly breaker: CircuitBreakerLib<TArgs, TResult>;
  private readonly config: Required<CircuitBreakerConfig>;
  private failures: number = 0;
  private successes: number = 0;
  private rejects: number = 0;
  private totalRequests: number = 0;
  private lastFailureTime?: number;

  constructor(fn: (...args: TArgs) => Promise<TResult>, config?: CircuitBreakerConfig) {
    this.config = {
      name: config?.name ?? 'CircuitBreaker',
      timeout: config?.timeout ?? false,
      errorThresholdPercentage: config?.errorThresholdPercentage ?? env.CIRCUIT_BREAKER_ERROR_THRESHOLD,
      resetTimeout: config?.resetTimeout ?? env.CIRCUIT_BREAKER_RESET_TIMEOUT,
      monitoringPeriod: config?.monitoringPeriod ?? 60000,
      minimumRequests: config?.minimumRequests ?? env.CIRCUIT_BREAKER_MIN_REQUESTS,
      enabled: config?.enabled ?? env.CIRCUIT_BREAKER_ENABLED,
    };

    this.breaker = new CircuitBreakerLib(fn, {
      name: this.config.name,
      timeout: this.config.timeout,
      errorThresholdPercentage: this.config.errorThresholdPercentage,
      resetTimeout: this.config.resetTimeout,
      rollingCountTimeout: this.config.monitoringPeriod,
      rollingCountBuckets: 10,
      volumeThreshold: this.config.minimumRequests,
      enabled: this.config.enabled,
    });

    this.breaker.on('success', () => {
      this.successes++;
      this.totalRequests++;
    });

    this.breaker.on('failure', () => {
      this.failures++;
      this.totalRequests++;
      this.lastFailureTime = Date.now();
    });

    this.breaker.on('reject', () => {
      this.rejects++;
    });

    this.breaker.on('open', () => {
      console.warn(`Circuit ${this.config.name} opened`);
    });

    this.breaker.on('close', () => {
      console.log(`Circuit ${this.config.name} closed`);
    });
  }

  /**
   * Execute function through circuit breaker
   */
  async execute(...args: TArgs): Promise<TResult> {
    return this.breaker.fire(...args);
  }

  getState(): CircuitState {
    if (!this.config.enabled) {
      return CircuitState.CLOSED;
    }

    return this.breaker.opened ? CircuitState.OPEN :
           this.breaker.halfOpen ? CircuitState.HALF_OPEN :
           CircuitState.CLOSED;
  }

  getStats(): CircuitBreakerStats {
    const state = this.getState();
    const errorRate = this.totalRequests > 0
      ? (this.failures / this.totalRequests) * 100
      : 0;

    const nextAttempt = state === CircuitState.OPEN && this.lastFailureTime
      ? this.lastFailureTime + this.config.resetTimeout
      : undefined;

    return {
      state,
      failures: this.failures,
      successes: this.successes,
      rejects: this.rejects,
      totalRequests: this.totalRequests,
      lastFailureTime: this.lastFailureTime,
      nextAttempt,
      errorRate,
    };
  }

  /**
   * Stop timers; the breaker rejects every call afterwards
   */
  shutdown(): void {
    this.breaker.shutdown();
  }
}
