/**
 * Circuit Breaker Types
 * Type definitions for the circuit breaker system
 */

/**
 * Circuit breaker state enumeration
 */
export enum CircuitState {
  CLOSED = 'closed',      // Normal operation, requests pass through
  OPEN = 'open',          // Circuit is open, requests fail immediately
  HALF_OPEN = 'half_open', // Testing state, limited requests allowed
}

/**
 * Circuit breaker configuration
 */
export interface CircuitBreakerConfig {
  name?: string;
  timeout?: number | false;             // Per-call timeout (ms), false to leave it to the action
  errorThresholdPercentage?: number;    // Error percentage threshold (0-100)
  resetTimeout?: number;                // Time before attempting half-open (ms)
  monitoringPeriod?: number;            // Rolling window for statistics (ms)
  minimumRequests?: number;             // Minimum requests before the circuit may open
  enabled?: boolean;
}

export interface CircuitBreakerStats {
  state: CircuitState;
  failures: number;
  successes: number;
  rejects: number;
  totalRequests: number;
  lastFailureTime?: number;
  nextAttempt?: number;
  errorRate: number;
}
