/**
 * =============================================================================
 * CIRCUIT BREAKER - Geocoding provider protection
 * =============================================================================
 *
 * Stops calling a geocoding provider that keeps failing (network errors,
 * timeouts, 5xx) so address lookups fall through to the next provider fast
 * instead of waiting on a dead one.
 *
 * STATES:
 * - CLOSED: Normal operation, calls pass through
 * - OPEN: Provider is failing, calls are rejected immediately
 * - HALF_OPEN: Probing whether the provider has recovered
 *
 * "Not found" and "rate limited" answers are results, not failures; only
 * thrown errors move the breaker.
 *
 * USAGE:
 * ```typescript
 * const breaker = circuitBreakerRegistry.getOrCreate({ name: 'geocoder:google', failureThreshold: 3 });
 * const result = await breaker.execute(() => provider.geocode(query));
 * ```
 * =============================================================================
 */

import { logger } from '../services/logger.service';

export enum CircuitState {
  CLOSED = 'CLOSED',
  OPEN = 'OPEN',
  HALF_OPEN = 'HALF_OPEN'
}

export interface CircuitBreakerOptions {
  /** Name for logging and the status endpoint */
  name: string;
  /** Consecutive failures before opening */
  failureThreshold?: number;
  /** Successes in half-open needed to close */
  successThreshold?: number;
  /** Time to stay open before probing (ms) */
  resetTimeout?: number;
  /** Timeout for an individual call (ms); 0 leaves timing to the wrapped call */
  requestTimeout?: number;
  /** Decide whether a thrown error counts against the provider */
  isFailure?: (error: Error) => boolean;
  onStateChange?: (from: CircuitState, to: CircuitState) => void;
}

type ResolvedOptions = Required<Omit<CircuitBreakerOptions, 'onStateChange' | 'isFailure'>> &
  Pick<CircuitBreakerOptions, 'onStateChange' | 'isFailure'>;

const DEFAULT_OPTIONS = {
  failureThreshold: 5,
  successThreshold: 2,
  resetTimeout: 30000,
  requestTimeout: 10000
};

export class CircuitOpenError extends Error {
  constructor(public circuitName: string) {
    super(`Circuit breaker '${circuitName}' is OPEN - service unavailable`);
    this.name = 'CircuitOpenError';
  }
}

export class CircuitTimeoutError extends Error {
  constructor(public circuitName: string, public timeout: number) {
    super(`Circuit breaker '${circuitName}' request timed out after ${timeout}ms`);
    this.name = 'CircuitTimeoutError';
  }
}

export interface CircuitStats {
  name: string;
  state: CircuitState;
  failures: number;
  successes: number;
  lastFailureTime: number | null;
  nextAttemptTime: number | null;
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failures = 0;
  private successes = 0;
  private lastFailureTime = 0;
  private nextAttemptTime = 0;
  private readonly options: ResolvedOptions;

  constructor(options: CircuitBreakerOptions) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  get name(): string {
    return this.options.name;
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === CircuitState.OPEN) {
      if (Date.now() >= this.nextAttemptTime) {
        this.transitionTo(CircuitState.HALF_OPEN);
      } else {
        throw new CircuitOpenError(this.options.name);
      }
    }

    try {
      const result = await this.executeWithTimeout(fn);
      this.recordSuccess();
      return result;
    } catch (error) {
      this.recordFailure(toError(error));
      throw error;
    }
  }

  private executeWithTimeout<T>(fn: () => Promise<T>): Promise<T> {
    if (this.options.requestTimeout <= 0) {
      return fn();
    }

    return new Promise<T>((resolve, reject) => {
      const timeoutId = setTimeout(() => {
        reject(new CircuitTimeoutError(this.options.name, this.options.requestTimeout));
      }, this.options.requestTimeout);

      fn()
        .then((result) => {
          clearTimeout(timeoutId);
          resolve(result);
        })
        .catch((error: unknown) => {
          clearTimeout(timeoutId);
          reject(toError(error));
        });
    });
  }

  private recordSuccess(): void {
    this.failures = 0;
    this.successes++;

    if (this.state === CircuitState.HALF_OPEN && this.successes >= this.options.successThreshold) {
      this.transitionTo(CircuitState.CLOSED);
    }
  }

  private recordFailure(error: Error): void {
    if (this.options.isFailure && !this.options.isFailure(error)) {
      return;
    }

    this.successes = 0;
    this.failures++;
    this.lastFailureTime = Date.now();

    logger.warn(`Circuit '${this.options.name}' failure ${this.failures}/${this.options.failureThreshold}`, {
      error: error.message
    });

    if (this.state === CircuitState.HALF_OPEN) {
      // Any failure while probing reopens immediately
      this.transitionTo(CircuitState.OPEN);
    } else if (this.state === CircuitState.CLOSED && this.failures >= this.options.failureThreshold) {
      this.transitionTo(CircuitState.OPEN);
    }
  }

  private transitionTo(newState: CircuitState): void {
    const oldState = this.state;
    this.state = newState;

    logger.info(`Circuit '${this.options.name}' state change: ${oldState} -> ${newState}`);

    if (newState === CircuitState.OPEN) {
      this.nextAttemptTime = Date.now() + this.options.resetTimeout;
    } else if (newState === CircuitState.CLOSED) {
      this.failures = 0;
      this.successes = 0;
    } else {
      this.successes = 0;
    }

    this.options.onStateChange?.(oldState, newState);
  }

  getState(): CircuitState {
    return this.state;
  }

  getStats(): CircuitStats {
    return {
      name: this.options.name,
      state: this.state,
      failures: this.failures,
      successes: this.successes,
      lastFailureTime: this.lastFailureTime || null,
      nextAttemptTime: this.state === CircuitState.OPEN ? this.nextAttemptTime : null
    };
  }

  reset(): void {
    this.transitionTo(CircuitState.CLOSED);
  }

  /** Force the circuit open (maintenance, tests) */
  trip(): void {
    this.transitionTo(CircuitState.OPEN);
  }
}

// =============================================================================
// CIRCUIT BREAKER REGISTRY
// =============================================================================

class CircuitBreakerRegistry {
  private breakers: Map<string, CircuitBreaker> = new Map();

  /**
   * Return the breaker registered under options.name, creating it on first use
   */
  getOrCreate(options: CircuitBreakerOptions): CircuitBreaker {
    const existing = this.breakers.get(options.name);
    if (existing) return existing;

    const breaker = new CircuitBreaker(options);
    this.breakers.set(options.name, breaker);
    logger.info(`Circuit breaker '${options.name}' initialized`);
    return breaker;
  }

  get(name: string): CircuitBreaker | undefined {
    return this.breakers.get(name);
  }

  getAllStats(): CircuitStats[] {
    return Array.from(this.breakers.values()).map(b => b.getStats());
  }

  resetAll(): void {
    for (const breaker of this.breakers.values()) {
      breaker.reset();
    }
  }
}

export const circuitBreakerRegistry = new CircuitBreakerRegistry();
