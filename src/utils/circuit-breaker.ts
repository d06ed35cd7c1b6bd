import { logger } from './logger.js';

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerOptions {
  name: string;
  /** Consecutive failures before the circuit opens (default: 5) */
  failureThreshold?: number;
  /** Time the circuit stays open before a trial call is let through, in ms (default: 60000) */
  resetTimeout?: number;
  /** Successful trial calls needed to close the circuit again (default: 1) */
  halfOpenSuccessThreshold?: number;
}

export class CircuitOpenError extends Error {
  constructor(
    public readonly circuitName: string,
    public readonly retryInMs: number
  ) {
    super(`Circuit breaker ${circuitName} is OPEN. Retry in ${Math.ceil(retryInMs / 1000)}s`);
    this.name = 'CircuitOpenError';
  }
}

/**
 * Circuit breaker around a shared external service.
 *
 * States:
 * - CLOSED: calls pass through
 * - OPEN: calls are rejected with CircuitOpenError until resetTimeout elapses
 * - HALF_OPEN: trial calls pass through; one failure reopens the circuit
 *
 * `shouldCount` lets callers exclude failures that say nothing about the
 * service's health (e.g. a page the service answered but could not solve).
 */
export class CircuitBreaker {
  private state: CircuitState = 'CLOSED';
  private failureCount = 0;
  private halfOpenSuccesses = 0;
  private openedAt: number | null = null;

  private readonly name: string;
  private readonly failureThreshold: number;
  private readonly resetTimeout: number;
  private readonly halfOpenSuccessThreshold: number;

  constructor(options: CircuitBreakerOptions) {
    this.name = options.name;
    this.failureThreshold = options.failureThreshold ?? 5;
    this.resetTimeout = options.resetTimeout ?? 60000;
    this.halfOpenSuccessThreshold = options.halfOpenSuccessThreshold ?? 1;
  }

  async execute<T>(
    fn: () => Promise<T>,
    shouldCount: (error: unknown) => boolean = () => true
  ): Promise<T> {
    if (this.state === 'OPEN') {
      const elapsed = Date.now() - (this.openedAt ?? 0);
      if (elapsed < this.resetTimeout) {
        throw new CircuitOpenError(this.name, this.resetTimeout - elapsed);
      }

      logger.info(`Circuit breaker ${this.name} transitioning to HALF_OPEN`, { elapsedMs: elapsed });
      this.state = 'HALF_OPEN';
      this.halfOpenSuccesses = 0;
    }

    try {
      const result = await fn();
      this.recordSuccess();
      return result;
    } catch (error) {
      if (shouldCount(error)) {
        this.recordFailure();
      }
      throw error;
    }
  }

  getState(): CircuitState {
    return this.state;
  }

  getFailureCount(): number {
    return this.failureCount;
  }

  reset(): void {
    this.state = 'CLOSED';
    this.failureCount = 0;
    this.halfOpenSuccesses = 0;
    this.openedAt = null;
  }

  private recordSuccess(): void {
    this.failureCount = 0;

    if (this.state === 'HALF_OPEN') {
      this.halfOpenSuccesses++;
      if (this.halfOpenSuccesses >= this.halfOpenSuccessThreshold) {
        logger.info(`Circuit breaker ${this.name} transitioning to CLOSED`);
        this.state = 'CLOSED';
        this.halfOpenSuccesses = 0;
      }
    }
  }

  private recordFailure(): void {
    this.failureCount++;

    if (this.state === 'HALF_OPEN' || this.failureCount >= this.failureThreshold) {
      logger.error(`Circuit breaker ${this.name} opening`, {
        failureCount: this.failureCount,
        threshold: this.failureThreshold,
        previousState: this.state,
      });
      this.state = 'OPEN';
      this.openedAt = Date.now();
      this.halfOpenSuccesses = 0;
    } else {
      logger.warn(`Circuit breaker ${this.name} failure`, {
        failureCount: this.failureCount,
        threshold: this.failureThreshold,
      });
    }
  }
}
