import { getErrorMessage } from '../../lib/errors';
import { logger } from '../../lib/logger';
import { withTimeout } from '../../lib/with-timeout';

/**
 * Circuit Breaker
 *
 * Fails fast while a narrative provider is down and probes it again
 * after a cool-down.
 *
 * States:
 * - CLOSED: calls pass through
 * - OPEN: calls are rejected immediately
 * - HALF_OPEN: a limited number of trial calls decide between the two
 */

// ============================================================================
// 1. Types
// ============================================================================

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerConfig {
  /** Consecutive failures that open the circuit */
  failureThreshold: number;
  /** Successes in HALF_OPEN needed to close it again */
  successThreshold: number;
  /** Time spent OPEN before the next trial call (ms) */
  openDuration: number;
  /** Per-call deadline (ms) */
  timeout: number;
  name: string;
}

export interface CircuitStats {
  state: CircuitState;
  /** Consecutive failures since the last success */
  failures: number;
  /** Successful trial calls in the current HALF_OPEN window */
  successes: number;
  totalCalls: number;
  totalFailures: number;
}

export class CircuitOpenError extends Error {
  readonly retryAfter: number;

  constructor(message: string, retryAfter: number) {
    super(message);
    this.name = 'CircuitOpenError';
    this.retryAfter = retryAfter;
  }
}

type Phase =
  | { state: 'CLOSED' }
  | { state: 'OPEN'; reopensAt: number }
  | { state: 'HALF_OPEN'; successes: number };

// ============================================================================
// 2. Circuit Breaker
// ============================================================================

export class CircuitBreaker {
  private phase: Phase = { state: 'CLOSED' };
  private failures = 0;
  private totalCalls = 0;
  private totalFailures = 0;
  private readonly config: CircuitBreakerConfig;

  constructor(config: Partial<CircuitBreakerConfig> & { name: string }) {
    this.config = {
      failureThreshold: 3,
      successThreshold: 1,
      openDuration: 30_000,
      // narrative calls are capped well below the HTTP request budget
      timeout: 45_000,
      ...config,
    };
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    const phase = this.currentPhase();
    if (phase.state === 'OPEN') {
      const retryAfter = Math.max(0, phase.reopensAt - Date.now());
      throw new CircuitOpenError(`Circuit breaker ${this.config.name} is OPEN. Retry in ${retryAfter}ms`, retryAfter);
    }

    this.totalCalls++;
    let result: T;
    try {
      result = await withTimeout(
        fn(),
        this.config.timeout,
        `${this.config.name} call timed out after ${this.config.timeout}ms`
      );
    } catch (error) {
      this.recordFailure(error);
      throw error;
    }
    this.recordSuccess();
    return result;
  }

  isAllowed(): boolean {
    return this.currentPhase().state !== 'OPEN';
  }

  getStats(): CircuitStats {
    const phase = this.currentPhase();
    return {
      state: phase.state,
      failures: this.failures,
      successes: phase.state === 'HALF_OPEN' ? phase.successes : 0,
      totalCalls: this.totalCalls,
      totalFailures: this.totalFailures,
    };
  }

  /** OPEN lapses into HALF_OPEN once its cool-down has passed */
  private currentPhase(): Phase {
    if (this.phase.state === 'OPEN' && Date.now() >= this.phase.reopensAt) {
      this.enter({ state: 'HALF_OPEN', successes: 0 });
    }
    return this.phase;
  }

  private recordSuccess(): void {
    this.failures = 0;
    if (this.phase.state !== 'HALF_OPEN') return;

    const successes = this.phase.successes + 1;
    this.enter(successes >= this.config.successThreshold ? { state: 'CLOSED' } : { state: 'HALF_OPEN', successes });
  }

  private recordFailure(error: unknown): void {
    this.failures++;
    this.totalFailures++;
    logger.warn(
      `[CircuitBreaker:${this.config.name}] Failure ${this.failures}/${this.config.failureThreshold}: ${getErrorMessage(error)}`
    );

    if (this.phase.state === 'HALF_OPEN' || this.failures >= this.config.failureThreshold) {
      this.enter({ state: 'OPEN', reopensAt: Date.now() + this.config.openDuration });
    }
  }

  private enter(next: Phase): void {
    if (next.state !== this.phase.state) {
      logger.info(`[CircuitBreaker:${this.config.name}] ${this.phase.state} → ${next.state}`);
    }
    this.phase = next;
  }
}

// ============================================================================
// 3. Provider registry
// ============================================================================

const circuitBreakers = new Map<string, CircuitBreaker>();

export function getCircuitBreaker(provider: string, config?: Partial<CircuitBreakerConfig>): CircuitBreaker {
  let breaker = circuitBreakers.get(provider);
  if (!breaker) {
    breaker = new CircuitBreaker({ name: provider, ...config });
    circuitBreakers.set(provider, breaker);
  }
  return breaker;
}

export function getAllCircuitStats(): Record<string, CircuitStats> {
  const stats: Record<string, CircuitStats> = {};
  circuitBreakers.forEach((breaker, name) => {
    stats[name] = breaker.getStats();
  });
  return stats;
}

/** Drops every registered breaker; the next lookup starts CLOSED */
export function resetAllCircuitBreakers(): void {
  circuitBreakers.clear();
}
