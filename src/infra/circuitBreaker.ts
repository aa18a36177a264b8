/**
 * Circuit breaker isolating the gateway from misbehaving worker instances. One
 * breaker exists per instance; it tracks the failure streak of invocations and
 * exposes the closed → open → half-open state machine used by the router.
 */
export type CircuitBreakerState = "closed" | "open" | "half-open";

/** Snapshot describing the breaker internals for diagnostics and tests. */
export interface CircuitBreakerSnapshot {
  state: CircuitBreakerState;
  consecutiveFailures: number;
  openedAt: number | null;
  retryAt: number | null;
  trialReserved: boolean;
  /** Incremented every time the breaker opens. */
  generation: number;
}

/**
 * Ticket returned by {@link CircuitBreaker.tryAcquire}. Exactly one of
 * `succeed()`, `fail()` or `release()` takes effect; later calls are ignored.
 * Outcomes of a ticket granted before the breaker last opened are not counted.
 */
export interface CircuitBreakerAttempt {
  allowed: boolean;
  state: CircuitBreakerState;
  retryAt: number | null;
  /** Breaker generation the ticket was granted in. */
  generation: number;
  succeed(): void;
  fail(): void;
  /** Gives the permit back without recording an outcome (caller cancelled). */
  release(): void;
}

export interface CircuitBreakerOptions {
  /** Consecutive failed invocations that open the breaker. */
  failureThreshold: number;
  /** Delay between opening and admitting the half-open trial. */
  recoveryMs: number;
  now?: () => number;
}

function requirePositive(value: number, name: string): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new TypeError(`${name} must be a positive number`);
  }
  return Math.trunc(value);
}

function requireNonNegative(value: number, name: string): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new TypeError(`${name} must be a non-negative number`);
  }
  return Math.trunc(value);
}

function deniedAttempt(state: CircuitBreakerState, retryAt: number | null, generation: number): CircuitBreakerAttempt {
  const ignore = (): void => {};
  return { allowed: false, state, retryAt, generation, succeed: ignore, fail: ignore, release: ignore };
}

export class CircuitBreaker {
  private readonly failureThreshold: number;
  private readonly recoveryMs: number;
  private readonly now: () => number;

  private state: CircuitBreakerState = "closed";
  private consecutiveFailures = 0;
  private openedAt: number | null = null;
  private retryAt: number | null = null;
  private trialReserved = false;
  private generation = 0;

  constructor(options: CircuitBreakerOptions) {
    this.failureThreshold = requirePositive(options.failureThreshold, "failureThreshold");
    this.recoveryMs = requireNonNegative(options.recoveryMs, "recoveryMs");
    this.now = options.now ?? Date.now;
  }

  /** Returns the current breaker state, promoting open → half-open when due. */
  public currentState(now: number = this.now()): CircuitBreakerState {
    this.refreshState(now);
    return this.state;
  }

  public snapshot(): CircuitBreakerSnapshot {
    return {
      state: this.state,
      consecutiveFailures: this.consecutiveFailures,
      openedAt: this.openedAt,
      retryAt: this.retryAt,
      trialReserved: this.trialReserved,
      generation: this.generation,
    };
  }

  /**
   * Attempts to reserve a slot. The check and the reservation of the half-open
   * trial happen in the same synchronous step, so two concurrent callers can
   * never both obtain the trial.
   */
  public tryAcquire(now: number = this.now()): CircuitBreakerAttempt {
    this.refreshState(now);

    if (this.state === "open" || (this.state === "half-open" && this.trialReserved)) {
      return deniedAttempt(this.state, this.retryAt, this.generation);
    }

    const origin = this.state;
    const generation = this.generation;
    if (origin === "half-open") {
      this.trialReserved = true;
    }

    let settled = false;
    const settle = (outcome: "success" | "failure" | "release"): void => {
      if (settled) {
        return;
      }
      settled = true;
      if (generation !== this.generation) {
        // Granted before the breaker last opened: the outcome is stale.
        return;
      }
      if (origin === "half-open") {
        this.trialReserved = false;
      }
      if (outcome === "success") {
        this.close();
      } else if (outcome === "failure") {
        this.registerFailure(this.now());
      }
    };

    return {
      allowed: true,
      state: origin,
      retryAt: this.retryAt,
      generation,
      succeed: () => settle("success"),
      fail: () => settle("failure"),
      release: () => settle("release"),
    };
  }

  private close(): void {
    this.state = "closed";
    this.consecutiveFailures = 0;
    this.openedAt = null;
    this.retryAt = null;
    this.trialReserved = false;
  }

  private registerFailure(at: number): void {
    if (this.state === "half-open") {
      this.open(at);
      return;
    }
    this.consecutiveFailures += 1;
    if (this.consecutiveFailures >= this.failureThreshold) {
      this.open(at);
    }
  }

  private refreshState(now: number): void {
    if (this.state === "open" && this.retryAt !== null && now >= this.retryAt) {
      this.state = "half-open";
      this.trialReserved = false;
    }
  }

  private open(at: number): void {
    this.state = "open";
    this.generation += 1;
    this.openedAt = at;
    this.retryAt = at + this.recoveryMs;
    this.trialReserved = false;
    this.consecutiveFailures = Math.max(this.consecutiveFailures, this.failureThreshold);
  }
}

/**
 * Registry storing one breaker per worker instance. Every breaker shares the
 * same configuration.
 */
export class CircuitBreakerRegistry {
  private readonly options: CircuitBreakerOptions;
  private readonly breakers = new Map<string, CircuitBreaker>();

  constructor(options: CircuitBreakerOptions) {
    this.options = options;
  }

  /** Drops the breaker of a purged instance. */
  public forget(key: string): void {
    this.breakers.delete(key);
  }

  public snapshot(key: string): CircuitBreakerSnapshot {
    return this.getBreaker(key).snapshot();
  }

  /** Returns the state of a breaker without creating one for unknown keys. */
  public stateOf(key: string, now?: number): CircuitBreakerState {
    return this.breakers.get(key)?.currentState(now) ?? "closed";
  }

  public tryAcquire(key: string, now?: number): CircuitBreakerAttempt {
    return this.getBreaker(key).tryAcquire(now);
  }

  private getBreaker(key: string): CircuitBreaker {
    let breaker = this.breakers.get(key);
    if (!breaker) {
      breaker = new CircuitBreaker(this.options);
      this.breakers.set(key, breaker);
    }
    return breaker;
  }
}
