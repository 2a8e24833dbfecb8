/**
 * Provider Circuit Breaker
 *
 * Tracks consecutive failures per provider. Once a provider reaches the
 * failure threshold its circuit opens and it is skipped until the cooldown
 * elapses; the circuit then half-opens and lets one probe request through.
 *
 *   CLOSED    → all requests pass through
 *   OPEN      → skipped until cooldown expires
 *   HALF_OPEN → one probe allowed
 */

import { logger } from '../utils';

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

interface ProviderCircuit {
  state: CircuitState;
  failures: number;
  lastFailure: number;
}

export interface CircuitBreakerOptions {
  failureThreshold?: number;
  cooldownMs?: number;
  now?: () => number;
}

const DEFAULT_FAILURE_THRESHOLD = 5;
const DEFAULT_COOLDOWN_MS = 60_000;

export class ProviderCircuitBreaker {
  private circuits: Map<string, ProviderCircuit> = new Map();
  private failureThreshold: number;
  private cooldownMs: number;
  private now: () => number;

  constructor(opts?: CircuitBreakerOptions) {
    this.failureThreshold = opts?.failureThreshold ?? DEFAULT_FAILURE_THRESHOLD;
    this.cooldownMs = opts?.cooldownMs ?? DEFAULT_COOLDOWN_MS;
    this.now = opts?.now ?? Date.now;
  }

  /**
   * False only while the circuit is OPEN and cooling down.
   */
  isAvailable(provider: string): boolean {
    const circuit = this.circuits.get(provider);
    if (!circuit || circuit.state !== 'OPEN') {
      return true;
    }

    if (this.now() - circuit.lastFailure >= this.cooldownMs) {
      circuit.state = 'HALF_OPEN';
      return true;
    }
    return false;
  }

  recordSuccess(provider: string): void {
    const circuit = this.circuits.get(provider);
    if (circuit) {
      circuit.state = 'CLOSED';
      circuit.failures = 0;
    }
  }

  recordFailure(provider: string): void {
    let circuit = this.circuits.get(provider);
    if (!circuit) {
      circuit = { state: 'CLOSED', failures: 0, lastFailure: 0 };
      this.circuits.set(provider, circuit);
    }

    circuit.failures++;
    circuit.lastFailure = this.now();

    // A failed half-open probe reopens immediately.
    if (circuit.state === 'HALF_OPEN' || circuit.failures >= this.failureThreshold) {
      if (circuit.state !== 'OPEN') {
        logger.warn(
          `Provider '${provider}' disabled after ${circuit.failures} consecutive failures; retrying in ${Math.round(this.cooldownMs / 1000)}s`
        );
      }
      circuit.state = 'OPEN';
    }
  }

  getState(provider: string): CircuitState {
    return this.circuits.get(provider)?.state ?? 'CLOSED';
  }

  reset(provider: string): void {
    this.circuits.delete(provider);
  }

  getOpenCircuits(): string[] {
    const open: string[] = [];
    for (const [name, circuit] of this.circuits) {
      if (circuit.state === 'OPEN' && this.now() - circuit.lastFailure < this.cooldownMs) {
        open.push(name);
      }
    }
    return open;
  }
}
