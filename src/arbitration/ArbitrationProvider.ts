/**
 * Arbitration Provider
 * Boundary to the external reasoning service that settles ambiguous axes.
 * "Arbitration disabled" is a provider of its own rather than a missing one.
 */

import { ArbitrationError } from '../errors';

export interface ArbitrationProvider {
  /** Short identifier used in logs and error context */
  readonly name: string;
  /** False when the decision layer must never call arbitrate() */
  readonly available: boolean;
  /**
   * Send a prompt and return the raw text answer.
   * Rejects on transport, timeout or empty-response failures.
   */
  arbitrate(prompt: string): Promise<string>;
}

export class DisabledArbitrationProvider implements ArbitrationProvider {
  readonly name = 'disabled';
  readonly available = false;

  async arbitrate(): Promise<string> {
    throw ArbitrationError.disabled(this.name);
  }
}
