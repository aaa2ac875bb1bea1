import type { RedactionEngine } from './engine.js';
import type { RedactionUnit, SanitizedResult } from './types.js';

/**
 * Anything that can stand in for the engine. Every backend must give the same
 * result for the same units and profile: one result per unit, in order.
 */
export interface RedactionBackend {
  readonly name: string;
  redact(units: readonly RedactionUnit[]): Promise<SanitizedResult[]>;
  close?(): Promise<void>;
}

/** Runs the engine on the calling thread. */
export class InProcessBackend implements RedactionBackend {
  readonly name = 'inprocess';
  private readonly engine: RedactionEngine;

  constructor(engine: RedactionEngine) {
    this.engine = engine;
  }

  async redact(units: readonly RedactionUnit[]): Promise<SanitizedResult[]> {
    return this.engine.redactAll(units);
  }
}
