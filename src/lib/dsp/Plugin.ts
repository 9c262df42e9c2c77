/**
 * Abstract base class for block processors.
 * The context is fixed at construction; params may change between blocks.
 */

import type { ProcessContext } from "./types";

export abstract class Plugin<P extends object, I, O> {
  protected params: P;

  constructor(protected readonly ctx: ProcessContext, params: P) {
    this.params = { ...params };
  }

  /** Update some or all parameters. Takes effect on the next block. */
  configure(params: Partial<P>): void {
    this.params = { ...this.params, ...params };
    this.onConfigure();
  }

  /** Called after params are set; override to pre-compute derived values. */
  protected onConfigure(): void {}

  getParams(): Readonly<P> {
    return this.params;
  }

  /** Reset internal state (filters, envelopes) back to construction time. */
  abstract reset(): void;

  /** Process exactly one block. */
  abstract process(input: I): O;
}
