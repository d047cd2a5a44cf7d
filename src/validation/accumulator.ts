import type { PredictorError } from "../lib/errors.js";

/**
 * Collects violation messages for one validation call.
 * Owned by that call; never shared between requests.
 */
export class ErrorAccumulator {
  private readonly collected: string[] = [];

  constructor(private readonly toError: (messages: string[]) => PredictorError) {}

  add(messages: readonly string[]): this {
    this.collected.push(...messages);
    return this;
  }

  get messages(): readonly string[] {
    return this.collected;
  }

  hasErrors(): boolean {
    return this.collected.length > 0;
  }

  /** Stage boundary: raise everything collected so far, if anything. */
  throwIfAny(): void {
    if (this.hasErrors()) {
      throw this.toError([...this.collected]);
    }
  }
}
