/**
 * @fileoverview Reasoning state carried through a ReAct run.
 *
 * One context is created per top-level query and passed by reference
 * through every continuation and delegation of that run. History only
 * grows; the observation slot holds the latest delegated result only.
 *
 * @module stepgraph/modules/react/reasoning-context
 */

export class ReasoningContext {
  readonly query: string;
  private readonly history: string[] = [];
  private observation: string | null = null;

  constructor(query: string) {
    this.query = query;
  }

  get reasoningHistory(): ReadonlyArray<string> {
    return [...this.history];
  }

  get currentObservation(): string | null {
    return this.observation;
  }

  addReasoning(content: string): void {
    this.history.push(content);
  }

  /** Replaces the previous observation */
  setObservation(observation: string): void {
    this.observation = observation;
  }

  /**
   * Renders the context for the next prompt.
   */
  render(): string {
    const parts: string[] = [`User question: ${this.query}`];

    if (this.history.length > 0) {
      parts.push('\nPrevious reasoning:');
      parts.push(...this.history);
    }

    if (this.observation) {
      parts.push(`\nObservation: ${this.observation}`);
      parts.push('\nContinue reasoning:');
    }

    return parts.join('\n');
  }

  toJSON(): { query: string; reasoningHistory: string[]; currentObservation: string | null } {
    return {
      query: this.query,
      reasoningHistory: [...this.history],
      currentObservation: this.observation,
    };
  }
}
