/**
 * @fileoverview Unit tests for ReasoningContext
 */

import { describe, it, expect } from 'vitest';
import { ReasoningContext } from './reasoning-context.js';

describe('ReasoningContext', () => {
  it('should render only the question when empty', () => {
    expect(new ReasoningContext('What is 2+2?').render()).toBe('User question: What is 2+2?');
  });

  it('should render history and the latest observation', () => {
    const context = new ReasoningContext('q');
    context.addReasoning('first');
    context.addReasoning('second');
    context.setObservation('old');
    context.setObservation('new');

    expect(context.render()).toBe(
      'User question: q\n\nPrevious reasoning:\nfirst\nsecond\n\nObservation: new\n\nContinue reasoning:',
    );
    expect(context.currentObservation).toBe('new');
  });

  it('should skip an empty observation', () => {
    const context = new ReasoningContext('q');
    context.setObservation('');
    expect(context.render()).toBe('User question: q');
  });

  it('should hand out copies of the history', () => {
    const context = new ReasoningContext('q');
    context.addReasoning('a');
    const history = context.reasoningHistory;
    context.addReasoning('b');

    expect(history).toEqual(['a']);
    expect(context.toJSON()).toEqual({ query: 'q', reasoningHistory: ['a', 'b'], currentObservation: null });
  });
});
