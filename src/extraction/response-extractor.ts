/**
 * @fileoverview Response Extractor - turns free-form model output into a
 * structured intent record.
 *
 * Two strategies are tried in order: a configured pattern with the named
 * groups `thought`, `action`, `action_input` and `final_answer`, then a
 * built-in parser keyed on the `Thought:` / `Action:` / `Action Input:` /
 * `Final Answer:` labels.
 *
 * @module stepgraph/extraction/response-extractor
 */

import type { ExtractedResponse } from '../types/module.types.js';

export const EXTRACTION_GROUPS = ['thought', 'action', 'action_input', 'final_answer'] as const;

type ExtractionGroup = typeof EXTRACTION_GROUPS[number];

type RawFields = Record<ExtractionGroup, string | null>;

const NO_ACTION_VALUES: ReadonlySet<string> = new Set(['', 'none', 'null', 'n/a']);

const THOUGHT_RE = /Thought:\s*([\s\S]+?)(?=\n(?:Action|Final Answer)|$)/;
const ACTION_RE = /Action:[ \t]*(\S+)/;
const ACTION_INPUT_RE = /Action Input:\s*([\s\S]+?)(?=\n(?:Observation|Final Answer|Thought)|$)/;
const FINAL_ANSWER_RE = /Final Answer:\s*([\s\S]+?)(?=\n\n|\n(?:Thought|Action|Final Answer)|$)/g;

export interface ResponseExtractorOptions {
  /**
   * Primary pattern. A string is compiled with the `s` flag; a string that
   * does not compile is ignored and only the fallback parser runs.
   */
  readonly pattern?: RegExp | string | null;
}

export class ResponseExtractor {
  private readonly pattern: RegExp | null;

  constructor(options: ResponseExtractorOptions = {}) {
    this.pattern = compilePattern(options.pattern ?? null);
  }

  hasPattern(): boolean {
    return this.pattern !== null;
  }

  extract(text: string): ExtractedResponse {
    const fromPattern = this.pattern ? matchPattern(this.pattern, text) : null;
    if (fromPattern) {
      return normalize(fromPattern, 'pattern');
    }
    return normalize(parseLabels(text), 'fallback');
  }
}

/**
 * Extracts with the label-based parser only.
 */
export function extractResponse(text: string): ExtractedResponse {
  return normalize(parseLabels(text), 'fallback');
}

function compilePattern(pattern: RegExp | string | null): RegExp | null {
  if (pattern === null) return null;
  if (pattern instanceof RegExp) return pattern;
  if (pattern.trim() === '') return null;
  try {
    return new RegExp(pattern, 's');
  } catch {
    return null;
  }
}

/**
 * Returns null when the pattern does not match, throws, or matches without
 * populating any of the four groups.
 */
function matchPattern(pattern: RegExp, text: string): RawFields | null {
  let match: RegExpExecArray | null;
  try {
    // A global or sticky pattern carries lastIndex between calls
    pattern.lastIndex = 0;
    match = pattern.exec(text);
  } catch {
    return null;
  }
  const groups = match?.groups;
  if (!groups) return null;

  const fields: RawFields = {
    thought: groups['thought'] ?? null,
    action: groups['action'] ?? null,
    action_input: groups['action_input'] ?? null,
    final_answer: groups['final_answer'] ?? null,
  };
  const populated = EXTRACTION_GROUPS.some(group => (fields[group] ?? '').trim() !== '');
  return populated ? fields : null;
}

function parseLabels(text: string): RawFields {
  const thought = THOUGHT_RE.exec(text)?.[1] ?? null;
  const action = ACTION_RE.exec(text)?.[1] ?? null;
  const actionInput = ACTION_INPUT_RE.exec(text)?.[1] ?? null;

  let finalAnswer: string | null = null;
  for (const match of text.matchAll(FINAL_ANSWER_RE)) {
    finalAnswer = match[1] ?? finalAnswer;
  }

  return { thought, action, action_input: actionInput, final_answer: finalAnswer };
}

function normalize(raw: RawFields, strategy: ExtractedResponse['strategy']): ExtractedResponse {
  const action = normalizeAction(raw.action);
  const actionInput = action === null ? null : normalizeActionInput(raw.action_input);
  let finalAnswer = emptyToNull(raw.final_answer?.trim() ?? null);

  // Still acting and done in the same turn: keep reasoning
  if (action !== null && actionInput !== null && finalAnswer !== null) {
    finalAnswer = null;
  }

  return {
    thought: raw.thought?.trim() ?? '',
    action,
    actionInput,
    finalAnswer,
    strategy,
  };
}

function normalizeAction(value: string | null): string | null {
  if (value === null) return null;
  // Only what sits on the label's own line counts
  const firstLine = value.split('\n')[0]?.trim() ?? '';
  const token = firstLine.split(/\s+/)[0] ?? '';
  return NO_ACTION_VALUES.has(token.toLowerCase()) ? null : token;
}

function normalizeActionInput(value: string | null): string | null {
  if (value === null) return null;
  return emptyToNull(stripQuotes(value.trim()));
}

export function stripQuotes(value: string): string {
  if (value.length >= 2) {
    const first = value[0];
    const last = value[value.length - 1];
    if ((first === '"' || first === "'") && first === last) {
      return value.slice(1, -1);
    }
  }
  return value;
}

function emptyToNull(value: string | null): string | null {
  return value === null || value === '' ? null : value;
}
