// Rule-driven classifier for simulations and tests

import type { ClassificationResult, Classifier } from "./types.js";

export interface ScriptedRule {
  /** Substring (case-insensitive) or pattern tested against the text */
  match: string | RegExp;
  result: ClassificationResult;
}

/**
 * Answers from a fixed list of rules; first match wins, otherwise the
 * fallback. Every call is recorded for inspection.
 */
export class ScriptedClassifier implements Classifier {
  readonly calls: Array<{ text: string; history?: string[] }> = [];

  constructor(
    private rules: ScriptedRule[],
    private fallback: ClassificationResult
  ) {}

  classify(text: string, history?: string[]): ClassificationResult {
    this.calls.push({ text, history });

    const rule = this.rules.find((candidate) => matches(candidate.match, text));
    const result = rule?.result ?? this.fallback;
    return {
      ...result,
      ...(result.entities !== undefined ? { entities: { ...result.entities } } : {}),
    };
  }
}

function matches(pattern: string | RegExp, text: string): boolean {
  if (typeof pattern === "string") {
    return text.toLowerCase().includes(pattern.toLowerCase());
  }
  pattern.lastIndex = 0;
  return pattern.test(text);
}

/** Keyword sentiment rules used by `deskflow simulate`. */
export function createDemoSentimentClassifier(): ScriptedClassifier {
  return new ScriptedClassifier(
    [
      { match: /\b(furious|ridiculous|worst|unacceptable)\b/i, result: { label: "ANGRY", confidence: 0.93 } },
      { match: /\b(disappointed|broken|late|bad)\b/i, result: { label: "NEGATIVE", confidence: 0.81 } },
      { match: /\b(thanks|great|love)\b/i, result: { label: "POSITIVE", confidence: 0.88 } },
    ],
    { label: "NEUTRAL", confidence: 0.9 }
  );
}

/** Keyword intent rules used by `deskflow simulate`. */
export function createDemoIntentClassifier(): ScriptedClassifier {
  return new ScriptedClassifier(
    [
      { match: /\b(return|refund)\b/i, result: { label: "process_return", confidence: 0.95 } },
      { match: /\b(track|where is|shipping|delivery)\b/i, result: { label: "track_order", confidence: 0.92 } },
      { match: /\b(password|email|address|account)\b/i, result: { label: "update_account", confidence: 0.86 } },
      { match: /\b(hours|open|policy)\b/i, result: { label: "general_inquiry", confidence: 0.78 } },
    ],
    { label: "unknown", confidence: 0.35 }
  );
}
