// Classifier collaborator types

export type ClassificationKind = "sentiment" | "intent";

export interface ClassificationResult {
  label: string;
  /** 0..1 */
  confidence: number;
  entities?: Record<string, unknown>;
}

/**
 * External model behind a classification agent. May answer synchronously
 * (rules, fixtures) or asynchronously (remote model).
 */
export interface Classifier {
  classify(text: string, history?: string[]): ClassificationResult | Promise<ClassificationResult>;
}
