export { ClassificationAgent, type ClassificationAgentDeps } from "./ClassificationAgent.js";
export {
  ScriptedClassifier,
  createDemoSentimentClassifier,
  createDemoIntentClassifier,
  type ScriptedRule,
} from "./ScriptedClassifier.js";
export type { Classifier, ClassificationKind, ClassificationResult } from "./types.js";
