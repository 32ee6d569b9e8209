// Public API
export { StyleAnalyzer, type StyleAnalyzerOptions } from "./analyze.js";
export {
  formatStylePrompt,
  formatStyleProfile,
  DEFAULT_STYLE_PROMPT,
  type FormatMode,
} from "./format.js";
export {
  quantitativeAnalysis,
  averageSentenceLength,
  averageWordLength,
} from "./analyzers/text-metrics.js";
export { extractJsonObject } from "./parse.js";
export { StyleProfileSchema } from "./schema.js";
export {
  saveStyleProfile,
  loadStyleProfile,
  STYLE_PROFILE_FILE,
} from "./store.js";
export { loadSamples, addSample, SAMPLE_EXTENSIONS } from "./samples.js";

// Types
export type {
  StyleProfile,
  StyleDescriptors,
  QuantitativeMetrics,
  StyleThresholds,
  StyleAnalysisModel,
} from "./types.js";
