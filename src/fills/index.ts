export { FillMatcher, type FillMatcherConfig } from "./fill-matcher.js";
export type { FillRecord, MatchResult, MatchTarget, MatchedConfidence } from "./types.js";
