/**
 * Analysis module exports
 */

export { ClaudeAnalysisEngine, parseAnalysis, type AnalysisEngineOptions } from './engine.js';
export { buildAnalysisPrompt, ANALYST_INSTRUCTIONS } from './prompt.js';
