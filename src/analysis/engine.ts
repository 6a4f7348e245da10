/**
 * AI Analysis Engine
 *
 * One Claude Agent SDK query per candidate. The agent may search the web for
 * recent news and must answer with a single JSON object, parsed with zod.
 */

import { query, type Options } from '@anthropic-ai/claude-agent-sdk';
import { z } from 'zod';
import {
  AnalysisError,
  type AnalysisEngine,
  type AnalysisResult,
  type Candidate,
} from '../core/index.js';
import { createLogger } from '../utils/index.js';
import { buildAnalysisPrompt } from './prompt.js';

const logger = createLogger('analysis');

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface AnalysisEngineOptions {
  model: string;
  maxTurns: number;
  timeoutMs: number;
}

// =============================================================================
// RESULT PARSING
// =============================================================================

const answerSchema = z.object({
  summary: z.string().min(1),
  recommendation: z.preprocess(
    value => (typeof value === 'string' ? value.trim().toUpperCase() : value),
    z.enum(['BUY YES', 'BUY NO', 'HOLD'])
  ),
  risk: z.preprocess(
    value => (typeof value === 'string' ? value.trim().toLowerCase() : value),
    z.enum(['high', 'medium', 'low'])
  ),
  confidence: z.coerce.number().min(0).max(1),
});

/**
 * Pull the JSON answer out of the agent's final text (which may be fenced or
 * surrounded by prose) and validate it.
 */
export function parseAnalysis(text: string, candidateId: string): AnalysisResult {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end <= start) {
    throw new AnalysisError(`No JSON object in analysis for ${candidateId}`, candidateId);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text.slice(start, end + 1));
  } catch (error) {
    throw new AnalysisError(`Malformed JSON in analysis for ${candidateId}`, candidateId, error);
  }

  const parsed = answerSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new AnalysisError(`Invalid analysis for ${candidateId}: ${issues}`, candidateId);
  }

  return { candidateId, ...parsed.data };
}

// =============================================================================
// ENGINE
// =============================================================================

export class ClaudeAnalysisEngine implements AnalysisEngine {
  constructor(private readonly options: AnalysisEngineOptions) {}

  async analyze(candidate: Candidate): Promise<AnalysisResult> {
    const abortController = new AbortController();
    const timeout = setTimeout(() => abortController.abort(), this.options.timeoutMs);

    const options: Options = {
      model: this.options.model,
      maxTurns: this.options.maxTurns,
      cwd: process.cwd(),
      allowedTools: ['WebSearch'],
      // Read-only research: no filesystem or shell access
      disallowedTools: ['Bash', 'Edit', 'Write', 'NotebookEdit', 'Read', 'Glob', 'Grep', 'WebFetch'],
      abortController,
    };

    let text: string | null = null;
    let failure: string | null = null;
    let costUsd: number | undefined;

    try {
      const queryResult = query({ prompt: buildAnalysisPrompt(candidate), options });

      for await (const message of queryResult) {
        if (message.type === 'result') {
          costUsd = message.total_cost_usd;
          if (message.subtype === 'success') {
            text = message.result;
          } else {
            failure = message.subtype;
          }
        }
      }
    } catch (error) {
      throw new AnalysisError(`Analysis query failed for ${candidate.id}`, candidate.id, error);
    } finally {
      clearTimeout(timeout);
    }

    if (text === null) {
      throw new AnalysisError(
        `Analysis for ${candidate.id} ended without a result (${failure ?? 'no result message'})`,
        candidate.id
      );
    }

    const result = parseAnalysis(text, candidate.id);
    if (costUsd !== undefined) {
      logger.debug(`Analysis of ${candidate.id} cost $${costUsd.toFixed(4)}`);
    }
    return { ...result, costUsd };
  }
}
