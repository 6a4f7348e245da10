/**
 * Analysis Engine Unit Tests
 *
 * The agent SDK is replaced by a scripted message stream.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ClaudeAnalysisEngine, parseAnalysis } from '../../../src/analysis/engine.js';
import { buildAnalysisPrompt } from '../../../src/analysis/prompt.js';
import { AnalysisError } from '../../../src/core/index.js';
import { makeCandidate } from '../../fixtures.js';

const sdk = vi.hoisted(() => {
  const state: { messages: unknown[]; prompts: string[]; error: Error | null } = {
    messages: [],
    prompts: [],
    error: null,
  };
  return state;
});

vi.mock('@anthropic-ai/claude-agent-sdk', () => ({
  query: ({ prompt }: { prompt: string }) => {
    sdk.prompts.push(prompt);
    return (async function* () {
      if (sdk.error) throw sdk.error;
      yield* sdk.messages;
    })();
  },
}));

const ANSWER = JSON.stringify({
  summary: 'Turnout reports favour the challenger.',
  recommendation: 'buy no',
  risk: 'High',
  confidence: 0.7,
});

function engine(): ClaudeAnalysisEngine {
  return new ClaudeAnalysisEngine({ model: 'claude-haiku-4-5', maxTurns: 4, timeoutMs: 1000 });
}

describe('ClaudeAnalysisEngine', () => {
  beforeEach(() => {
    sdk.messages = [];
    sdk.prompts = [];
    sdk.error = null;
  });

  it('should parse the final result message', async () => {
    sdk.messages = [
      { type: 'assistant' },
      { type: 'result', subtype: 'success', result: `Here you go:\n\`\`\`json\n${ANSWER}\n\`\`\``, total_cost_usd: 0.002 },
    ];

    const result = await engine().analyze(makeCandidate('m-1', 'politics', 6000));

    expect(result).toEqual({
      candidateId: 'm-1',
      summary: 'Turnout reports favour the challenger.',
      recommendation: 'BUY NO',
      risk: 'high',
      confidence: 0.7,
      costUsd: 0.002,
    });
    expect(sdk.prompts[0]).toContain('Question: Will m-1 happen?');
  });

  it('should reject with AnalysisError when the agent stops without a result', async () => {
    sdk.messages = [{ type: 'result', subtype: 'error_max_turns', total_cost_usd: 0.01 }];

    const analysis = engine().analyze(makeCandidate('m-1', 'politics', 6000));

    await expect(analysis).rejects.toBeInstanceOf(AnalysisError);
    await expect(analysis).rejects.toThrow('error_max_turns');
  });

  it('should reject with AnalysisError when the query fails', async () => {
    sdk.error = new Error('process exited');

    await expect(engine().analyze(makeCandidate('m-2', 'tech', 1))).rejects.toMatchObject({
      name: 'AnalysisError',
      candidateId: 'm-2',
    });
  });
});

describe('parseAnalysis', () => {
  it('should reject text without JSON', () => {
    expect(() => parseAnalysis('I could not find anything.', 'm-1')).toThrow('No JSON object in analysis for m-1');
  });

  it('should reject an out-of-range confidence', () => {
    const text = JSON.stringify({ summary: 's', recommendation: 'HOLD', risk: 'low', confidence: 1.5 });
    expect(() => parseAnalysis(text, 'm-1')).toThrow(AnalysisError);
  });

  it('should reject an unknown recommendation', () => {
    const text = JSON.stringify({ summary: 's', recommendation: 'SELL', risk: 'low', confidence: 0.5 });
    expect(() => parseAnalysis(text, 'm-1')).toThrow(/recommendation/);
  });
});

describe('buildAnalysisPrompt', () => {
  it('should include both prices and the activity signals', () => {
    const prompt = buildAnalysisPrompt(makeCandidate('m-1', 'crypto', 6000));

    expect(prompt).toContain('Yes: $0.55');
    expect(prompt).toContain('No: $0.45');
    expect(prompt).toContain('Signals: High volume ($6.0K)');
  });
});
