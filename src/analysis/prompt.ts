/**
 * Prompt for the market analysis agent.
 */

import type { Candidate } from '../core/index.js';
import { formatCurrency } from '../utils/index.js';

export const ANALYST_INSTRUCTIONS = `You are a professional prediction market analyst.

## Task
1. SEARCH for news about the event from the last 24-72 hours.
2. ANALYZE whether the current price under- or over-states the likely outcome.
3. RECOMMEND "BUY YES", "BUY NO" or "HOLD" and rate the risk.

## Output Format
Answer with one JSON object and nothing else:
{
  "summary": "2-4 sentences of reasoning, citing the news you relied on",
  "recommendation": "BUY YES",  // or "BUY NO" or "HOLD"
  "risk": "medium",             // "high", "medium" or "low"
  "confidence": 0.6             // 0 to 1
}

## Guidelines
- Distinguish FACTS from OPINIONS
- If you can't find recent information, say so and lower your confidence`;

export function buildAnalysisPrompt(candidate: Candidate): string {
  const { activity } = candidate;
  const noPrice = Math.max(0, 1 - activity.endPrice);

  return `${ANALYST_INSTRUCTIONS}

## Market
Event: ${candidate.eventTitle}
Question: ${candidate.question}
Topic: ${candidate.category}

## Current Prices
Yes: $${activity.endPrice.toFixed(2)}
No: $${noPrice.toFixed(2)}

## Recent Activity
Traded volume: ${formatCurrency(activity.totalVolume)} over ${activity.tradeCount} trades
Price change: ${activity.priceChange >= 0 ? '+' : ''}${activity.priceChange.toFixed(2)}
Signals: ${activity.reasons.join(', ')}`;
}
