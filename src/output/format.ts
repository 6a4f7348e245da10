/**
 * Message formatting for whale alerts, AI insights and status replies.
 * Plain markdown: bold renders on Discord, Telegram receives it stripped.
 */

import type { AnalysisResult, Candidate, WhaleEvent } from '../core/index.js';
import type { SchedulerStatus } from '../core/scheduler.js';
import { isMegaWhale } from '../detectors/whale.js';
import { formatCurrency, truncateText } from '../utils/index.js';

const POLYMARKET_EVENT_URL = 'https://polymarket.com/event';

export function marketUrl(eventSlug: string): string {
  return `${POLYMARKET_EVENT_URL}/${eventSlug}`;
}

/**
 * Whale alert. Mega whales (5x the threshold) get a louder header.
 */
export function formatWhaleAlert(event: WhaleEvent, threshold: number): string {
  const emoji = isMegaWhale(event, threshold) ? '🐋🚨🐋' : '🐋';
  const sentiment = event.side === 'BUY' ? '🐂 BULLISH' : '🐻 BEARISH';
  const odds = (event.price * 100).toFixed(1);

  return [
    `${emoji} **WHALE ALERT** ${emoji}`,
    '',
    `**Event:** ${truncateText(event.eventTitle, 120)}`,
    `**Market:** ${truncateText(event.marketTitle, 120)}`,
    `**Action:** ${event.side} YES (${sentiment})`,
    `**Amount:** ${formatCurrency(event.notional)}`,
    `**Price:** ${event.price} (${odds}% odds)`,
    `**Topic:** ${event.category}`,
    `**Link:** ${marketUrl(event.eventSlug)}`,
  ].join('\n');
}

const REFERENCE_STAKE = 1000;

/**
 * Profit of a winning $1,000 stake on the recommended side, settling at 1.00.
 * Null for HOLD or a price with no upside.
 */
export function potentialWin(
  recommendation: AnalysisResult['recommendation'],
  yesPrice: number
): { profit: number; roi: number } | null {
  if (recommendation === 'HOLD') return null;
  const price = recommendation === 'BUY YES' ? yesPrice : 1 - yesPrice;
  if (price <= 0 || price >= 1) return null;

  const profit = REFERENCE_STAKE / price - REFERENCE_STAKE;
  return { profit, roi: (profit / REFERENCE_STAKE) * 100 };
}

export function formatInsight(
  candidate: Candidate,
  result: AnalysisResult,
  budget: { used: number; max: number }
): string {
  const { activity } = candidate;

  const lines = [
    '⚡ **Market Insight** ⚡',
    `_Topic: ${candidate.category.toUpperCase()} | Budget: ${budget.used}/${budget.max}_`,
    '',
    `**Event:** ${truncateText(candidate.eventTitle, 120)}`,
    `**Market:** ${truncateText(candidate.question, 120)}`,
    `**Activity:** ${activity.reasons.join(', ')}`,
    `**Volume:** ${formatCurrency(activity.totalVolume)}`,
    `**Price:** ${activity.endPrice}`,
    `**Link:** ${marketUrl(candidate.eventSlug)}`,
    '',
    '🤖 **AI Advisory**',
    `**Recommendation:** ${result.recommendation}`,
    `**Risk:** ${result.risk}`,
    `**Confidence:** ${(result.confidence * 100).toFixed(0)}%`,
  ];

  const win = potentialWin(result.recommendation, activity.endPrice);
  if (win) {
    lines.push(`**Potential win on $1,000:** ${formatCurrency(win.profit)} (ROI ${win.roi.toFixed(1)}%)`);
  }

  lines.push('', truncateText(result.summary, 1200));
  return lines.join('\n');
}

export function formatStatus(status: SchedulerStatus): string {
  const lastCall = status.lastCallAt > 0
    ? new Date(status.lastCallAt).toISOString()
    : 'never';
  const topics = status.topicHistory.length > 0
    ? status.topicHistory.slice(-5).join(' → ')
    : 'none yet';

  return [
    '📊 **Whale Watcher Status**',
    '',
    `**Mode:** ${status.mode}`,
    `**AI quota:** ${status.callsUsedToday}/${status.maxDaily} used on ${status.dayKey} (${status.remaining} left)`,
    `**Burst:** ${status.burstSpent}/${status.burstCount}`,
    `**Last AI call:** ${lastCall}`,
    `**Whales remembered:** ${status.seenCount}`,
    `**Recent topics:** ${topics}`,
  ].join('\n');
}
