/**
 * Alert Formatting
 * Telegram (legacy Markdown) rendering of a decision and what changed
 */

import type { ChangeSummary, Decision, SignalName } from '@trend-alert/shared';

/**
 * Escape the characters legacy Markdown treats as entity delimiters
 */
export function escapeMarkdown(text: string): string {
  return text.replace(/([_*`[])/g, '\\$1');
}

function code(signal: SignalName): string {
  return `\`${signal}\``;
}

export function formatAlert(decision: Decision, changes: ChangeSummary): string {
  const lines = [
    `*${decision.verdict}* ${escapeMarkdown(decision.symbol)} ${decision.timeframe} (score ${decision.score})`,
    `${decision.regime} trend, ${decision.volume} volume, bar ${decision.timestamp.toISOString()}`,
  ];
  if (decision.doubleDown) {
    lines.push('Double-down setup: strong uptrend on heavy volume');
  }

  if (changes.firstEvaluation) {
    lines.push('First evaluation');
  } else if (changes.verdictChanged && changes.previousVerdict) {
    lines.push(`Verdict changed: ${changes.previousVerdict} → ${decision.verdict}`);
  }

  lines.push('');
  for (const reason of decision.reasons) {
    lines.push(`- ${escapeMarkdown(reason)}`);
  }

  const changeLines: string[] = [];
  if (changes.added.length > 0) {
    changeLines.push(`Added: ${changes.added.map(code).join(', ')}`);
  }
  if (changes.removed.length > 0) {
    changeLines.push(`Removed: ${changes.removed.map(code).join(', ')}`);
  }
  if (changeLines.length > 0) {
    lines.push('', ...changeLines);
  }

  return lines.join('\n');
}
