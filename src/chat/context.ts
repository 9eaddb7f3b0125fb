import type { ContextUsage, ConversationMessage, TokenUsage, WarningLevel } from './types.js';

export const WARN_THRESHOLD = 0.75;
export const CAUTION_THRESHOLD = 0.85;
export const CRITICAL_THRESHOLD = 0.95;

/** Rough estimate: 1 token ≈ 4 characters */
export function estimateTokens(text: string): number {
  return Math.floor(text.length / 4);
}

/** Role overhead of ~4 tokens per message; tool-call arguments count as content */
export function estimateMessageTokens(msg: ConversationMessage): number {
  let text = msg.content;
  for (const call of msg.toolCalls ?? []) {
    text += call.functionName + call.argumentsRaw;
  }
  return 4 + estimateTokens(text);
}

/** Prompt side = user/system/tool, completion side = assistant */
export function estimateUsage(messages: readonly ConversationMessage[]): TokenUsage {
  let promptTokens = 0;
  let completionTokens = 0;
  for (const msg of messages) {
    const tokens = estimateMessageTokens(msg);
    if (msg.role === 'assistant') {
      completionTokens += tokens;
    } else {
      promptTokens += tokens;
    }
  }
  return { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens };
}

export function warningLevelFor(currentTokens: number, maxTokens: number): WarningLevel {
  if (maxTokens <= 0) return 'ok';
  const ratio = currentTokens / maxTokens;
  if (ratio < WARN_THRESHOLD) return 'ok';
  if (ratio < CAUTION_THRESHOLD) return 'warn';
  if (ratio < CRITICAL_THRESHOLD) return 'caution';
  return 'critical';
}

export function computeContextUsage(currentTokens: number, maxTokens: number): ContextUsage {
  return { currentTokens, maxTokens, warningLevel: warningLevelFor(currentTokens, maxTokens) };
}

/** 1234 → "1.2K", 2500000 → "2.5M" */
export function formatTokenCount(tokens: number): string {
  if (tokens >= 1_000_000) return `${(tokens / 1_000_000).toFixed(1)}M`;
  if (tokens >= 1_000) return `${(tokens / 1_000).toFixed(1)}K`;
  return String(tokens);
}

const LEVEL_EMOJI: Record<WarningLevel, string> = {
  ok: '🟢',
  warn: '🟡',
  caution: '🟠',
  critical: '🔴',
};

/** "🟢 12.0K/128.0K (9.4%)" */
export function formatContextSummary(usage: ContextUsage): string {
  const percentage = usage.maxTokens > 0 ? (usage.currentTokens / usage.maxTokens) * 100 : 0;
  return `${LEVEL_EMOJI[usage.warningLevel]} ${formatTokenCount(usage.currentTokens)}/${formatTokenCount(usage.maxTokens)} (${percentage.toFixed(1)}%)`;
}

export function formatContextWarning(usage: ContextUsage): string {
  const percentage = usage.maxTokens > 0 ? Math.floor((usage.currentTokens / usage.maxTokens) * 100) : 0;
  switch (usage.warningLevel) {
    case 'critical':
      return `🚨 Context at ${percentage}% - run /context compact or start a new session`;
    case 'caution':
      return `⚠️ Context at ${percentage}% - consider /context compact`;
    case 'warn':
      return `⚠️ Context at ${percentage}%`;
    default:
      return '';
  }
}
