/**
 * compaction.ts — shrink a long history by summarizing its oldest messages.
 *
 * The summary replaces the head of the history as a single system message;
 * the tail is kept verbatim. A cut never lands inside a tool round trip, so
 * the kept tail never starts with a `tool` message.
 */

import { formatTokenCount } from './context.js';
import type { ContextUsage, ConversationMessage } from './types.js';

/** Auto-compaction starts at this share of the context window */
export const COMPACTION_TRIGGER = 0.8;
/** ...and aims to bring usage down to this share */
export const COMPACTION_TARGET = 0.7;
/** Messages always kept verbatim at the end of the history */
export const MIN_KEPT_MESSAGES = 2;

const DEFAULT_TOKENS_PER_MESSAGE = 500;
const SUMMARY_PREFIX = '📋 Conversation summary';

export const SUMMARIZER_PROMPT = [
  'You summarize conversations. Write a concise summary of the conversation you are given that keeps:',
  '- the topics discussed',
  '- decisions and conclusions reached',
  '- open action items',
  '- technical details, names and numbers needed to continue',
  'Write 150-250 words in a plain, factual style.',
].join('\n');

export function shouldCompact(usage: ContextUsage): boolean {
  return usage.maxTokens > 0 && usage.currentTokens / usage.maxTokens >= COMPACTION_TRIGGER;
}

export function compactionTarget(maxTokens: number): number {
  return Math.floor(maxTokens * COMPACTION_TARGET);
}

/**
 * Number of leading messages to summarize so that usage falls towards
 * `targetTokens`. 0 when there is nothing worth compacting.
 */
export function planCompaction(
  messages: readonly ConversationMessage[],
  currentTokens: number,
  targetTokens: number,
): number {
  if (messages.length === 0 || currentTokens <= targetTokens) return 0;

  const perMessage = Math.floor(currentTokens / messages.length) || DEFAULT_TOKENS_PER_MESSAGE;
  let count = Math.floor((currentTokens - targetTokens) / perMessage);
  count = Math.max(count, 2);
  count = Math.min(count, messages.length - MIN_KEPT_MESSAGES);

  // Tool results stay with the assistant message that requested them
  while (count > 0 && messages[count].role === 'tool') {
    count--;
  }
  return count < 2 ? 0 : count;
}

function renderForSummary(msg: ConversationMessage): string {
  const calls = (msg.toolCalls ?? []).map(c => `[called ${c.functionName}(${c.argumentsRaw})]`);
  const body = [msg.content, ...calls].filter(Boolean).join(' ');
  return `${msg.role}: ${body}`;
}

/** User prompt carrying the transcript to summarize */
export function buildSummaryPrompt(messages: readonly ConversationMessage[]): string {
  return `Please summarize the following conversation:\n\n${messages.map(renderForSummary).join('\n\n')}`;
}

/** History with the first `count` messages replaced by the summary */
export function applyCompaction(
  messages: readonly ConversationMessage[],
  count: number,
  summary: string,
): ConversationMessage[] {
  const head = messages.slice(0, count);
  return [
    {
      role: 'system',
      content: `${SUMMARY_PREFIX} (messages 1-${count}):\n\n${summary.trim()}`,
      timestamp: head[0]?.timestamp ?? new Date(),
    },
    ...messages.slice(count),
  ];
}

export interface CompactionOutcome {
  messagesBefore: number;
  messagesAfter: number;
  tokensBefore: number;
  tokensAfter: number;
}

/** "✓ Compacted: 12 msgs → 5 msgs (saved 1.2K tokens, 40.0% reduction)" */
export function formatCompactionResult(outcome: CompactionOutcome, auto: boolean): string {
  const saved = Math.max(0, outcome.tokensBefore - outcome.tokensAfter);
  const percent = outcome.tokensBefore > 0 ? (saved / outcome.tokensBefore) * 100 : 0;
  return `✓ ${auto ? 'Auto-compacted' : 'Compacted'}: ${outcome.messagesBefore} msgs → ${outcome.messagesAfter} msgs `
    + `(saved ${formatTokenCount(saved)} tokens, ${percent.toFixed(1)}% reduction)`;
}
