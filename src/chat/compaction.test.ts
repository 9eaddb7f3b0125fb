import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  applyCompaction,
  buildSummaryPrompt,
  compactionTarget,
  formatCompactionResult,
  planCompaction,
  shouldCompact,
} from './compaction.js';
import { computeContextUsage } from './context.js';
import type { ConversationMessage } from './types.js';

const at = new Date('2026-02-01T09:00:00.000Z');

function msg(role: ConversationMessage['role'], content: string, extra: Partial<ConversationMessage> = {}): ConversationMessage {
  return { role, content, timestamp: at, ...extra };
}

describe('shouldCompact', () => {
  it('triggers at 80% of the window', () => {
    assert.equal(shouldCompact(computeContextUsage(79, 100)), false);
    assert.equal(shouldCompact(computeContextUsage(80, 100)), true);
    assert.equal(shouldCompact(computeContextUsage(50, 0)), false);
  });

  it('targets 70% of the window', () => {
    assert.equal(compactionTarget(128000), 89600);
  });
});

describe('planCompaction', () => {
  const six = [
    msg('user', 'a'), msg('assistant', 'b'), msg('user', 'c'),
    msg('assistant', 'd'), msg('user', 'e'), msg('assistant', 'f'),
  ];

  it('summarizes enough messages to reach the target', () => {
    // 100 tokens per message, 300 to shed
    assert.equal(planCompaction(six, 600, 300), 3);
  });

  it('summarizes at least two and keeps the last two', () => {
    assert.equal(planCompaction(six, 600, 590), 2);
    assert.equal(planCompaction(six, 600, 0), 4);
  });

  it('does nothing under the target or with too little history', () => {
    assert.equal(planCompaction(six, 300, 400), 0);
    assert.equal(planCompaction([], 100, 10), 0);
    assert.equal(planCompaction(six.slice(0, 3), 900, 0), 0);
  });

  it('never separates tool results from their request', () => {
    const withTools = [
      msg('user', 'add things'),
      msg('assistant', '', { toolCalls: [{ id: 'c1', functionName: 'add', argumentsRaw: '{"a":1,"b":2}' }] }),
      msg('tool', '3', { toolCallId: 'c1' }),
      msg('assistant', 'It is 3.'),
      msg('user', 'thanks'),
      msg('assistant', 'welcome'),
    ];
    // Plain plan would cut at index 2, a tool message
    assert.equal(planCompaction(withTools, 600, 400), 0);
    assert.equal(planCompaction(withTools, 600, 300), 3);
  });
});

describe('buildSummaryPrompt', () => {
  it('renders roles, content and tool calls', () => {
    const prompt = buildSummaryPrompt([
      msg('user', 'add 1 and 2'),
      msg('assistant', '', { toolCalls: [{ id: 'c1', functionName: 'add', argumentsRaw: '{"a":1,"b":2}' }] }),
      msg('tool', '3', { toolCallId: 'c1' }),
    ]);

    assert.equal(prompt, [
      'Please summarize the following conversation:',
      '',
      'user: add 1 and 2',
      '',
      'assistant: [called add({"a":1,"b":2})]',
      '',
      'tool: 3',
    ].join('\n'));
  });
});

describe('applyCompaction', () => {
  it('replaces the head with one system message', () => {
    const first = msg('user', 'one', { timestamp: new Date('2026-01-01T00:00:00.000Z') });
    const result = applyCompaction([first, msg('assistant', 'two'), msg('user', 'three')], 2, '  Short recap.  ');

    assert.deepEqual(result, [
      { role: 'system', content: '📋 Conversation summary (messages 1-2):\n\nShort recap.', timestamp: first.timestamp },
      msg('user', 'three'),
    ]);
  });
});

describe('formatCompactionResult', () => {
  it('reports messages and tokens saved', () => {
    const outcome = { messagesBefore: 12, messagesAfter: 5, tokensBefore: 3000, tokensAfter: 1800 };
    assert.equal(formatCompactionResult(outcome, false), '✓ Compacted: 12 msgs → 5 msgs (saved 1.2K tokens, 40.0% reduction)');
    assert.equal(formatCompactionResult(outcome, true), '✓ Auto-compacted: 12 msgs → 5 msgs (saved 1.2K tokens, 40.0% reduction)');
  });
});
