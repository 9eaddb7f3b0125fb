import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { exportSession, parseExportFormat, toCsv, toJson, toMarkdown } from './export.js';
import type { Session } from './types.js';

function sampleSession(): Session {
  return {
    id: 's1',
    name: 'demo',
    createdAt: new Date('2026-01-01T11:59:00.000Z'),
    updatedAt: new Date('2026-01-01T12:01:00.000Z'),
    endpoint: 'openai',
    model: 'gpt-4o-mini',
    nsfwMode: false,
    tokenUsage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
    messages: [
      { role: 'user', content: 'Hello', timestamp: new Date('2026-01-01T12:00:00.000Z') },
      {
        role: 'assistant',
        content: '',
        toolCalls: [{ id: 'c1', functionName: 'add', argumentsRaw: '{"a":1,"b":2}' }],
        timestamp: new Date('2026-01-01T12:00:01.000Z'),
      },
      { role: 'tool', content: '3', toolCallId: 'c1', timestamp: new Date('2026-01-01T12:00:02.000Z') },
      { role: 'assistant', content: 'It is 3.', timestamp: new Date('2026-01-01T12:00:03.000Z') },
    ],
  };
}

describe('parseExportFormat', () => {
  it('accepts json, md, markdown and csv', () => {
    assert.equal(parseExportFormat('json'), 'json');
    assert.equal(parseExportFormat('MD'), 'md');
    assert.equal(parseExportFormat('markdown'), 'md');
    assert.equal(parseExportFormat('csv'), 'csv');
    assert.equal(parseExportFormat('pdf'), null);
  });
});

describe('toMarkdown', () => {
  it('writes frontmatter and one section per message', () => {
    assert.equal(toMarkdown(sampleSession()), [
      '---',
      'session_id: s1',
      'created: 2026-01-01T11:59:00.000Z',
      'updated: 2026-01-01T12:01:00.000Z',
      'endpoint: openai',
      'model: gpt-4o-mini',
      'messages: 4',
      'tokens: 15',
      '---',
      '',
      '# demo',
      '',
      '## User (2026-01-01 12:00:00)',
      '',
      'Hello',
      '',
      '---',
      '',
      '## Assistant (2026-01-01 12:00:01)',
      '',
      '🔧 `add({"a":1,"b":2})`',
      '',
      '---',
      '',
      '## Tool (2026-01-01 12:00:02)',
      '',
      '_result of c1_',
      '',
      '3',
      '',
      '---',
      '',
      '## Assistant (2026-01-01 12:00:03)',
      '',
      'It is 3.',
      '',
      '---',
      '',
    ].join('\n'));
  });

  it('truncates very long messages', () => {
    const session = sampleSession();
    session.messages = [{ role: 'user', content: 'x'.repeat(10005), timestamp: new Date('2026-01-01T12:00:00.000Z') }];

    const out = toMarkdown(session);
    assert.ok(out.includes(`\n${'x'.repeat(10000)}\n\n...[truncated]...\n`));
  });
});

describe('toCsv', () => {
  it('quotes fields and flattens newlines', () => {
    const session = sampleSession();
    session.messages = [
      { role: 'user', content: 'say "hi", then\nleave', timestamp: new Date('2026-01-01T12:00:00.000Z') },
    ];

    assert.equal(toCsv(session), [
      'timestamp,role,content,tokens,model',
      '2026-01-01T12:00:00.000Z,user,"say ""hi"", then leave",5,gpt-4o-mini',
      '',
    ].join('\n'));
  });
});

describe('toJson', () => {
  it('writes the whole session', () => {
    const parsed: unknown = JSON.parse(toJson(sampleSession()));

    assert.ok(parsed && typeof parsed === 'object');
    assert.equal(Reflect.get(parsed, 'id'), 's1');
    assert.equal(Reflect.get(parsed, 'createdAt'), '2026-01-01T11:59:00.000Z');
    const messages: unknown = Reflect.get(parsed, 'messages');
    assert.ok(Array.isArray(messages));
    assert.equal(messages.length, 4);
  });
});

describe('exportSession', () => {
  let dir = '';

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes a timestamped file under the export directory', () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'skillchat-export-'));
    const target = path.join(dir, 'nested');
    const session = sampleSession();

    const filePath = exportSession(session, 'md', target, new Date('2026-01-01T12:00:00.000Z'));

    assert.equal(filePath, path.join(target, 'session_s1_20260101_120000.md'));
    assert.equal(fs.readFileSync(filePath, 'utf-8'), toMarkdown(session));
  });
});
