import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { executeCommand, formatUsageStats, isExitCommand, parseCommand, type CommandContext } from './commands.js';
import { computeContextUsage } from './context.js';

const ctx: CommandContext = {
  endpoint: 'openai',
  model: 'gpt-4o-mini',
  nsfwMode: false,
  skillsEnabled: true,
  skills: [{ name: 'echo', description: 'Echo text' }],
  contextUsage: computeContextUsage(1000, 128000),
};

function run(input: string, context: CommandContext = ctx) {
  const cmd = parseCommand(input);
  assert.ok(cmd, `not a command: ${input}`);
  return executeCommand(cmd, context);
}

describe('parseCommand', () => {
  it('splits name and arguments', () => {
    assert.deepEqual(parseCommand('  /MODEL   gpt-4o '), { name: 'model', args: ['gpt-4o'], raw: '/MODEL   gpt-4o' });
  });

  it('ignores ordinary text', () => {
    assert.equal(parseCommand('what is 2+2?'), null);
    assert.equal(parseCommand('/'), null);
  });
});

describe('isExitCommand', () => {
  it('recognises exit words', () => {
    for (const word of ['exit', 'QUIT', '/exit', ' /quit ']) {
      assert.equal(isExitCommand(word), true, word);
    }
    assert.equal(isExitCommand('exit please'), false);
  });
});

describe('executeCommand', () => {
  it('validates endpoints against the catalog', () => {
    assert.deepEqual(run('/endpoint Grok'), {
      success: true,
      message: '🔄 Switched to xAI Grok',
      stateChange: { endpoint: 'grok' },
    });

    const unknown = run('/endpoint nowhere');
    assert.equal(unknown.success, false);
    assert.match(unknown.message, /^Unknown endpoint: nowhere/);
    assert.equal(unknown.stateChange, undefined);
  });

  it('changes the model', () => {
    assert.deepEqual(run('/model gpt-4o'), {
      success: true,
      message: '🤖 Model changed to: gpt-4o ✓',
      stateChange: { model: 'gpt-4o' },
    });
    assert.deepEqual(run('/model my-finetune').stateChange, { model: 'my-finetune' });
  });

  it('refuses a model without function calling unless forced', () => {
    const refused = run('/model venice-uncensored');
    assert.equal(refused.success, false);
    assert.equal(refused.stateChange, undefined);
    assert.equal(refused.message, [
      "⚠️ Model 'venice-uncensored' does not support function calling; skills would be disabled.",
      'Use /model gpt-4o-mini for skills, or /model venice-uncensored --force to switch anyway.',
    ].join('\n'));

    assert.deepEqual(run('/model venice-uncensored --force'), {
      success: true,
      message: '🤖 Model changed to: venice-uncensored',
      stateChange: { model: 'venice-uncensored' },
    });
    assert.equal(run('/model venice-uncensored', { ...ctx, skillsEnabled: false }).success, true);
  });

  it('lists the models of the current endpoint', () => {
    assert.equal(run('/model', { ...ctx, endpoint: 'grok', model: 'grok-4-1' }).message, [
      '🤖 Models for xAI Grok:',
      '  🔧 grok-4-1-fast  Grok 4.1 Fast',
      '▶ 🔧 grok-4-1  Grok 4.1',
      '  🔧 grok-beta  Grok Beta',
      '     grok-4-latest  Grok 4 Latest',
    ].join('\n'));
    assert.equal(run('/model', { ...ctx, endpoint: 'elevenlabs' }).message, 'No catalogued models for elevenlabs. Use /model <name> to set one.');
  });

  it('toggles NSFW mode', () => {
    assert.deepEqual(run('/nsfw').stateChange, { nsfwMode: true });
    assert.deepEqual(run('/safe').stateChange, { nsfwMode: false });
  });

  it('clears history', () => {
    assert.deepEqual(run('/clear').stateChange, { clearHistory: true });
  });

  it('maps session subcommands', () => {
    assert.deepEqual(run('/session new work notes').stateChange, { session: { action: 'new', name: 'work notes' } });
    assert.deepEqual(run('/session').stateChange, { session: { action: 'info' } });
    assert.deepEqual(run('/session list').stateChange, { session: { action: 'list' } });
    assert.deepEqual(run('/session resume abc').stateChange, { session: { action: 'resume', sessionId: 'abc' } });
    assert.deepEqual(run('/session delete abc').stateChange, { session: { action: 'delete', sessionId: 'abc' } });
    assert.equal(run('/session resume').success, false);
    assert.equal(run('/session delete').success, false);
    assert.equal(run('/session explode').success, false);
  });

  it('lists skills and shows context', () => {
    assert.equal(run('/skills').message, '🔧 Skills (1):\n  • echo: Echo text');
    assert.equal(run('/context').message, '📊 Context: 🟢 1.0K/128.0K (0.8%)\nModel: gpt-4o-mini');
  });

  it('switches /context between status and compaction', () => {
    assert.deepEqual(run('/context compact').stateChange, { compact: true });
    assert.equal(run('/context status').message, run('/context').message);
    assert.equal(run('/context shrink').message, 'Unknown /context subcommand: shrink. Available: status, compact');
  });

  it('parses export targets and formats', () => {
    assert.deepEqual(run('/export').stateChange, { session: { action: 'export', format: 'json' } });
    assert.deepEqual(run('/export Markdown').stateChange, { session: { action: 'export', format: 'md' } });
    assert.deepEqual(run('/export abc').stateChange, { session: { action: 'export', format: 'json', sessionId: 'abc' } });
    assert.deepEqual(run('/export abc csv').stateChange, { session: { action: 'export', format: 'csv', sessionId: 'abc' } });
    assert.equal(run('/export abc pdf').message, 'Unsupported format: pdf\nFormats: json, md, csv');
    assert.equal(run('/export a b c').success, false);
  });

  it('asks the store for stats', () => {
    assert.deepEqual(run('/stats').stateChange, { session: { action: 'stats' } });
  });

  it('marks the active endpoint in /providers', () => {
    const lines = run('/providers').message.split('\n');
    assert.equal(lines[0], '🌐 Endpoints:');
    assert.ok(lines.some(l => l.startsWith('▶ openai')));
    assert.equal(lines[lines.length - 1], 'Skills work on: openai, grok, anthropic, openrouter, vertex');
  });

  it('rejects unknown commands', () => {
    assert.deepEqual(run('/teleport'), {
      success: false,
      message: 'Unknown command: /teleport. Type /help for available commands.',
    });
  });
});

describe('formatUsageStats', () => {
  it('renders totals and breakdowns', () => {
    assert.equal(formatUsageStats({
      sessions: 3,
      messages: 12,
      tokens: 1500,
      models: [{ key: 'gpt-4o-mini', sessions: 2, tokens: 1500 }, { key: 'grok-4-1-fast', sessions: 1, tokens: 0 }],
      endpoints: [{ key: 'openai', sessions: 3, tokens: 1500 }],
    }), [
      '📈 Usage across 3 sessions',
      'Messages: 12  Context tokens: 1.5K',
      'Top models:',
      '  gpt-4o-mini  2 sessions  1.5K tokens',
      '  grok-4-1-fast  1 session  0 tokens',
      'Endpoints:',
      '  openai  3 sessions  1.5K tokens',
    ].join('\n'));
  });

  it('says so when nothing is stored', () => {
    assert.equal(formatUsageStats({ sessions: 0, messages: 0, tokens: 0, models: [], endpoints: [] }), 'No saved sessions yet.');
  });
});
