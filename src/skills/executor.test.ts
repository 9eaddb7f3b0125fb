import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { NoHandlerError, NotFoundError, ValidationError } from '../errors.js';
import { ARGUMENT_PARSE_ERROR, SkillExecutor, formatToolContent, parseArguments } from './executor.js';
import { SkillRegistry } from './registry.js';
import type { SkillDefinition } from './types.js';

const echo: SkillDefinition = {
  name: 'echo',
  description: 'Return the message unchanged',
  parameterSchema: {
    type: 'object',
    properties: { message: { type: 'string' } },
    required: ['message'],
  },
};

function setup(): { registry: SkillRegistry; executor: SkillExecutor } {
  const registry = new SkillRegistry();
  registry.register(echo, args => args);
  return { registry, executor: new SkillExecutor(registry) };
}

describe('SkillExecutor.execute', () => {
  it('fails with NotFoundError for unknown skills', async () => {
    const { executor } = setup();
    await assert.rejects(executor.execute('missing', {}), NotFoundError);
  });

  it('fails with NoHandlerError when only the definition exists', async () => {
    const { registry, executor } = setup();
    registry.registerSkill({ ...echo, name: 'lonely' });
    await assert.rejects(executor.execute('lonely', {}), NoHandlerError);
  });

  it('fails with NotFoundError when only a handler exists', async () => {
    const { registry, executor } = setup();
    registry.registerHandler('ghost', () => 1);
    await assert.rejects(executor.execute('ghost', {}), NotFoundError);
  });

  it('returns the handler value unwrapped', async () => {
    const { registry, executor } = setup();
    registry.register({ ...echo, name: 'slow' }, async () => [1, 2, 3]);
    assert.deepEqual(await executor.execute('slow', {}), [1, 2, 3]);
  });
});

describe('SkillExecutor.executeToolCall', () => {
  it('round-trips the echo skill', async () => {
    const { executor } = setup();
    const result = await executor.executeToolCall({
      id: 'call_1',
      functionName: 'echo',
      argumentsRaw: '{"message":"hi"}',
    });

    assert.equal(result.success, true);
    assert.deepEqual(result.payload, { message: 'hi' });
    assert.ok(result.timestamp instanceof Date);
    assert.equal(formatToolContent('echo', result), '{"message":"hi"}');
  });

  it('turns malformed JSON into a failed result without running the handler', async () => {
    const registry = new SkillRegistry();
    let calls = 0;
    registry.register(echo, () => { calls++; return null; });
    const executor = new SkillExecutor(registry);

    const result = await executor.executeToolCall({ id: 'c', functionName: 'echo', argumentsRaw: '{not json' });
    assert.equal(result.success, false);
    assert.equal(result.errorMessage, ARGUMENT_PARSE_ERROR);
    assert.equal(result.errorType, 'ValidationError');
    assert.equal(calls, 0);
  });

  it('rejects non-object arguments', async () => {
    const { executor } = setup();
    const result = await executor.executeToolCall({ id: 'c', functionName: 'echo', argumentsRaw: '[1,2]' });
    assert.equal(result.success, false);
    assert.equal(result.errorMessage, 'arguments must be a JSON object');
  });

  it('reports schema violations as ValidationError', async () => {
    const { executor } = setup();
    const result = await executor.executeToolCall({ id: 'c', functionName: 'echo', argumentsRaw: '{}' });
    assert.equal(result.success, false);
    assert.equal(result.errorType, 'ValidationError');
    assert.equal(result.errorMessage, "invalid arguments for echo: /: must have required property 'message'");
  });

  it('wraps registry misses and handler errors', async () => {
    const { registry, executor } = setup();
    registry.register({ ...echo, name: 'broken', parameterSchema: { type: 'object', properties: {} } }, () => {
      throw new ValidationError('bad input');
    });

    const missing = await executor.executeToolCall({ id: '1', functionName: 'nope', argumentsRaw: '' });
    assert.equal(missing.errorType, 'NotFoundError');
    assert.equal(missing.errorMessage, 'skill not found: nope');

    const broken = await executor.executeToolCall({ id: '2', functionName: 'broken', argumentsRaw: '' });
    assert.equal(broken.success, false);
    assert.equal(broken.errorType, 'ValidationError');
    assert.equal(broken.errorMessage, 'bad input');
  });
});

describe('parseArguments', () => {
  it('treats empty input as no arguments', () => {
    assert.deepEqual(parseArguments(''), {});
    assert.deepEqual(parseArguments('   '), {});
  });

  it('throws SyntaxError on malformed JSON', () => {
    assert.throws(() => parseArguments('{'), SyntaxError);
  });
});

describe('formatToolContent', () => {
  it('passes strings through and serializes everything else', () => {
    const at = new Date();
    assert.equal(formatToolContent('s', { success: true, payload: 'plain text', timestamp: at }), 'plain text');
    assert.equal(formatToolContent('add', { success: true, payload: 4, timestamp: at }), '4');
    assert.equal(formatToolContent('none', { success: true, timestamp: at }), 'null');
  });

  it('renders failures as a structured error object', () => {
    const content = formatToolContent('add', {
      success: false,
      errorMessage: 'skill not found: add',
      errorType: 'NotFoundError',
      timestamp: new Date(),
    });
    assert.equal(content, '{"error":true,"type":"NotFoundError","message":"skill not found: add","skill":"add"}');
  });
});
