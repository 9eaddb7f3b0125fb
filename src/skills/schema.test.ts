import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ValidationError } from '../errors.js';
import { lintSkillDefinition, validateArguments } from './schema.js';
import type { SkillDefinition } from './types.js';

const add: SkillDefinition = {
  name: 'add',
  description: 'Add two numbers',
  parameterSchema: {
    type: 'object',
    properties: { a: { type: 'number' }, b: { type: 'number' } },
    required: ['a', 'b'],
  },
};

describe('validateArguments', () => {
  it('accepts arguments matching the schema', () => {
    assert.doesNotThrow(() => validateArguments(add, { a: 2, b: 2 }));
  });

  it('reports a missing required argument', () => {
    assert.throws(
      () => validateArguments(add, { a: 2 }),
      (err: unknown) => err instanceof ValidationError
        && err.message === "invalid arguments for add: /: must have required property 'b'",
    );
  });

  it('reports a wrong type with its path', () => {
    assert.throws(
      () => validateArguments(add, { a: 'two', b: 2 }),
      (err: unknown) => err instanceof ValidationError
        && err.message === 'invalid arguments for add: /a: must be number',
    );
  });
});

describe('lintSkillDefinition', () => {
  it('passes a well-formed definition', () => {
    assert.deepEqual(lintSkillDefinition(add), []);
  });

  it('flags names, empty descriptions and undeclared required keys', () => {
    const problems = lintSkillDefinition({
      name: 'bad name',
      description: '  ',
      parameterSchema: { type: 'object', properties: {}, required: ['q'] },
    });

    assert.deepEqual(problems, [
      'name "bad name" must match ^[A-Za-z0-9_]{1,64}$',
      'description is empty',
      'required parameter "q" is not declared in properties',
    ]);
  });

  it('flags hyphenated names', () => {
    assert.deepEqual(lintSkillDefinition({ ...add, name: 'get-weather' }), [
      'name "get-weather" must match ^[A-Za-z0-9_]{1,64}$',
    ]);
  });
});
