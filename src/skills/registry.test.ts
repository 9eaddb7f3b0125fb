import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { SkillRegistry } from './registry.js';
import type { SkillDefinition } from './types.js';

function def(name: string, description = `${name} skill`): SkillDefinition {
  return {
    name,
    description,
    parameterSchema: { type: 'object', properties: { text: { type: 'string' } }, required: ['text'] },
  };
}

describe('SkillRegistry', () => {
  it('counts distinct names regardless of overwrites', () => {
    const registry = new SkillRegistry();
    registry.registerSkill(def('x'));
    registry.registerSkill(def('x', 'second'));
    registry.registerSkill(def('y'));

    assert.equal(registry.count(), 2);
    assert.equal(registry.getSkill('x')?.description, 'second');
  });

  it('keeps the original position when a name is overwritten', () => {
    const registry = new SkillRegistry();
    registry.registerSkill(def('a'));
    registry.registerSkill(def('b'));
    registry.registerSkill(def('a', 'updated'));

    assert.deepEqual(registry.listSkills().map(s => s.name), ['a', 'b']);
  });

  it('returns the same list when nothing changed', () => {
    const registry = new SkillRegistry();
    registry.registerSkill(def('a'));

    const first = registry.listSkills();
    const second = registry.listSkills();
    assert.equal(first, second);
    assert.deepEqual(first, second);
  });

  it('does not change a list already handed out', () => {
    const registry = new SkillRegistry();
    registry.registerSkill(def('a'));
    const before = registry.listSkills();

    registry.registerSkill(def('b'));
    assert.equal(before.length, 1);
    assert.equal(registry.listSkills().length, 2);
    assert.ok(Object.isFrozen(before));
  });

  it('binds handlers independently of definitions', () => {
    const registry = new SkillRegistry();
    registry.registerHandler('orphan', () => 'ok');

    assert.equal(registry.hasHandler('orphan'), true);
    assert.equal(registry.getSkill('orphan'), undefined);
    assert.equal(registry.count(), 0);
  });

  it('deletes the definition but leaves the handler', () => {
    const registry = new SkillRegistry();
    registry.register(def('a'), () => 'ok');
    registry.deleteSkill('a');
    registry.deleteSkill('missing');

    assert.equal(registry.count(), 0);
    assert.equal(registry.hasHandler('a'), true);
    assert.deepEqual(registry.toToolDefinitions(), []);
  });

  it('renders tool definitions in function-calling shape', () => {
    const registry = new SkillRegistry();
    registry.registerSkill(def('echo', 'Echo text back'));

    assert.deepEqual(registry.toToolDefinitions(), [
      {
        type: 'function',
        function: {
          name: 'echo',
          description: 'Echo text back',
          parameters: { type: 'object', properties: { text: { type: 'string' } }, required: ['text'] },
        },
      },
    ]);
  });

  it('keeps separate instances isolated', () => {
    const one = new SkillRegistry();
    const two = new SkillRegistry();
    one.registerSkill(def('a'));

    assert.equal(one.count(), 1);
    assert.equal(two.count(), 0);
  });
});
