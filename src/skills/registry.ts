/**
 * registry.ts — skill registry.
 *
 * Single source of tools for the model. Definitions and handlers are bound
 * independently by name: a definition may exist without a handler (caught at
 * execution time) and vice versa.
 *
 * Reads go through an immutable snapshot that is rebuilt on every write, so a
 * caller holding a list from listSkills()/toToolDefinitions() never observes a
 * half-applied registration.
 */

import type { SkillDefinition, SkillHandler, ToolSpec } from './types.js';

interface Snapshot {
  readonly skills: readonly SkillDefinition[];
  readonly tools: readonly ToolSpec[];
}

export class SkillRegistry {
  private definitions = new Map<string, SkillDefinition>();
  private handlers = new Map<string, SkillHandler>();
  private snapshot: Snapshot = { skills: [], tools: [] };

  /** Insert or replace a definition (last write wins) */
  registerSkill(definition: SkillDefinition): void {
    if (this.definitions.has(definition.name)) {
      console.warn(`⚠️ Skill "${definition.name}" already registered, overwriting`);
    }
    this.definitions.set(definition.name, definition);
    this.rebuildSnapshot();
  }

  /** Bind a handler by name, whether or not a definition exists */
  registerHandler(name: string, handler: SkillHandler): void {
    this.handlers.set(name, handler);
  }

  /** Register a definition and its handler together */
  register(definition: SkillDefinition, handler: SkillHandler): void {
    this.registerSkill(definition);
    this.registerHandler(definition.name, handler);
  }

  getSkill(name: string): SkillDefinition | undefined {
    return this.definitions.get(name);
  }

  getHandler(name: string): SkillHandler | undefined {
    return this.handlers.get(name);
  }

  hasHandler(name: string): boolean {
    return this.handlers.has(name);
  }

  /** Insertion order */
  listSkills(): readonly SkillDefinition[] {
    return this.snapshot.skills;
  }

  /**
   * Remove a definition. The handler binding is left untouched;
   * unknown names are a no-op.
   */
  deleteSkill(name: string): void {
    if (this.definitions.delete(name)) {
      this.rebuildSnapshot();
    }
  }

  count(): number {
    return this.definitions.size;
  }

  /** All definitions in OpenAI function-calling shape, insertion order */
  toToolDefinitions(): readonly ToolSpec[] {
    return this.snapshot.tools;
  }

  private rebuildSnapshot(): void {
    const skills = Object.freeze(Array.from(this.definitions.values()));
    const tools = Object.freeze(skills.map((skill): ToolSpec => ({
      type: 'function',
      function: {
        name: skill.name,
        description: skill.description,
        parameters: skill.parameterSchema,
      },
    })));
    this.snapshot = { skills, tools };
  }
}
