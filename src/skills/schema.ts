import { Ajv, type ValidateFunction } from 'ajv';
import { ValidationError } from '../errors.js';
import type { JsonObject, ParameterSchema, SkillDefinition } from './types.js';

const ajv = new Ajv({
  allErrors: true,
  strict: false,
});

const validatorCache = new WeakMap<ParameterSchema, ValidateFunction>();

function getValidator(schema: ParameterSchema): ValidateFunction {
  const existing = validatorCache.get(schema);
  if (existing) return existing;
  const compiled = ajv.compile(schema);
  validatorCache.set(schema, compiled);
  return compiled;
}

/** Check tool-call arguments against the skill's parameter schema */
export function validateArguments(definition: SkillDefinition, args: JsonObject): void {
  let validator: ValidateFunction;
  try {
    validator = getValidator(definition.parameterSchema);
  } catch (err) {
    // A schema ajv cannot compile is the skill author's problem, not the model's
    console.warn(`⚠️ Invalid parameter schema for "${definition.name}", skipping validation:`, err);
    return;
  }

  if (!validator(args)) {
    const details = (validator.errors || [])
      .map(e => `${e.instancePath || '/'}: ${e.message || 'validation error'}`)
      .join('; ');
    throw new ValidationError(`invalid arguments for ${definition.name}: ${details}`);
  }
}

const TOOL_NAME_PATTERN = /^[A-Za-z0-9_]{1,64}$/;

/**
 * Problems that would make providers reject the tool definition.
 * Empty list means the definition is fine.
 */
export function lintSkillDefinition(definition: SkillDefinition): string[] {
  const problems: string[] = [];
  if (!TOOL_NAME_PATTERN.test(definition.name)) {
    problems.push(`name "${definition.name}" must match ${TOOL_NAME_PATTERN.source}`);
  }
  if (!definition.description.trim()) {
    problems.push('description is empty');
  }
  const schema = definition.parameterSchema;
  for (const key of schema.required ?? []) {
    if (!Object.prototype.hasOwnProperty.call(schema.properties, key)) {
      problems.push(`required parameter "${key}" is not declared in properties`);
    }
  }
  return problems;
}
