/**
 * executor.ts — resolves tool calls against the registry and runs handlers.
 *
 * execute() throws on registry misses; executeToolCall() never throws and
 * always produces an ExecutionResult that can be rendered into a tool message.
 */

import { NoHandlerError, NotFoundError, ValidationError, errorMessage, errorType } from '../errors.js';
import type { SkillRegistry } from './registry.js';
import { validateArguments } from './schema.js';
import { isJsonObject, type ExecutionResult, type JsonObject, type JsonValue, type ToolCallRequest } from './types.js';

export const ARGUMENT_PARSE_ERROR = 'failed to parse arguments';

export class SkillExecutor {
  constructor(private readonly registry: SkillRegistry) {}

  /** Run a skill by name; returns whatever the handler returns */
  async execute(name: string, args: JsonObject): Promise<JsonValue> {
    if (!this.registry.getSkill(name)) {
      throw new NotFoundError(name);
    }
    const handler = this.registry.getHandler(name);
    if (!handler) {
      throw new NoHandlerError(name);
    }
    return await handler(args);
  }

  async executeToolCall(call: ToolCallRequest): Promise<ExecutionResult> {
    let args: JsonObject;
    try {
      args = parseArguments(call.argumentsRaw);
    } catch (err) {
      console.warn(`⚠️ [${call.functionName}] ${ARGUMENT_PARSE_ERROR}: ${errorMessage(err)}`);
      return {
        success: false,
        errorMessage: err instanceof ValidationError ? err.message : ARGUMENT_PARSE_ERROR,
        errorType: 'ValidationError',
        timestamp: new Date(),
      };
    }

    console.log(`🔧 [${call.id}] ${call.functionName}`, args);

    try {
      const definition = this.registry.getSkill(call.functionName);
      if (definition) {
        validateArguments(definition, args);
      }
      const payload = await this.execute(call.functionName, args);
      return { success: true, payload, timestamp: new Date() };
    } catch (err) {
      console.warn(`⚠️ [${call.id}] ${call.functionName} failed: ${errorMessage(err)}`);
      return {
        success: false,
        errorMessage: errorMessage(err),
        errorType: errorType(err),
        timestamp: new Date(),
      };
    }
  }
}

/**
 * Parse the provider's serialized arguments. Empty input means no arguments.
 * Throws SyntaxError for malformed JSON and ValidationError for non-objects.
 */
export function parseArguments(raw: string): JsonObject {
  if (!raw.trim()) return {};
  const parsed: unknown = JSON.parse(raw);
  if (!isJsonObject(parsed)) {
    throw new ValidationError('arguments must be a JSON object');
  }
  return parsed;
}

/** Render a result into the content string of a `tool` message */
export function formatToolContent(skill: string, result: ExecutionResult): string {
  if (result.success) {
    const payload = result.payload ?? null;
    return typeof payload === 'string' ? payload : JSON.stringify(payload);
  }
  return JSON.stringify({
    error: true,
    type: result.errorType ?? 'Error',
    message: result.errorMessage ?? 'unknown error',
    skill,
  });
}
