/**
 * types.ts — contract for skills (model-callable functions).
 *
 * SkillDefinition is the provider-agnostic schema; the registry converts it
 * into the OpenAI function-calling shape (ToolSpec).
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type ParameterSchema = {
  type: 'object';
  properties: Record<string, JsonObject>;
  required?: string[];
  additionalProperties?: boolean;
};

export interface SkillDefinition {
  /** Unique key, also the function name on the wire */
  name: string;
  /** Shown to the model */
  description: string;
  parameterSchema: ParameterSchema;
}

/**
 * Handlers receive already-parsed arguments and either return a value or throw.
 * Async handlers are allowed (network or file I/O).
 */
export type SkillHandler = (args: JsonObject) => JsonValue | Promise<JsonValue>;

/** Tool call as issued by the provider */
export interface ToolCallRequest {
  id: string;
  functionName: string;
  /** Serialized JSON object, parsed by the executor */
  argumentsRaw: string;
}

/** Internal result envelope; rendered to a string before it reaches the model */
export interface ExecutionResult {
  success: boolean;
  payload?: JsonValue;
  errorMessage?: string;
  /** Error class name on failure (ValidationError, NotFoundError, ...) */
  errorType?: string;
  timestamp: Date;
}

/** OpenAI function-calling tool definition */
export interface ToolSpec {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: ParameterSchema;
  };
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
