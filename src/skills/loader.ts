/**
 * loader.ts — user-defined skill definitions from a directory of JSON files.
 *
 * Each file holds `{ "name", "description", "parameters" }`. Definitions loaded
 * this way have no handler unless one is registered in code under the same
 * name, in which case the model sees an explicit NoHandlerError on call.
 */

import fs from 'fs';
import path from 'path';
import type { SkillRegistry } from './registry.js';
import { isJsonObject, type JsonObject, type ParameterSchema, type SkillDefinition } from './types.js';

export interface LoadReport {
  loaded: string[];
  skipped: Array<{ file: string; reason: string }>;
}

/** Narrow a parsed JSON file into a SkillDefinition or explain why not */
export function parseSkillFile(data: unknown): SkillDefinition | string {
  if (!isJsonObject(data)) return 'file must contain a JSON object';

  const { name, description, parameters } = data;
  if (typeof name !== 'string' || !name.trim()) return 'skill name is required';
  if (typeof description !== 'string') return 'description must be a string';

  let parameterSchema: ParameterSchema = { type: 'object', properties: {} };
  if (parameters !== undefined) {
    if (!isJsonObject(parameters) || parameters.type !== 'object') {
      return 'parameters must be an object schema';
    }
    const properties: Record<string, JsonObject> = {};
    const rawProperties = parameters.properties ?? {};
    if (!isJsonObject(rawProperties)) return 'parameters.properties must be an object';
    for (const [key, value] of Object.entries(rawProperties)) {
      if (!isJsonObject(value)) return `parameters.properties.${key} must be an object`;
      properties[key] = value;
    }
    const rawRequired = parameters.required ?? [];
    if (!Array.isArray(rawRequired)) return 'parameters.required must be an array';
    const required: string[] = [];
    for (const key of rawRequired) {
      if (typeof key !== 'string') return 'parameters.required must list strings';
      required.push(key);
    }
    parameterSchema = { type: 'object', properties, required };
  }

  return { name: name.trim(), description, parameterSchema };
}

/** Register every valid *.json definition in `dir`. A missing directory loads nothing. */
export function loadSkillDefinitions(dir: string, registry: SkillRegistry): LoadReport {
  const report: LoadReport = { loaded: [], skipped: [] };
  if (!dir || !fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
    return report;
  }

  const files = fs.readdirSync(dir).filter(f => f.toLowerCase().endsWith('.json')).sort();
  for (const file of files) {
    const fullPath = path.join(dir, file);
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(fullPath, 'utf-8'));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      console.warn(`⚠️ Skill file ${file} skipped: ${reason}`);
      report.skipped.push({ file, reason });
      continue;
    }

    const result = parseSkillFile(parsed);
    if (typeof result === 'string') {
      console.warn(`⚠️ Skill file ${file} skipped: ${result}`);
      report.skipped.push({ file, reason: result });
      continue;
    }

    registry.registerSkill(result);
    report.loaded.push(result.name);
  }

  if (report.loaded.length > 0) {
    console.log(`📂 Loaded ${report.loaded.length} skill definition(s) from ${dir}`);
  }
  return report;
}
