/**
 * Built-in skills — small, dependency-free utilities that are always available
 * when skills are enabled.
 */

import { createHash, randomUUID } from 'crypto';
import { ValidationError } from '../../errors.js';
import type { SkillRegistry } from '../registry.js';
import type { JsonObject, JsonValue, SkillDefinition, SkillHandler } from '../types.js';

// ============================================
// Argument helpers
// ============================================

function requireString(args: JsonObject, key: string): string {
  const value = args[key];
  if (typeof value !== 'string') {
    throw new ValidationError(`"${key}" must be a string`);
  }
  return value;
}

function requireNumber(args: JsonObject, key: string): number {
  const value = args[key];
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() && Number.isFinite(Number(value))) return Number(value);
  throw new ValidationError(`"${key}" must be a number`);
}

// ============================================
// Unit conversion
// ============================================

/** Factor to the base unit of each category (metre, kilogram) */
const LINEAR_UNITS: Record<string, { category: 'length' | 'mass'; factor: number }> = {
  mm: { category: 'length', factor: 0.001 },
  cm: { category: 'length', factor: 0.01 },
  m: { category: 'length', factor: 1 },
  km: { category: 'length', factor: 1000 },
  in: { category: 'length', factor: 0.0254 },
  ft: { category: 'length', factor: 0.3048 },
  yd: { category: 'length', factor: 0.9144 },
  mi: { category: 'length', factor: 1609.344 },
  mg: { category: 'mass', factor: 0.000001 },
  g: { category: 'mass', factor: 0.001 },
  kg: { category: 'mass', factor: 1 },
  oz: { category: 'mass', factor: 0.028349523125 },
  lb: { category: 'mass', factor: 0.45359237 },
};

const TEMPERATURE_UNITS = new Set(['c', 'f', 'k']);

function toCelsius(value: number, unit: string): number {
  if (unit === 'f') return (value - 32) * 5 / 9;
  if (unit === 'k') return value - 273.15;
  return value;
}

function fromCelsius(value: number, unit: string): number {
  if (unit === 'f') return value * 9 / 5 + 32;
  if (unit === 'k') return value + 273.15;
  return value;
}

function roundTo(value: number, digits: number): number {
  const scale = 10 ** digits;
  return Math.round(value * scale) / scale;
}

export function convertUnits(value: number, from: string, to: string): number {
  const f = from.trim().toLowerCase();
  const t = to.trim().toLowerCase();

  if (TEMPERATURE_UNITS.has(f) && TEMPERATURE_UNITS.has(t)) {
    return roundTo(fromCelsius(toCelsius(value, f), t), 6);
  }

  const source = LINEAR_UNITS[f];
  const target = LINEAR_UNITS[t];
  if (!source || !target) {
    throw new ValidationError(`unsupported unit: ${!source ? from : to}`);
  }
  if (source.category !== target.category) {
    throw new ValidationError(`cannot convert ${source.category} to ${target.category}`);
  }
  return roundTo(value * source.factor / target.factor, 6);
}

// ============================================
// Skills
// ============================================

const HASH_ALGORITHMS = ['md5', 'sha1', 'sha256', 'sha512'];

interface BuiltinSkill {
  definition: SkillDefinition;
  handler: SkillHandler;
}

export const BUILTIN_SKILLS: BuiltinSkill[] = [
  {
    definition: {
      name: 'generate_uuid',
      description: 'Generate a random version 4 UUID.',
      parameterSchema: { type: 'object', properties: {} },
    },
    handler: () => ({ uuid: randomUUID() }),
  },
  {
    definition: {
      name: 'base64_encode',
      description: 'Encode UTF-8 text as base64.',
      parameterSchema: {
        type: 'object',
        properties: { text: { type: 'string', description: 'Text to encode' } },
        required: ['text'],
      },
    },
    handler: (args) => ({ encoded: Buffer.from(requireString(args, 'text'), 'utf-8').toString('base64') }),
  },
  {
    definition: {
      name: 'base64_decode',
      description: 'Decode base64 into UTF-8 text.',
      parameterSchema: {
        type: 'object',
        properties: { encoded: { type: 'string', description: 'Base64 string to decode' } },
        required: ['encoded'],
      },
    },
    handler: (args) => {
      const encoded = requireString(args, 'encoded').trim();
      if (!/^[A-Za-z0-9+/]*={0,2}$/.test(encoded) || encoded.length % 4 !== 0) {
        throw new ValidationError('input is not valid base64');
      }
      return { decoded: Buffer.from(encoded, 'base64').toString('utf-8') };
    },
  },
  {
    definition: {
      name: 'generate_hash',
      description: 'Hash text with md5, sha1, sha256 or sha512 and return the hex digest.',
      parameterSchema: {
        type: 'object',
        properties: {
          text: { type: 'string', description: 'Text to hash' },
          algorithm: { type: 'string', enum: HASH_ALGORITHMS, description: 'Hash algorithm (default sha256)' },
        },
        required: ['text'],
      },
    },
    handler: (args) => {
      const text = requireString(args, 'text');
      const algorithm = typeof args.algorithm === 'string' ? args.algorithm.toLowerCase() : 'sha256';
      if (!HASH_ALGORITHMS.includes(algorithm)) {
        throw new ValidationError(`unsupported algorithm: ${algorithm}`);
      }
      return { algorithm, hash: createHash(algorithm).update(text, 'utf-8').digest('hex') };
    },
  },
  {
    definition: {
      name: 'convert_units',
      description: 'Convert a value between units of length (mm, cm, m, km, in, ft, yd, mi), mass (mg, g, kg, oz, lb) or temperature (C, F, K).',
      parameterSchema: {
        type: 'object',
        properties: {
          value: { type: 'number', description: 'Value to convert' },
          from_unit: { type: 'string', description: 'Source unit' },
          to_unit: { type: 'string', description: 'Target unit' },
        },
        required: ['value', 'from_unit', 'to_unit'],
      },
    },
    handler: (args) => {
      const value = requireNumber(args, 'value');
      const from = requireString(args, 'from_unit');
      const to = requireString(args, 'to_unit');
      const result: JsonValue = { value, from_unit: from, to_unit: to, result: convertUnits(value, from, to) };
      return result;
    },
  },
  {
    definition: {
      name: 'get_current_time',
      description: 'Current date and time in an IANA timezone such as "Europe/Berlin" (default UTC).',
      parameterSchema: {
        type: 'object',
        properties: { timezone: { type: 'string', description: 'IANA timezone name' } },
      },
    },
    handler: (args) => {
      const timezone = typeof args.timezone === 'string' && args.timezone.trim() ? args.timezone.trim() : 'UTC';
      const now = new Date();
      let local: string;
      try {
        local = now.toLocaleString('en-US', { timeZone: timezone, dateStyle: 'full', timeStyle: 'long' });
      } catch {
        throw new ValidationError(`unknown timezone: ${timezone}`);
      }
      return { timezone, local, utc: now.toISOString() };
    },
  },
];

/** Register definitions and handlers for all built-in skills */
export function registerBuiltinSkills(registry: SkillRegistry): void {
  for (const skill of BUILTIN_SKILLS) {
    registry.register(skill.definition, skill.handler);
  }
}
