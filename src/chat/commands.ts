/**
 * commands.ts — local slash commands.
 *
 * Pure functions: parse input, produce a message and an optional state change.
 * Nothing here touches the session; the orchestrator applies state changes.
 */

import { getModelInfo, getProvider, listModels, listProviders, listToolProviders, PROVIDER_CATALOG } from '../config/providers.js';
import type { UsageStats } from '../db/sessions.js';
import { formatContextSummary, formatTokenCount } from './context.js';
import { parseExportFormat, type ExportFormat } from './export.js';
import type { ContextUsage } from './types.js';

export interface Command {
  name: string;
  args: string[];
  raw: string;
}

export type SessionAction =
  | { action: 'new'; name?: string }
  | { action: 'resume'; sessionId: string }
  | { action: 'list' }
  | { action: 'info' }
  | { action: 'delete'; sessionId: string }
  /** Current session when `sessionId` is absent */
  | { action: 'export'; format: ExportFormat; sessionId?: string }
  | { action: 'stats' };

export interface StateChange {
  endpoint?: string;
  model?: string;
  nsfwMode?: boolean;
  clearHistory?: boolean;
  /** Summarize older messages now */
  compact?: boolean;
  session?: SessionAction;
}

export interface CommandResult {
  success: boolean;
  /** Empty when nothing should be shown */
  message: string;
  stateChange?: StateChange;
}

export interface CommandContext {
  endpoint: string;
  model: string;
  nsfwMode: boolean;
  skillsEnabled: boolean;
  skills: ReadonlyArray<{ name: string; description: string }>;
  contextUsage: ContextUsage;
}

const EXIT_WORDS = new Set(['exit', 'quit', ':q', '/exit', '/quit']);

export function isExitCommand(input: string): boolean {
  return EXIT_WORDS.has(input.trim().toLowerCase());
}

/** Parse `/name arg1 arg2`; null when the input is not a command */
export function parseCommand(input: string): Command | null {
  const raw = input.trim();
  if (!raw.startsWith('/')) return null;

  const parts = raw.split(/\s+/);
  const name = parts[0].slice(1).toLowerCase();
  if (!name) return null;

  return { name, args: parts.slice(1), raw };
}

export function executeCommand(cmd: Command, ctx: CommandContext): CommandResult {
  switch (cmd.name) {
    case 'help':
      return handleHelp(ctx);
    case 'endpoint':
      return handleEndpoint(cmd);
    case 'model':
      return handleModel(cmd, ctx);
    case 'nsfw':
      return {
        success: true,
        message: '🔥 NSFW mode enabled. Switched to Venice.ai; skills are disabled on this endpoint.',
        stateChange: { nsfwMode: true },
      };
    case 'safe':
      return {
        success: true,
        message: '✅ Safe mode enabled. Returned to your previous endpoint.',
        stateChange: { nsfwMode: false },
      };
    case 'providers':
      return handleProviders(ctx);
    case 'skills':
    case 'tools':
      return handleSkills(ctx);
    case 'context':
      return handleContext(cmd, ctx);
    case 'clear':
      return {
        success: true,
        message: '🗑 Conversation cleared.',
        stateChange: { clearHistory: true },
      };
    case 'session':
      return handleSession(cmd);
    case 'export':
      return handleExport(cmd);
    case 'stats':
      return { success: true, message: '', stateChange: { session: { action: 'stats' } } };
    default:
      return {
        success: false,
        message: `Unknown command: /${cmd.name}. Type /help for available commands.`,
      };
  }
}

// ============================================
// Handlers
// ============================================

function handleHelp(ctx: CommandContext): CommandResult {
  const lines = [
    '📋 Commands:',
    '/endpoint <name>     Switch provider endpoint',
    '/model [name]        List models or switch (--force for models without tools)',
    '/providers           List endpoints and tool support',
    '/skills              List available skills',
    '/context [compact]   Show context usage or summarize older messages',
    ctx.nsfwMode ? '/safe                Leave NSFW mode' : '/nsfw                Enter NSFW mode (Venice.ai, no skills)',
    '/clear               Clear the conversation',
    '/session new|list|resume <id>|delete <id>|info',
    '/export [id] [json|md|csv]',
    '/stats               Usage across saved sessions',
    'exit                 Quit',
  ];
  return { success: true, message: lines.join('\n') };
}

function handleEndpoint(cmd: Command): CommandResult {
  if (cmd.args.length === 0) {
    return {
      success: false,
      message: `Usage: /endpoint <name>\nAvailable: ${listProviders().join(', ')}`,
    };
  }
  const endpoint = cmd.args[0].toLowerCase();
  const caps = getProvider(endpoint);
  if (!caps) {
    return {
      success: false,
      message: `Unknown endpoint: ${endpoint}\nAvailable: ${listProviders().join(', ')}`,
    };
  }
  return {
    success: true,
    message: `🔄 Switched to ${caps.name}`,
    stateChange: { endpoint },
  };
}

function handleModel(cmd: Command, ctx: CommandContext): CommandResult {
  const force = cmd.args.includes('--force');
  const model = cmd.args.find(a => a !== '--force');
  if (!model) {
    return listEndpointModels(ctx);
  }

  const info = getModelInfo(model, ctx.endpoint);
  if (info && !info.capabilities.supportsTools && ctx.skillsEnabled && !force) {
    const preferred = getProvider(ctx.endpoint)?.preferredToolModel;
    const lines = [
      `⚠️ Model '${model}' does not support function calling; skills would be disabled.`,
      preferred ? `Use /model ${preferred} for skills, or /model ${model} --force to switch anyway.` : `Use /model ${model} --force to switch anyway.`,
    ];
    return { success: false, message: lines.join('\n') };
  }

  return {
    success: true,
    message: `🤖 Model changed to: ${model}${info?.capabilities.supportsTools ? ' ✓' : ''}`,
    stateChange: { model },
  };
}

function listEndpointModels(ctx: CommandContext): CommandResult {
  const models = listModels(ctx.endpoint);
  if (models.length === 0) {
    return { success: true, message: `No catalogued models for ${ctx.endpoint}. Use /model <name> to set one.` };
  }
  const lines = [`🤖 Models for ${getProvider(ctx.endpoint)?.name ?? ctx.endpoint}:`];
  for (const m of models) {
    const marker = m.id === ctx.model ? '▶' : ' ';
    const tools = m.capabilities.supportsTools ? '🔧' : '  ';
    lines.push(`${marker} ${tools} ${m.id}  ${m.name}`);
  }
  return { success: true, message: lines.join('\n') };
}

function handleContext(cmd: Command, ctx: CommandContext): CommandResult {
  const sub = (cmd.args[0] ?? 'status').toLowerCase();
  switch (sub) {
    case 'status':
      return {
        success: true,
        message: `📊 Context: ${formatContextSummary(ctx.contextUsage)}\nModel: ${ctx.model}`,
      };
    case 'compact':
      return { success: true, message: '', stateChange: { compact: true } };
    default:
      return { success: false, message: `Unknown /context subcommand: ${sub}. Available: status, compact` };
  }
}

function handleExport(cmd: Command): CommandResult {
  const usage = 'Usage: /export [format] or /export <id> [format]\nFormats: json, md, csv';
  const [first, second] = cmd.args;

  if (cmd.args.length > 2) {
    return { success: false, message: usage };
  }
  if (first === undefined) {
    return { success: true, message: '', stateChange: { session: { action: 'export', format: 'json' } } };
  }

  const firstFormat = parseExportFormat(first);
  if (second === undefined && firstFormat) {
    return { success: true, message: '', stateChange: { session: { action: 'export', format: firstFormat } } };
  }

  const format = second === undefined ? 'json' : parseExportFormat(second);
  if (!format) {
    return { success: false, message: `Unsupported format: ${second}\nFormats: json, md, csv` };
  }
  return { success: true, message: '', stateChange: { session: { action: 'export', format, sessionId: first } } };
}

function handleProviders(ctx: CommandContext): CommandResult {
  const lines = ['🌐 Endpoints:'];
  for (const p of PROVIDER_CATALOG) {
    const marker = p.id === ctx.endpoint ? '▶' : ' ';
    const tools = p.supportsFunctionCalling ? '🔧 tools' : '   no tools';
    lines.push(`${marker} ${p.id.padEnd(13)}${tools}  ${p.defaultModel || '-'}`);
  }
  lines.push(`Skills work on: ${listToolProviders().join(', ')}`);
  return { success: true, message: lines.join('\n') };
}

function handleSkills(ctx: CommandContext): CommandResult {
  if (ctx.skills.length === 0) {
    return { success: true, message: 'No skills registered.' };
  }
  const lines = [`🔧 Skills (${ctx.skills.length})${ctx.skillsEnabled ? '' : ' (disabled on this endpoint)'}:`];
  for (const s of ctx.skills) {
    lines.push(`  • ${s.name}: ${s.description}`);
  }
  return { success: true, message: lines.join('\n') };
}

function handleSession(cmd: Command): CommandResult {
  const [sub, ...rest] = cmd.args;
  switch ((sub ?? 'info').toLowerCase()) {
    case 'new':
      return {
        success: true,
        message: '',
        stateChange: { session: { action: 'new', name: rest.join(' ') || undefined } },
      };
    case 'list':
      return { success: true, message: '', stateChange: { session: { action: 'list' } } };
    case 'resume':
      if (rest.length === 0) {
        return { success: false, message: 'Usage: /session resume <id>' };
      }
      return { success: true, message: '', stateChange: { session: { action: 'resume', sessionId: rest[0] } } };
    case 'delete':
      if (rest.length === 0) {
        return { success: false, message: 'Usage: /session delete <id>' };
      }
      return { success: true, message: '', stateChange: { session: { action: 'delete', sessionId: rest[0] } } };
    case 'info':
      return { success: true, message: '', stateChange: { session: { action: 'info' } } };
    default:
      return { success: false, message: 'Usage: /session new [name] | list | resume <id> | delete <id> | info' };
  }
}

/** Body of /stats */
export function formatUsageStats(stats: UsageStats): string {
  if (stats.sessions === 0) return 'No saved sessions yet.';
  const plural = (n: number, word: string) => `${n} ${word}${n === 1 ? '' : 's'}`;
  const lines = [
    `📈 Usage across ${plural(stats.sessions, 'session')}`,
    `Messages: ${stats.messages}  Context tokens: ${formatTokenCount(stats.tokens)}`,
    'Top models:',
    ...stats.models.map(m => `  ${m.key}  ${plural(m.sessions, 'session')}  ${formatTokenCount(m.tokens)} tokens`),
    'Endpoints:',
    ...stats.endpoints.map(e => `  ${e.key}  ${plural(e.sessions, 'session')}  ${formatTokenCount(e.tokens)} tokens`),
  ];
  return lines.join('\n');
}
