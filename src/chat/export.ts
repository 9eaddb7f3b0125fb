/**
 * export.ts — write a session to disk as JSON, Markdown or CSV.
 */

import fs from 'fs';
import path from 'path';
import { estimateTokens } from './context.js';
import type { ConversationMessage, Session } from './types.js';

export type ExportFormat = 'json' | 'md' | 'csv';

const MARKDOWN_CONTENT_LIMIT = 10000;
const CSV_CONTENT_LIMIT = 1000;

/** "markdown" is accepted as an alias of "md"; null for anything else */
export function parseExportFormat(value: string): ExportFormat | null {
  switch (value.toLowerCase()) {
    case 'json':
      return 'json';
    case 'md':
    case 'markdown':
      return 'md';
    case 'csv':
      return 'csv';
    default:
      return null;
  }
}

/** "2025-01-02 03:04:05" in UTC */
function formatTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

export function toJson(session: Session): string {
  return JSON.stringify(session, null, 2);
}

function markdownBody(msg: ConversationMessage): string {
  let content = msg.content;
  if (content.length > MARKDOWN_CONTENT_LIMIT) {
    content = `${content.slice(0, MARKDOWN_CONTENT_LIMIT)}\n\n...[truncated]...`;
  }
  const lines = content ? [content] : [];
  for (const call of msg.toolCalls ?? []) {
    lines.push(`🔧 \`${call.functionName}(${call.argumentsRaw})\``);
  }
  if (msg.toolCallId) {
    lines.unshift(`_result of ${msg.toolCallId}_`);
  }
  return lines.join('\n\n');
}

export function toMarkdown(session: Session): string {
  const out: string[] = [
    '---',
    `session_id: ${session.id}`,
    `created: ${session.createdAt.toISOString()}`,
    `updated: ${session.updatedAt.toISOString()}`,
    `endpoint: ${session.endpoint}`,
    `model: ${session.model}`,
    `messages: ${session.messages.length}`,
    `tokens: ${session.tokenUsage.totalTokens}`,
    '---',
    '',
    `# ${session.name || 'Conversation Session'}`,
    '',
  ];
  for (const msg of session.messages) {
    out.push(`## ${capitalize(msg.role)} (${formatTimestamp(msg.timestamp)})`, '', markdownBody(msg), '', '---', '');
  }
  return out.join('\n');
}

function escapeCsvField(value: string): string {
  if (value.includes('"') || value.includes(',') || value.includes('\n')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/** One row per message: timestamp,role,content,tokens,model */
export function toCsv(session: Session): string {
  const rows = [['timestamp', 'role', 'content', 'tokens', 'model'].join(',')];
  for (const msg of session.messages) {
    let content = msg.content.replace(/\r/g, '').replace(/\n/g, ' ');
    if (content.length > CSV_CONTENT_LIMIT) {
      content = `${content.slice(0, CSV_CONTENT_LIMIT)}...`;
    }
    rows.push([
      msg.timestamp.toISOString(),
      msg.role,
      escapeCsvField(content),
      String(estimateTokens(msg.content)),
      escapeCsvField(session.model),
    ].join(','));
  }
  return `${rows.join('\n')}\n`;
}

export function renderSession(session: Session, format: ExportFormat): string {
  switch (format) {
    case 'json':
      return toJson(session);
    case 'md':
      return toMarkdown(session);
    case 'csv':
      return toCsv(session);
  }
}

/** "20250102_030405" in UTC */
function fileStamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10).replace(/-/g, '')}_${iso.slice(11, 19).replace(/:/g, '')}`;
}

/** Write `session_<id>_<stamp>.<ext>` under `dir` and return its path */
export function exportSession(session: Session, format: ExportFormat, dir: string, now: Date = new Date()): string {
  fs.mkdirSync(dir, { recursive: true });
  const filePath = path.join(dir, `session_${session.id}_${fileStamp(now)}.${format}`);
  fs.writeFileSync(filePath, renderSession(session, format), 'utf-8');
  console.log(`📤 Exported session ${session.id} to ${filePath}`);
  return filePath;
}
