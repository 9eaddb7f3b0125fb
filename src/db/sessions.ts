/**
 * sessions.ts — session persistence on SQLite.
 *
 * The orchestrator only depends on the SessionStore interface; tests can pass
 * an in-memory database or their own fake.
 */

import { randomUUID } from 'crypto';
import type { ConversationMessage, MessageRole, Session } from '../chat/types.js';
import { emptyTokenUsage } from '../chat/types.js';
import { PersistenceError, errorMessage } from '../errors.js';
import { isJsonObject, type ToolCallRequest } from '../skills/types.js';
import { openDatabase, type SqliteDatabase } from './database.js';

export interface SessionInit {
  endpoint: string;
  model: string;
  name?: string;
  nsfwMode?: boolean;
  safeEndpoint?: string;
}

export interface SessionSummary {
  id: string;
  name?: string;
  endpoint: string;
  model: string;
  messageCount: number;
  updatedAt: Date;
}

export interface UsageBreakdown {
  key: string;
  sessions: number;
  tokens: number;
}

/** Totals across every stored session */
export interface UsageStats {
  sessions: number;
  messages: number;
  /** Sum of each session's latest context size */
  tokens: number;
  models: UsageBreakdown[];
  endpoints: UsageBreakdown[];
}

export interface SessionStore {
  create(init: SessionInit): Session;
  /** Replaces the stored copy, messages included */
  save(session: Session): void;
  load(id: string): Session | null;
  /** Most recently updated session */
  loadLatest(): Session | null;
  /** Newest first */
  list(limit?: number): SessionSummary[];
  delete(id: string): boolean;
  stats(): UsageStats;
  close(): void;
}

// ============================================
// Rows
// ============================================

interface SessionRow {
  id: string;
  name: string | null;
  endpoint: string;
  model: string;
  nsfw_mode: number;
  safe_endpoint: string | null;
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
  created_at: string;
  updated_at: string;
}

interface MessageRow {
  role: string;
  content: string;
  tool_call_id: string | null;
  tool_calls: string | null;
  created_at: string;
}

interface SummaryRow {
  id: string;
  name: string | null;
  endpoint: string;
  model: string;
  updated_at: string;
  message_count: number;
}

interface TotalsRow {
  sessions: number;
  tokens: number;
}

interface BreakdownRow {
  key: string;
  sessions: number;
  tokens: number;
}

const ROLES: readonly MessageRole[] = ['user', 'assistant', 'tool', 'system'];

function toRole(value: string): MessageRole {
  const role = ROLES.find(r => r === value);
  if (!role) {
    throw new PersistenceError(`Unknown message role in database: ${value}`);
  }
  return role;
}

function decodeToolCalls(raw: string | null): ToolCallRequest[] | undefined {
  if (!raw) return undefined;
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) return undefined;

  const calls: ToolCallRequest[] = [];
  for (const item of parsed) {
    if (
      isJsonObject(item) &&
      typeof item.id === 'string' &&
      typeof item.functionName === 'string' &&
      typeof item.argumentsRaw === 'string'
    ) {
      calls.push({ id: item.id, functionName: item.functionName, argumentsRaw: item.argumentsRaw });
    }
  }
  return calls;
}

function rowToMessage(row: MessageRow): ConversationMessage {
  const message: ConversationMessage = {
    role: toRole(row.role),
    content: row.content,
    timestamp: new Date(row.created_at),
  };
  if (row.tool_call_id) message.toolCallId = row.tool_call_id;
  const toolCalls = decodeToolCalls(row.tool_calls);
  if (toolCalls) message.toolCalls = toolCalls;
  return message;
}

function openStoreDatabase(dbPath: string): SqliteDatabase {
  try {
    return openDatabase(dbPath);
  } catch (err) {
    throw new PersistenceError(`Failed to open session database: ${errorMessage(err)}`, { cause: err });
  }
}

// ============================================
// Store
// ============================================

export class SqliteSessionStore implements SessionStore {
  private readonly db: SqliteDatabase;

  constructor(dbOrPath: SqliteDatabase | string) {
    this.db = typeof dbOrPath === 'string' ? openStoreDatabase(dbOrPath) : dbOrPath;
  }

  create(init: SessionInit): Session {
    const now = new Date();
    const session: Session = {
      id: randomUUID(),
      name: init.name,
      createdAt: now,
      updatedAt: now,
      messages: [],
      endpoint: init.endpoint,
      model: init.model,
      nsfwMode: init.nsfwMode ?? false,
      safeEndpoint: init.safeEndpoint,
      tokenUsage: emptyTokenUsage(),
    };
    this.save(session);
    console.log(`💾 Session created: ${session.id}`);
    return session;
  }

  save(session: Session): void {
    const upsertSession = this.db.prepare(`
      INSERT INTO sessions (id, name, endpoint, model, nsfw_mode, safe_endpoint,
        prompt_tokens, completion_tokens, total_tokens, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        name = excluded.name,
        endpoint = excluded.endpoint,
        model = excluded.model,
        nsfw_mode = excluded.nsfw_mode,
        safe_endpoint = excluded.safe_endpoint,
        prompt_tokens = excluded.prompt_tokens,
        completion_tokens = excluded.completion_tokens,
        total_tokens = excluded.total_tokens,
        updated_at = excluded.updated_at
    `);
    const clearMessages = this.db.prepare('DELETE FROM session_messages WHERE session_id = ?');
    const insertMessage = this.db.prepare(`
      INSERT INTO session_messages (session_id, position, role, content, tool_call_id, tool_calls, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `);

    const write = this.db.transaction((s: Session) => {
      upsertSession.run(
        s.id,
        s.name ?? null,
        s.endpoint,
        s.model,
        s.nsfwMode ? 1 : 0,
        s.safeEndpoint ?? null,
        s.tokenUsage.promptTokens,
        s.tokenUsage.completionTokens,
        s.tokenUsage.totalTokens,
        s.createdAt.toISOString(),
        s.updatedAt.toISOString(),
      );
      clearMessages.run(s.id);
      s.messages.forEach((msg, position) => {
        insertMessage.run(
          s.id,
          position,
          msg.role,
          msg.content,
          msg.toolCallId ?? null,
          msg.toolCalls ? JSON.stringify(msg.toolCalls) : null,
          msg.timestamp.toISOString(),
        );
      });
    });

    try {
      write(session);
    } catch (err) {
      throw new PersistenceError(`Failed to save session ${session.id}: ${errorMessage(err)}`, { cause: err });
    }
  }

  load(id: string): Session | null {
    try {
      const row = this.db.prepare<[string], SessionRow>('SELECT * FROM sessions WHERE id = ?').get(id);
      return row ? this.hydrate(row) : null;
    } catch (err) {
      if (err instanceof PersistenceError) throw err;
      throw new PersistenceError(`Failed to load session ${id}: ${errorMessage(err)}`, { cause: err });
    }
  }

  loadLatest(): Session | null {
    const row = this.db
      .prepare<[], SessionRow>('SELECT * FROM sessions ORDER BY updated_at DESC, rowid DESC LIMIT 1')
      .get();
    return row ? this.load(row.id) : null;
  }

  list(limit: number = 20): SessionSummary[] {
    const rows = this.db.prepare<[number], SummaryRow>(`
      SELECT s.id, s.name, s.endpoint, s.model, s.updated_at,
        (SELECT COUNT(*) FROM session_messages m WHERE m.session_id = s.id) AS message_count
      FROM sessions s
      ORDER BY s.updated_at DESC, s.rowid DESC
      LIMIT ?
    `).all(limit);

    return rows.map(row => ({
      id: row.id,
      name: row.name ?? undefined,
      endpoint: row.endpoint,
      model: row.model,
      messageCount: row.message_count,
      updatedAt: new Date(row.updated_at),
    }));
  }

  delete(id: string): boolean {
    const result = this.db.prepare('DELETE FROM sessions WHERE id = ?').run(id);
    return result.changes > 0;
  }

  stats(): UsageStats {
    const totals = this.db
      .prepare<[], TotalsRow>('SELECT COUNT(*) AS sessions, COALESCE(SUM(total_tokens), 0) AS tokens FROM sessions')
      .get();
    const messages = this.db
      .prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM session_messages')
      .get();
    const breakdown = (column: 'model' | 'endpoint') => this.db
      .prepare<[], BreakdownRow>(`
        SELECT ${column} AS key, COUNT(*) AS sessions, COALESCE(SUM(total_tokens), 0) AS tokens
        FROM sessions
        GROUP BY ${column}
        ORDER BY tokens DESC, sessions DESC, key ASC
        LIMIT 5
      `)
      .all();

    return {
      sessions: totals?.sessions ?? 0,
      messages: messages?.count ?? 0,
      tokens: totals?.tokens ?? 0,
      models: breakdown('model'),
      endpoints: breakdown('endpoint'),
    };
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  private hydrate(row: SessionRow): Session {
    const messages = this.db
      .prepare<[string], MessageRow>(`
        SELECT role, content, tool_call_id, tool_calls, created_at
        FROM session_messages
        WHERE session_id = ?
        ORDER BY position ASC
      `)
      .all(row.id)
      .map(rowToMessage);

    return {
      id: row.id,
      name: row.name ?? undefined,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
      messages,
      endpoint: row.endpoint,
      model: row.model,
      nsfwMode: row.nsfw_mode === 1,
      safeEndpoint: row.safe_endpoint ?? undefined,
      tokenUsage: {
        promptTokens: row.prompt_tokens,
        completionTokens: row.completion_tokens,
        totalTokens: row.total_tokens,
      },
    };
  }
}
