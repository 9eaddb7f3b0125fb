import type { ToolCallRequest } from '../skills/types.js';

export type MessageRole = 'user' | 'assistant' | 'tool' | 'system';

export interface ConversationMessage {
  role: MessageRole;
  /** May be empty for an assistant message that only carries tool calls */
  content: string;
  /** Only on `tool` messages: the ToolCallRequest.id being answered */
  toolCallId?: string;
  /** Only on `assistant` messages that request execution */
  toolCalls?: ToolCallRequest[];
  timestamp: Date;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface Session {
  id: string;
  name?: string;
  createdAt: Date;
  updatedAt: Date;
  /** Insertion order is the conversation order, tool round-trips included */
  messages: ConversationMessage[];
  endpoint: string;
  model: string;
  nsfwMode: boolean;
  /** Endpoint to restore when NSFW mode is turned off */
  safeEndpoint?: string;
  tokenUsage: TokenUsage;
}

export type WarningLevel = 'ok' | 'warn' | 'caution' | 'critical';

export interface ContextUsage {
  currentTokens: number;
  maxTokens: number;
  warningLevel: WarningLevel;
}

export type OrchestratorState = 'idle' | 'awaiting_model' | 'executing_skills' | 'typing' | 'compacting';

export function emptyTokenUsage(): TokenUsage {
  return { promptTokens: 0, completionTokens: 0, totalTokens: 0 };
}
