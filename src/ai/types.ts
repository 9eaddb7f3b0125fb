import type { ConversationMessage, TokenUsage } from '../chat/types.js';
import type { ToolCallRequest, ToolSpec } from '../skills/types.js';

export interface ChatRequest {
  endpoint: string;
  model: string;
  systemPrompt?: string;
  /** Full ordered history */
  messages: readonly ConversationMessage[];
  /** Omitted entirely when tools are disabled */
  tools?: readonly ToolSpec[];
}

export interface ProviderResponse {
  content: string;
  /** Empty when the model answered in plain text */
  toolCalls: ToolCallRequest[];
  usage?: TokenUsage;
  model: string;
}

/** Anything that can answer a chat request; implementations own timeouts and retries */
export interface ProviderClient {
  chat(request: ChatRequest): Promise<ProviderResponse>;
}

// ============================================
// OpenAI chat-completions wire format
// ============================================

export interface WireToolCall {
  id: string;
  type: 'function';
  function: { name: string; arguments: string };
}

export type WireMessage =
  | { role: 'system' | 'user'; content: string }
  | { role: 'assistant'; content: string; tool_calls?: WireToolCall[] }
  | { role: 'tool'; tool_call_id: string; content: string };
