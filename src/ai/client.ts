/**
 * client.ts — OpenAI-compatible chat-completions client.
 *
 * Every endpoint in the provider catalog that speaks the OpenAI protocol is
 * reached through this client; endpoint and model travel with each request,
 * so switching endpoints needs no client state.
 */

import { config, getApiKey, getBaseUrlOverride } from '../config/config.js';
import { detectProvider, getProvider } from '../config/providers.js';
import type { ConversationMessage } from '../chat/types.js';
import { ProviderError } from '../errors.js';
import { isJsonObject, type JsonObject, type ToolCallRequest } from '../skills/types.js';
import { fetchWithRetry, type RetryOptions } from './retry.js';
import type { ChatRequest, ProviderClient, ProviderResponse, WireMessage } from './types.js';

export interface EndpointSettings {
  baseUrl: string;
  apiKey: string;
  /** Backend the base URL points at, when it differs from the endpoint name */
  provider?: string;
}

export interface OpenAICompatibleClientOptions {
  /** Resolve URL and key for an endpoint (defaults to catalog + env) */
  resolveEndpoint?: (endpoint: string) => EndpointSettings;
  maxTokens?: number;
  temperature?: number;
  retry?: Partial<RetryOptions>;
}

/** Catalog base URL (or <ENDPOINT>_BASE_URL) plus <ENDPOINT>_API_KEY */
export function resolveEndpointFromEnv(endpoint: string): EndpointSettings {
  const caps = getProvider(endpoint);
  if (!caps) {
    throw new ProviderError(`Unknown endpoint: ${endpoint}`);
  }
  if (!caps.openAICompatible) {
    throw new ProviderError(`${caps.name} does not support chat completions`);
  }
  const override = getBaseUrlOverride(endpoint);
  const baseUrl = override || caps.baseUrl;
  if (!baseUrl) {
    throw new ProviderError(`No base URL for ${caps.name}; set ${endpoint.toUpperCase()}_BASE_URL`);
  }
  const apiKey = getApiKey(endpoint);
  if (caps.requiresApiKey && !apiKey) {
    throw new ProviderError(`API key for ${caps.name} is not set; set ${endpoint.toUpperCase()}_API_KEY`);
  }
  return { baseUrl, apiKey, provider: override ? detectProvider(override) : caps.id };
}

// ============================================
// Wire mapping
// ============================================

export function toWireMessages(messages: readonly ConversationMessage[], systemPrompt?: string): WireMessage[] {
  const wire: WireMessage[] = [];
  if (systemPrompt) {
    wire.push({ role: 'system', content: systemPrompt });
  }
  for (const msg of messages) {
    switch (msg.role) {
      case 'assistant':
        if (msg.toolCalls && msg.toolCalls.length > 0) {
          wire.push({
            role: 'assistant',
            content: msg.content,
            tool_calls: msg.toolCalls.map(call => ({
              id: call.id,
              type: 'function' as const,
              function: { name: call.functionName, arguments: call.argumentsRaw },
            })),
          });
        } else {
          wire.push({ role: 'assistant', content: msg.content });
        }
        break;
      case 'tool':
        wire.push({ role: 'tool', tool_call_id: msg.toolCallId ?? '', content: msg.content });
        break;
      default:
        wire.push({ role: msg.role, content: msg.content });
    }
  }
  return wire;
}

function numberField(obj: JsonObject, key: string): number {
  const value = obj[key];
  return typeof value === 'number' ? value : 0;
}

function parseToolCall(raw: unknown, index: number): ToolCallRequest {
  const fn = isJsonObject(raw) ? raw.function : undefined;
  if (!isJsonObject(raw) || !isJsonObject(fn)) {
    throw new ProviderError(`Malformed tool call at index ${index}`);
  }
  const id = raw.id;
  const name = fn.name;
  const args = fn.arguments;
  if (typeof id !== 'string' || !id || typeof name !== 'string' || !name) {
    throw new ProviderError(`Tool call at index ${index} is missing id or function name`);
  }
  return {
    id,
    functionName: name,
    argumentsRaw: typeof args === 'string' ? args : args === undefined || args === null ? '' : JSON.stringify(args),
  };
}

/** Narrow a chat-completions body into a ProviderResponse */
export function parseChatCompletion(data: unknown, fallbackModel: string): ProviderResponse {
  const choices = isJsonObject(data) ? data.choices : undefined;
  if (!isJsonObject(data) || !Array.isArray(choices) || choices.length === 0) {
    throw new ProviderError('Provider returned no choices');
  }
  const choice = choices[0];
  const message = isJsonObject(choice) ? choice.message : undefined;
  if (!isJsonObject(message)) {
    throw new ProviderError('Provider returned a choice without a message');
  }

  const rawCalls = message.tool_calls;
  const toolCalls = Array.isArray(rawCalls) ? rawCalls.map(parseToolCall) : [];
  const content = typeof message.content === 'string' ? message.content : '';

  let usage: ProviderResponse['usage'];
  const rawUsage = data.usage;
  if (isJsonObject(rawUsage)) {
    const promptTokens = numberField(rawUsage, 'prompt_tokens');
    const completionTokens = numberField(rawUsage, 'completion_tokens');
    usage = {
      promptTokens,
      completionTokens,
      totalTokens: numberField(rawUsage, 'total_tokens') || promptTokens + completionTokens,
    };
  }

  return {
    content,
    toolCalls,
    usage,
    model: typeof data.model === 'string' ? data.model : fallbackModel,
  };
}

function extractErrorMessage(body: unknown): string {
  const error = isJsonObject(body) ? body.error : undefined;
  if (isJsonObject(error) && typeof error.message === 'string') {
    return error.message;
  }
  return JSON.stringify(body);
}

// ============================================
// Client
// ============================================

export class OpenAICompatibleClient implements ProviderClient {
  private readonly resolveEndpoint: (endpoint: string) => EndpointSettings;
  private readonly maxTokens: number;
  private readonly temperature: number;
  private readonly retry?: Partial<RetryOptions>;

  constructor(options: OpenAICompatibleClientOptions = {}) {
    this.resolveEndpoint = options.resolveEndpoint ?? resolveEndpointFromEnv;
    this.maxTokens = options.maxTokens ?? config.ai.maxTokens;
    this.temperature = options.temperature ?? 0.7;
    this.retry = options.retry;
  }

  async chat(request: ChatRequest): Promise<ProviderResponse> {
    const { baseUrl, apiKey, provider } = this.resolveEndpoint(request.endpoint);

    const body: Record<string, unknown> = {
      model: request.model,
      messages: toWireMessages(request.messages, request.systemPrompt),
      max_tokens: this.maxTokens,
      temperature: this.temperature,
    };
    if (request.tools && request.tools.length > 0) body.tools = request.tools;

    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (apiKey) headers['Authorization'] = `Bearer ${apiKey}`;

    const url = `${baseUrl.replace(/\/$/, '')}/chat/completions`;
    const via = provider && provider !== request.endpoint ? ` via ${provider}` : '';
    console.log(`📤 ${request.endpoint}/${request.model}${via}: ${request.messages.length} messages${body.tools ? `, ${request.tools?.length} tools` : ''}`);

    let response: Response;
    try {
      response = await fetchWithRetry(url, { method: 'POST', headers, body: JSON.stringify(body) }, this.retry);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ProviderError(`Request to ${request.endpoint} failed: ${reason}`, undefined, { cause: err });
    }

    if (!response.ok) {
      const errorBody: unknown = await response.json().catch(() => ({ error: { message: response.statusText } }));
      throw new ProviderError(`${request.endpoint} API error (${response.status}): ${extractErrorMessage(errorBody)}`, response.status);
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (err) {
      throw new ProviderError(`${request.endpoint} returned invalid JSON`, response.status, { cause: err });
    }
    return parseChatCompletion(data, request.model);
  }
}
