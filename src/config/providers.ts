/**
 * providers.ts — endpoint capability catalog, model catalog and context windows.
 *
 * The orchestrator consults these tables when the user switches endpoint or model:
 *  - tool-capable endpoint → preferred tool model, skills on
 *  - anything else         → default model, skills off
 *  - a catalogued model without function calling turns skills off on any endpoint
 */

// ─── Provider Catalog ────────────────────────────────────────────

export interface ProviderCapabilities {
  id: string;
  name: string;
  /** Empty when the URL is account-specific and must come from env */
  baseUrl: string;
  supportsFunctionCalling: boolean;
  defaultModel: string;
  /** Best model for function calling; empty when the endpoint has none */
  preferredToolModel: string;
  requiresApiKey: boolean;
  openAICompatible: boolean;
  notes: string;
}

export const PROVIDER_CATALOG: ProviderCapabilities[] = [
  // ─── Tested ───────────────────────────────────────────────
  {
    id: 'openai',
    name: 'OpenAI',
    baseUrl: 'https://api.openai.com/v1',
    supportsFunctionCalling: true,
    defaultModel: 'gpt-4o-mini',
    preferredToolModel: 'gpt-4o-mini',
    requiresApiKey: true,
    openAICompatible: true,
    notes: 'Native function calling.',
  },
  {
    id: 'grok',
    name: 'xAI Grok',
    baseUrl: 'https://api.x.ai/v1',
    supportsFunctionCalling: true,
    defaultModel: 'grok-4-1-fast',
    preferredToolModel: 'grok-4-1-fast',
    requiresApiKey: true,
    openAICompatible: true,
    notes: 'grok-4-1-fast is tuned for tool calling.',
  },
  {
    id: 'venice',
    name: 'Venice.ai',
    baseUrl: 'https://api.venice.ai/api/v1',
    supportsFunctionCalling: false,
    defaultModel: 'venice-uncensored',
    preferredToolModel: '',
    requiresApiKey: true,
    openAICompatible: true,
    notes: 'Used by NSFW mode. No function calling on the uncensored model.',
  },
  // ─── OpenAI-compatible ────────────────────────────────────
  {
    id: 'anthropic',
    name: 'Anthropic Claude',
    baseUrl: 'https://api.anthropic.com/v1',
    supportsFunctionCalling: true,
    defaultModel: 'claude-sonnet-4-5-20250929',
    preferredToolModel: 'claude-sonnet-4-5-20250929',
    requiresApiKey: true,
    openAICompatible: true,
    notes: 'Through the OpenAI compatibility layer.',
  },
  {
    id: 'openrouter',
    name: 'OpenRouter',
    baseUrl: 'https://openrouter.ai/api/v1',
    supportsFunctionCalling: true,
    defaultModel: 'openai/gpt-4o-mini',
    preferredToolModel: 'openai/gpt-4o-mini',
    requiresApiKey: true,
    openAICompatible: true,
    notes: 'Aggregator; parallel function calling supported.',
  },
  {
    id: 'vertex',
    name: 'Google Vertex AI (Gemini)',
    baseUrl: '',
    supportsFunctionCalling: true,
    defaultModel: 'gemini-1.5-pro',
    preferredToolModel: 'gemini-1.5-pro',
    requiresApiKey: false,
    openAICompatible: true,
    notes: 'Set VERTEX_BASE_URL to the project-specific OpenAI endpoint.',
  },
  // ─── Limited ──────────────────────────────────────────────
  {
    id: 'digitalocean',
    name: 'DigitalOcean Gradient',
    baseUrl: '',
    supportsFunctionCalling: false,
    defaultModel: 'gpt-4o-mini',
    preferredToolModel: '',
    requiresApiKey: true,
    openAICompatible: true,
    notes: 'Agent API runs cloud functions only; local skills unavailable.',
  },
  {
    id: 'elevenlabs',
    name: 'ElevenLabs',
    baseUrl: 'https://api.elevenlabs.io/v1',
    supportsFunctionCalling: false,
    defaultModel: '',
    preferredToolModel: '',
    requiresApiKey: true,
    openAICompatible: false,
    notes: 'Voice provider, not usable for chat.',
  },
];

/** Endpoint NSFW mode switches to */
export const NSFW_ENDPOINT = 'venice';
/** Endpoint restored by /safe when no previous endpoint is known */
export const FALLBACK_SAFE_ENDPOINT = 'openai';

export function getProvider(id: string): ProviderCapabilities | undefined {
  return PROVIDER_CATALOG.find(p => p.id === id.toLowerCase());
}

export function listProviders(): string[] {
  return PROVIDER_CATALOG.map(p => p.id);
}

export function listToolProviders(): string[] {
  return PROVIDER_CATALOG.filter(p => p.supportsFunctionCalling).map(p => p.id);
}

/** Guess the endpoint from a base URL; "unknown" when nothing matches */
export function detectProvider(baseUrl: string): string {
  const exact = PROVIDER_CATALOG.find(p => p.baseUrl && p.baseUrl === baseUrl);
  if (exact) return exact.id;

  const hosts: Array<[string, string]> = [
    ['openai.com', 'openai'],
    ['x.ai', 'grok'],
    ['venice.ai', 'venice'],
    ['anthropic.com', 'anthropic'],
    ['googleapis.com', 'vertex'],
    ['openrouter.ai', 'openrouter'],
    ['digitalocean', 'digitalocean'],
    ['elevenlabs.io', 'elevenlabs'],
  ];
  const match = hosts.find(([host]) => baseUrl.includes(host));
  return match ? match[1] : 'unknown';
}

// ─── Model Catalog ───────────────────────────────────────────────

export interface ModelCapabilities {
  supportsTools: boolean;
}

export interface ModelCatalogEntry {
  id: string;
  name: string;
  endpoint: string;
  capabilities: ModelCapabilities;
}

export const MODEL_CATALOG: ModelCatalogEntry[] = [
  { id: 'grok-4-1-fast', name: 'Grok 4.1 Fast', endpoint: 'grok', capabilities: { supportsTools: true } },
  { id: 'grok-4-1', name: 'Grok 4.1', endpoint: 'grok', capabilities: { supportsTools: true } },
  { id: 'grok-beta', name: 'Grok Beta', endpoint: 'grok', capabilities: { supportsTools: true } },
  // Not tuned for tool use
  { id: 'grok-4-latest', name: 'Grok 4 Latest', endpoint: 'grok', capabilities: { supportsTools: false } },
  { id: 'gpt-4o-mini', name: 'GPT-4o Mini', endpoint: 'openai', capabilities: { supportsTools: true } },
  { id: 'gpt-4o', name: 'GPT-4o', endpoint: 'openai', capabilities: { supportsTools: true } },
  { id: 'gpt-4-turbo', name: 'GPT-4 Turbo', endpoint: 'openai', capabilities: { supportsTools: true } },
  { id: 'gpt-3.5-turbo', name: 'GPT-3.5 Turbo', endpoint: 'openai', capabilities: { supportsTools: true } },
  { id: 'venice-uncensored', name: 'Venice Uncensored', endpoint: 'venice', capabilities: { supportsTools: false } },
  { id: 'llama-3.3-70b', name: 'Llama 3.3 70B', endpoint: 'venice', capabilities: { supportsTools: true } },
  { id: 'qwen3-235b', name: 'Qwen 3 235B', endpoint: 'venice', capabilities: { supportsTools: true } },
  { id: 'claude-sonnet-4-5-20250929', name: 'Claude Sonnet 4.5', endpoint: 'anthropic', capabilities: { supportsTools: true } },
  { id: 'claude-opus-4-5-20251101', name: 'Claude Opus 4.5', endpoint: 'anthropic', capabilities: { supportsTools: true } },
  { id: 'gemini-1.5-pro', name: 'Gemini 1.5 Pro', endpoint: 'vertex', capabilities: { supportsTools: true } },
  { id: 'gemini-1.5-flash', name: 'Gemini 1.5 Flash', endpoint: 'vertex', capabilities: { supportsTools: true } },
  { id: 'openai/gpt-4o-mini', name: 'GPT-4o Mini (via OpenRouter)', endpoint: 'openrouter', capabilities: { supportsTools: true } },
  { id: 'anthropic/claude-sonnet-4-5', name: 'Claude Sonnet 4.5 (via OpenRouter)', endpoint: 'openrouter', capabilities: { supportsTools: true } },
  // Agent API runs cloud functions only
  { id: 'gpt-4o-mini', name: 'GPT-4o Mini', endpoint: 'digitalocean', capabilities: { supportsTools: false } },
];

/** Catalog entry for a model; the endpoint's own entry wins over other endpoints' */
export function getModelInfo(model: string, endpoint?: string): ModelCatalogEntry | undefined {
  const id = model.toLowerCase();
  const matches = MODEL_CATALOG.filter(m => m.id === id);
  return matches.find(m => m.endpoint === endpoint) ?? matches[0];
}

/** Models catalogued for an endpoint, tool-capable first */
export function listModels(endpoint: string): ModelCatalogEntry[] {
  const models = MODEL_CATALOG.filter(m => m.endpoint === endpoint);
  return [
    ...models.filter(m => m.capabilities.supportsTools),
    ...models.filter(m => !m.capabilities.supportsTools),
  ];
}

/** False only for catalogued models without function calling; unknown models defer to the endpoint */
export function modelSupportsTools(model: string, endpoint?: string): boolean {
  return getModelInfo(model, endpoint)?.capabilities.supportsTools ?? true;
}

export interface EndpointSelection {
  model: string;
  skillsEnabled: boolean;
}

/**
 * Model and tool availability after switching to `endpoint`.
 * Unknown endpoints keep the current model with skills off.
 */
export function resolveEndpointModel(endpoint: string, currentModel: string): EndpointSelection {
  const caps = getProvider(endpoint);
  if (!caps) {
    return { model: currentModel, skillsEnabled: false };
  }
  if (caps.supportsFunctionCalling && caps.preferredToolModel) {
    return { model: caps.preferredToolModel, skillsEnabled: true };
  }
  return { model: caps.defaultModel || currentModel, skillsEnabled: false };
}

/** Whether tool definitions may be sent for this endpoint */
export function endpointSupportsTools(endpoint: string): boolean {
  return getProvider(endpoint)?.supportsFunctionCalling ?? false;
}

// ─── Context windows ─────────────────────────────────────────────

export const MODEL_CONTEXT_LIMITS: Record<string, number> = {
  'gpt-4': 8192,
  'gpt-4-turbo': 128000,
  'gpt-4o': 128000,
  'gpt-4o-mini': 128000,
  'gpt-3.5-turbo': 16385,
  'claude-3-opus': 200000,
  'claude-3-sonnet': 200000,
  'claude-3-haiku': 200000,
  'claude-sonnet-4': 200000,
  'claude-sonnet-4-5-20250929': 200000,
  'venice-uncensored': 8192,
  'llama-3.3-70b': 8192,
  'grok-4-1': 128000,
  'grok-4-1-fast': 128000,
  'gemini-1.5-pro': 1000000,
  'openai/gpt-4o-mini': 128000,
};

export const DEFAULT_CONTEXT_LIMIT = 8192;

/** Context window for a model; a positive override wins */
export function getModelLimit(model: string, override: number = 0): number {
  if (override > 0) return override;
  return MODEL_CONTEXT_LIMITS[model] ?? DEFAULT_CONTEXT_LIMIT;
}
