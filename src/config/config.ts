import dotenv from 'dotenv';
import os from 'os';
import path from 'path';

dotenv.config();

function getEnvValue(key: string, defaultValue: string = ''): string {
  return process.env[key] || defaultValue;
}

/** Integer env value clamped to [min, max]; invalid input falls back to the default */
function getEnvInt(key: string, defaultValue: number, min: number, max: number = Number.MAX_SAFE_INTEGER): number {
  const parsed = parseInt(getEnvValue(key, String(defaultValue)), 10);
  if (Number.isNaN(parsed)) return defaultValue;
  return Math.min(max, Math.max(min, parsed));
}

export const config = {
  ai: {
    defaultEndpoint: getEnvValue('DEFAULT_ENDPOINT', 'openai').toLowerCase(),
    /** Empty means "pick from the provider catalog" */
    defaultModel: getEnvValue('DEFAULT_MODEL'),
    systemPrompt: getEnvValue(
      'SYSTEM_PROMPT',
      'You are a helpful terminal assistant. Use the available tools when they help answer the user.',
    ),
    maxTokens: getEnvInt('AI_MAX_TOKENS', 4096, 1),
    maxRetries: getEnvInt('AI_MAX_RETRIES', 2, 0, 10),
    timeoutMs: getEnvInt('AI_TIMEOUT_MS', 60000, 1000),
    maxToolRounds: getEnvInt('AI_MAX_TOOL_ROUNDS', 10, 1, 50),
  },
  skills: {
    enabled: getEnvValue('SKILLS_ENABLED', 'true').toLowerCase() !== 'false',
    dir: getEnvValue('SKILLS_DIR') || path.join(os.homedir(), '.skillchat', 'skills'),
  },
  session: {
    dbPath: getEnvValue('SESSION_DB_PATH') || path.join(process.cwd(), 'data', 'sessions.db'),
    exportDir: getEnvValue('EXPORT_DIR') || path.join(os.homedir(), '.skillchat', 'exports'),
  },
  typing: {
    charsPerTick: getEnvInt('TYPING_CHARS_PER_TICK', 2, 1),
    tickMs: getEnvInt('TYPING_TICK_MS', 80, 0, 1000),
  },
  log: {
    /** Diagnostics go here while the terminal UI owns stdout */
    file: getEnvValue('LOG_FILE') || path.join(process.cwd(), 'data', 'skillchat.log'),
    toConsole: getEnvValue('LOG_TO_CONSOLE', 'false').toLowerCase() === 'true',
  },
  context: {
    /** 0 = use the model table */
    limitOverride: getEnvInt('CONTEXT_LIMIT', 0, 0),
    autoCompact: getEnvValue('AUTO_COMPACT', 'true').toLowerCase() !== 'false',
  },
};

/** API key for an endpoint, e.g. OPENAI_API_KEY for "openai" */
export function getApiKey(endpoint: string): string {
  return getEnvValue(`${endpoint.toUpperCase()}_API_KEY`);
}

/** Optional base URL override, e.g. OPENAI_BASE_URL */
export function getBaseUrlOverride(endpoint: string): string {
  return getEnvValue(`${endpoint.toUpperCase()}_BASE_URL`);
}
