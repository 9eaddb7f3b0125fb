#!/usr/bin/env node
import { OpenAICompatibleClient } from './ai/client.js';
import { ConversationOrchestrator } from './chat/orchestrator.js';
import type { Session } from './chat/types.js';
import { redirectConsoleToFile } from './cli/logging.js';
import { Terminal } from './cli/terminal.js';
import { config } from './config/config.js';
import { getProvider, resolveEndpointModel } from './config/providers.js';
import { SqliteSessionStore, type SessionStore } from './db/sessions.js';
import { errorMessage } from './errors.js';
import { registerBuiltinSkills } from './skills/builtin/index.js';
import { SkillExecutor } from './skills/executor.js';
import { loadSkillDefinitions } from './skills/loader.js';
import { SkillRegistry } from './skills/registry.js';
import { lintSkillDefinition } from './skills/schema.js';

/** Latest session, or a fresh one on the configured endpoint */
function openSession(store: SessionStore): Session {
  const latest = store.loadLatest();
  if (latest) {
    console.log(`📂 Resuming session ${latest.id} (${latest.messages.length} messages)`);
    return latest;
  }

  const endpoint = getProvider(config.ai.defaultEndpoint) ? config.ai.defaultEndpoint : 'openai';
  const model = config.ai.defaultModel || resolveEndpointModel(endpoint, '').model;
  return store.create({ endpoint, model });
}

async function main() {
  const restoreConsole = config.log.toConsole ? () => {} : redirectConsoleToFile(config.log.file);
  console.log('🚀 Starting skillchat');

  // Skills
  const registry = new SkillRegistry();
  if (config.skills.enabled) {
    registerBuiltinSkills(registry);
    loadSkillDefinitions(config.skills.dir, registry);
  }
  for (const skill of registry.listSkills()) {
    for (const issue of lintSkillDefinition(skill)) {
      console.warn(`⚠️ Skill ${skill.name}: ${issue}`);
    }
  }
  console.log(`🔧 ${registry.count()} skills registered`);

  const store = new SqliteSessionStore(config.session.dbPath);
  const terminal = new Terminal();
  const orchestrator = new ConversationOrchestrator({
    registry,
    executor: new SkillExecutor(registry),
    client: new OpenAICompatibleClient(),
    store,
    session: openSession(store),
    settings: {
      systemPrompt: config.ai.systemPrompt,
      skillsEnabled: config.skills.enabled,
      maxToolRounds: config.ai.maxToolRounds,
      typing: config.typing,
      contextLimit: config.context.limitOverride,
      autoCompact: config.context.autoCompact,
      exportDir: config.session.exportDir,
    },
    hooks: terminal.hooks(),
  });

  await terminal.run(orchestrator);

  // In-flight requests are dropped; pending saves are written first
  await orchestrator.flush();
  store.close();
  console.log('👋 Shutting down');
  restoreConsole();
  process.exit(0);
}

main().catch(err => {
  process.stderr.write(`❌ Fatal: ${errorMessage(err)}\n`);
  console.error('❌ Fatal error:', err);
  process.exit(1);
});
