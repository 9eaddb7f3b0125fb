/**
 * terminal.ts — readline front end.
 *
 * Renders orchestrator hooks to stdout and feeds every line to the
 * orchestrator. The prompt is only shown while the orchestrator is idle.
 */

import readline, { type Interface } from 'readline';
import { isExitCommand } from '../chat/commands.js';
import { formatContextSummary } from '../chat/context.js';
import type { ConversationOrchestrator, OrchestratorHooks } from '../chat/orchestrator.js';

export interface TerminalOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  prompt?: string;
}

export class Terminal {
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;
  private readonly promptText: string;
  private rl?: Interface;
  /** Characters of the current reply already written */
  private typed = 0;

  constructor(options: TerminalOptions = {}) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
    this.promptText = options.prompt ?? '› ';
  }

  /** Hooks to pass to the orchestrator */
  hooks(): OrchestratorHooks {
    return {
      onStateChange: state => {
        if (state === 'awaiting_model') this.write('⏳ thinking...\n');
        if (state === 'compacting') this.write('🗜 compacting context...\n');
        if (state === 'idle') this.prompt();
      },
      onNotice: (message, kind) => {
        this.write(kind === 'error' ? `⚠️ ${message}\n` : `${message}\n`);
        this.prompt();
      },
      onToolCalls: (calls, round) => {
        const names = calls.map(c => c.functionName).join(', ');
        this.write(`🔧 Running ${names}${round > 1 ? ` (round ${round})` : ''}\n`);
      },
      onTyping: partial => {
        if (this.typed === 0) this.write('🤖 ');
        this.write(partial.slice(this.typed));
        this.typed = partial.length;
      },
      onReply: message => {
        if (this.typed === 0 && message.content) this.write(`🤖 ${message.content}`);
        this.write('\n');
        this.typed = 0;
      },
      onContextWarning: (_usage, message) => {
        this.write(`${message}\n`);
      },
      onError: error => {
        this.endReply();
        this.write(`❌ ${error.message}\n`);
      },
      onTurnAbandoned: () => {
        this.endReply();
      },
    };
  }

  /** Read lines until exit or EOF */
  run(orchestrator: ConversationOrchestrator): Promise<void> {
    const session = orchestrator.getSession();
    this.write(`💬 skillchat: ${session.endpoint}/${session.model}, skills ${orchestrator.skillsEnabled ? 'on' : 'off'}\n`);
    this.write(`📊 Context: ${formatContextSummary(orchestrator.getContextUsage())}  (/help for commands)\n`);

    const rl = readline.createInterface({ input: this.input, output: this.output, prompt: this.promptText });
    this.rl = rl;

    return new Promise<void>(resolve => {
      rl.on('line', line => {
        if (isExitCommand(line)) {
          rl.close();
          return;
        }
        orchestrator.submit(line);
        if (!line.trim()) this.prompt();
      });
      rl.on('SIGINT', () => rl.close());
      rl.on('close', () => {
        this.rl = undefined;
        this.write('\n👋 Bye\n');
        resolve();
      });
      rl.prompt();
    });
  }

  /** Close a half-typed reply so the next output starts on its own line */
  private endReply(): void {
    if (this.typed > 0) this.write('\n');
    this.typed = 0;
  }

  private prompt(): void {
    this.rl?.prompt(true);
  }

  private write(text: string): void {
    this.output.write(text);
  }
}
