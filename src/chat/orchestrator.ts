/**
 * orchestrator.ts — conversation state machine.
 *
 * idle → awaiting_model → (executing_skills → awaiting_model)* → typing → idle
 * idle → compacting → idle
 *
 * Every transition runs inside the EventLoop handler. Provider calls, skill
 * executions, typing ticks, summaries and saves run in the background and
 * report back by posting events; events from an abandoned turn are dropped by
 * turn id.
 */

import type { ChatRequest, ProviderClient, ProviderResponse } from '../ai/types.js';
import {
  FALLBACK_SAFE_ENDPOINT,
  NSFW_ENDPOINT,
  endpointSupportsTools,
  getModelLimit,
  modelSupportsTools,
  resolveEndpointModel,
} from '../config/providers.js';
import type { SessionStore } from '../db/sessions.js';
import { ProviderError, errorMessage } from '../errors.js';
import type { SkillExecutor } from '../skills/executor.js';
import { formatToolContent } from '../skills/executor.js';
import type { SkillRegistry } from '../skills/registry.js';
import type { ExecutionResult, ToolCallRequest } from '../skills/types.js';
import { executeCommand, formatUsageStats, parseCommand, type SessionAction, type StateChange } from './commands.js';
import {
  SUMMARIZER_PROMPT,
  applyCompaction,
  buildSummaryPrompt,
  compactionTarget,
  formatCompactionResult,
  planCompaction,
  shouldCompact,
} from './compaction.js';
import { computeContextUsage, estimateUsage, formatContextSummary, formatContextWarning } from './context.js';
import { EventLoop } from './event-loop.js';
import { exportSession } from './export.js';
import type { ContextUsage, ConversationMessage, OrchestratorState, Session, WarningLevel } from './types.js';
import { emptyTokenUsage } from './types.js';

export type NoticeKind = 'info' | 'error';

export interface OrchestratorHooks {
  onStateChange?(state: OrchestratorState, previous: OrchestratorState): void;
  /** Local output: command replies, refusals, status lines */
  onNotice?(message: string, kind: NoticeKind): void;
  /** Text revealed so far for the reply being typed */
  onTyping?(partial: string): void;
  /** Fired once the reply is fully revealed */
  onReply?(message: ConversationMessage): void;
  onToolCalls?(calls: readonly ToolCallRequest[], round: number): void;
  onContextUpdate?(usage: ContextUsage): void;
  /** Level moved to a non-ok value */
  onContextWarning?(usage: ContextUsage, message: string): void;
  /** The turn was aborted */
  onError?(error: Error): void;
  /** The in-flight turn was dropped by /clear or a session switch */
  onTurnAbandoned?(): void;
}

export interface OrchestratorSettings {
  systemPrompt: string;
  /** Global switch; endpoint capabilities and NSFW mode can still turn skills off */
  skillsEnabled: boolean;
  maxToolRounds: number;
  typing: { charsPerTick: number; tickMs: number };
  /** Positive value overrides the per-model context window */
  contextLimit: number;
  /** Summarize older messages once usage reaches the compaction trigger */
  autoCompact: boolean;
  exportDir: string;
}

export interface OrchestratorOptions {
  registry: SkillRegistry;
  executor: SkillExecutor;
  client: ProviderClient;
  store: SessionStore;
  session: Session;
  settings: OrchestratorSettings;
  hooks?: OrchestratorHooks;
}

type OrchestratorEvent =
  | { type: 'user_input'; text: string }
  | { type: 'provider_result'; turnId: number; response: ProviderResponse }
  | { type: 'provider_error'; turnId: number; error: unknown }
  | { type: 'skill_result'; turnId: number; index: number; result: ExecutionResult }
  | { type: 'typing_tick'; turnId: number }
  | { type: 'compaction_result'; compactionId: number; summary: string }
  | { type: 'compaction_error'; compactionId: number; error: unknown }
  | { type: 'save_failed'; error: unknown };

interface Turn {
  id: number;
  /** Tool rounds started in this turn */
  round: number;
  toolsOffered: boolean;
  pendingCalls: ToolCallRequest[];
  results: Array<ExecutionResult | undefined>;
  /** Tool messages appended so far for the current round */
  flushed: number;
  typing?: { message: ConversationMessage; revealed: number };
  timer?: ReturnType<typeof setTimeout>;
}

interface Compaction {
  id: number;
  /** Leading messages being summarized */
  count: number;
  auto: boolean;
  messagesBefore: number;
  tokensBefore: number;
}

export class ConversationOrchestrator {
  private readonly registry: SkillRegistry;
  private readonly executor: SkillExecutor;
  private readonly client: ProviderClient;
  private readonly store: SessionStore;
  private readonly settings: OrchestratorSettings;
  private readonly hooks: OrchestratorHooks;
  private readonly loop: EventLoop<OrchestratorEvent>;

  private session: Session;
  private state: OrchestratorState = 'idle';
  private skillsActive: boolean;
  private turn?: Turn;
  private compaction?: Compaction;
  private nextTurnId = 1;
  private lastWarningLevel: WarningLevel;
  private saveChain: Promise<void> = Promise.resolve();
  private idleWaiters: Array<() => void> = [];

  constructor(options: OrchestratorOptions) {
    this.registry = options.registry;
    this.executor = options.executor;
    this.client = options.client;
    this.store = options.store;
    this.settings = options.settings;
    this.hooks = options.hooks ?? {};
    this.session = options.session;
    this.skillsActive = this.computeSkillsActive();
    this.lastWarningLevel = this.getContextUsage().warningLevel;
    this.loop = new EventLoop<OrchestratorEvent>(
      event => this.handleEvent(event),
      (err, event) => this.handleLoopError(err, event),
    );
  }

  // ============================================
  // Public API
  // ============================================

  /** Queue a line of user input; returns immediately */
  submit(input: string): void {
    this.loop.post({ type: 'user_input', text: input });
  }

  /** Submit and wait until the state machine is idle again */
  async send(input: string): Promise<void> {
    this.submit(input);
    await this.waitForIdle();
  }

  /** Resolves once idle with nothing queued and pending saves written */
  waitForIdle(): Promise<void> {
    const idle = this.isSettled()
      ? Promise.resolve()
      : new Promise<void>(resolve => this.idleWaiters.push(resolve));
    return idle.then(() => this.flush());
  }

  /** Resolves once every scheduled save has been written (or has failed) */
  flush(): Promise<void> {
    return this.saveChain;
  }

  getState(): OrchestratorState {
    return this.state;
  }

  getSession(): Session {
    return this.session;
  }

  get skillsEnabled(): boolean {
    return this.skillsActive;
  }

  getContextUsage(): ContextUsage {
    return computeContextUsage(
      this.session.tokenUsage.totalTokens,
      getModelLimit(this.session.model, this.settings.contextLimit),
    );
  }

  // ============================================
  // Event dispatch
  // ============================================

  private handleEvent(event: OrchestratorEvent): void {
    switch (event.type) {
      case 'user_input':
        this.onUserInput(event.text);
        break;
      case 'save_failed':
        console.error(`⚠️ Session save failed: ${errorMessage(event.error)}`);
        break;
      case 'compaction_result':
      case 'compaction_error': {
        const compaction = this.compaction;
        if (!compaction || compaction.id !== event.compactionId) {
          console.log(`⏭ Dropping ${event.type} from abandoned compaction ${event.compactionId}`);
          break;
        }
        if (event.type === 'compaction_result') this.finishCompaction(compaction, event.summary);
        else this.failCompaction(event.error);
        break;
      }
      default: {
        const turn = this.turn;
        if (!turn || turn.id !== event.turnId) {
          console.log(`⏭ Dropping ${event.type} from abandoned turn ${event.turnId}`);
          break;
        }
        if (event.type === 'provider_result') this.onProviderResult(turn, event.response);
        else if (event.type === 'provider_error') this.failTurn(event.error);
        else if (event.type === 'skill_result') this.onSkillResult(turn, event.index, event.result);
        else this.onTypingTick(turn);
      }
    }
    this.notifyIfSettled();
  }

  private handleLoopError(err: unknown, event: OrchestratorEvent): void {
    console.error(`❌ Error handling ${event.type}:`, err);
    if (this.turn) {
      this.failTurn(err);
    } else {
      this.compaction = undefined;
      this.setState('idle');
    }
    this.notifyIfSettled();
  }

  // ============================================
  // Idle
  // ============================================

  private onUserInput(text: string): void {
    const input = text.trim();
    if (!input) return;

    const cmd = parseCommand(input);
    if (cmd) {
      const result = executeCommand(cmd, {
        endpoint: this.session.endpoint,
        model: this.session.model,
        nsfwMode: this.session.nsfwMode,
        skillsEnabled: this.skillsActive,
        skills: this.registry.listSkills(),
        contextUsage: this.getContextUsage(),
      });
      if (!result.success) {
        this.notice(result.message, 'error');
        return;
      }
      const extra = result.stateChange ? this.applyStateChange(result.stateChange) : undefined;
      if (extra !== null) {
        if (result.message) this.notice(result.message);
        if (extra) this.notice(extra);
      }
      return;
    }

    if (this.state !== 'idle') {
      this.notice('⏳ Still working on the previous message; please wait.', 'error');
      return;
    }

    this.appendMessage({ role: 'user', content: input, timestamp: new Date() });

    const turn: Turn = {
      id: this.nextTurnId++,
      round: 0,
      toolsOffered: false,
      pendingCalls: [],
      results: [],
      flushed: 0,
    };
    this.turn = turn;
    this.dispatch(turn);
  }

  // ============================================
  // AwaitingModel
  // ============================================

  private dispatch(turn: Turn): void {
    const tools = this.skillsActive && turn.round < this.settings.maxToolRounds
      ? this.registry.toToolDefinitions()
      : [];
    turn.toolsOffered = tools.length > 0;

    const request = {
      endpoint: this.session.endpoint,
      model: this.session.model,
      systemPrompt: this.settings.systemPrompt,
      messages: [...this.session.messages],
      tools: turn.toolsOffered ? tools : undefined,
    };

    this.setState('awaiting_model');
    void Promise.resolve()
      .then(() => this.client.chat(request))
      .then(
        response => this.loop.post({ type: 'provider_result', turnId: turn.id, response }),
        (error: unknown) => this.loop.post({ type: 'provider_error', turnId: turn.id, error }),
      );
  }

  private onProviderResult(turn: Turn, response: ProviderResponse): void {
    if (response.toolCalls.length > 0 && !turn.toolsOffered) {
      const reason = turn.round >= this.settings.maxToolRounds
        ? `Model kept requesting tools after ${this.settings.maxToolRounds} rounds`
        : 'Model requested tools while skills are disabled';
      this.failTurn(new ProviderError(reason));
      return;
    }

    const message: ConversationMessage = {
      role: 'assistant',
      content: response.content,
      timestamp: new Date(),
    };
    if (response.toolCalls.length > 0) {
      message.toolCalls = response.toolCalls;
    }
    this.appendMessage(message);
    this.updateContext(response);

    if (response.toolCalls.length > 0) {
      this.startSkills(turn, response.toolCalls);
    } else {
      this.startTyping(turn, message);
    }
  }

  private failTurn(error: unknown): void {
    const err = error instanceof Error ? error : new ProviderError(String(error));
    console.error(`❌ Turn failed: ${err.message}`);
    this.clearTurn();
    this.hooks.onError?.(err);
    this.setState('idle');
  }

  // ============================================
  // ExecutingSkills
  // ============================================

  private startSkills(turn: Turn, calls: ToolCallRequest[]): void {
    turn.round++;
    turn.pendingCalls = calls;
    turn.results = calls.map(() => undefined);
    turn.flushed = 0;
    this.setState('executing_skills');
    this.hooks.onToolCalls?.(calls, turn.round);

    calls.forEach((call, index) => {
      void this.executor.executeToolCall(call).then(
        result => this.loop.post({ type: 'skill_result', turnId: turn.id, index, result }),
        (error: unknown) => this.loop.post({
          type: 'skill_result',
          turnId: turn.id,
          index,
          result: { success: false, errorMessage: errorMessage(error), errorType: 'Error', timestamp: new Date() },
        }),
      );
    });
  }

  /** Buffer out-of-order completions; append tool messages in request order */
  private onSkillResult(turn: Turn, index: number, result: ExecutionResult): void {
    if (turn.results[index] !== undefined) return;
    turn.results[index] = result;

    let next = turn.results[turn.flushed];
    while (next !== undefined) {
      const call = turn.pendingCalls[turn.flushed];
      this.appendMessage({
        role: 'tool',
        content: formatToolContent(call.functionName, next),
        toolCallId: call.id,
        timestamp: new Date(),
      });
      turn.flushed++;
      next = turn.results[turn.flushed];
    }

    if (turn.flushed === turn.pendingCalls.length) {
      turn.pendingCalls = [];
      turn.results = [];
      turn.flushed = 0;
      this.dispatch(turn);
    }
  }

  // ============================================
  // TypingSimulation
  // ============================================

  private startTyping(turn: Turn, message: ConversationMessage): void {
    turn.typing = { message, revealed: 0 };
    this.setState('typing');
    if (!message.content) {
      this.finishTyping(message);
      return;
    }
    this.scheduleTick(turn);
  }

  private scheduleTick(turn: Turn): void {
    turn.timer = setTimeout(() => {
      turn.timer = undefined;
      this.loop.post({ type: 'typing_tick', turnId: turn.id });
    }, this.settings.typing.tickMs);
  }

  private onTypingTick(turn: Turn): void {
    const typing = turn.typing;
    if (!typing) return;

    const content = typing.message.content;
    typing.revealed = Math.min(content.length, typing.revealed + Math.max(1, this.settings.typing.charsPerTick));
    this.hooks.onTyping?.(content.slice(0, typing.revealed));

    if (typing.revealed >= content.length) {
      this.finishTyping(typing.message);
    } else {
      this.scheduleTick(turn);
    }
  }

  private finishTyping(message: ConversationMessage): void {
    this.turn = undefined;
    this.hooks.onReply?.(message);
    this.setState('idle');
    if (this.settings.autoCompact && shouldCompact(this.getContextUsage())) {
      this.startCompaction(true);
    }
  }

  // ============================================
  // Compacting
  // ============================================

  /** Returns a line to show when there is nothing to do */
  private startCompaction(auto: boolean): string | undefined {
    const usage = this.getContextUsage();
    const target = auto ? compactionTarget(usage.maxTokens) : Math.floor(usage.currentTokens / 2);
    const messages = this.session.messages;
    const count = planCompaction(messages, usage.currentTokens, target);
    if (count === 0) {
      return auto ? undefined : 'Nothing to compact yet.';
    }

    const compaction: Compaction = {
      id: this.nextTurnId++,
      count,
      auto,
      messagesBefore: messages.length,
      tokensBefore: usage.currentTokens,
    };
    this.compaction = compaction;
    this.setState('compacting');
    console.log(`🗜 Summarizing ${count} of ${messages.length} messages`);

    const request: ChatRequest = {
      endpoint: this.session.endpoint,
      model: this.session.model,
      systemPrompt: SUMMARIZER_PROMPT,
      messages: [{ role: 'user', content: buildSummaryPrompt(messages.slice(0, count)), timestamp: new Date() }],
    };
    void Promise.resolve()
      .then(() => this.client.chat(request))
      .then(
        response => this.loop.post({ type: 'compaction_result', compactionId: compaction.id, summary: response.content }),
        (error: unknown) => this.loop.post({ type: 'compaction_error', compactionId: compaction.id, error }),
      );
    return undefined;
  }

  private finishCompaction(compaction: Compaction, summary: string): void {
    if (!summary.trim()) {
      this.failCompaction(new ProviderError('Summarizer returned an empty summary'));
      return;
    }
    this.compaction = undefined;
    this.session.messages = applyCompaction(this.session.messages, compaction.count, summary);
    this.session.tokenUsage = estimateUsage(this.session.messages);
    this.touch();
    this.publishContext();

    const message = formatCompactionResult({
      messagesBefore: compaction.messagesBefore,
      messagesAfter: this.session.messages.length,
      tokensBefore: compaction.tokensBefore,
      tokensAfter: this.session.tokenUsage.totalTokens,
    }, compaction.auto);
    console.log(`🗜 ${message}`);
    this.notice(message);
    this.setState('idle');
  }

  private failCompaction(error: unknown): void {
    this.compaction = undefined;
    console.error(`⚠️ Compaction failed: ${errorMessage(error)}`);
    this.notice(`Compaction failed: ${errorMessage(error)}`, 'error');
    this.setState('idle');
  }

  // ============================================
  // Commands
  // ============================================

  /**
   * Apply a command's state change. Returns an extra line to show, or null
   * when the command's own message should be suppressed.
   */
  private applyStateChange(change: StateChange): string | null | undefined {
    if (change.clearHistory) {
      this.abandonTurn();
      this.session.messages = [];
      this.session.tokenUsage = emptyTokenUsage();
      this.touch();
      this.publishContext();
      return undefined;
    }

    if (change.nsfwMode === true) {
      if (this.session.nsfwMode) {
        this.notice('Already in NSFW mode.');
        return null;
      }
      this.session.safeEndpoint = this.session.endpoint;
      this.session.nsfwMode = true;
      return this.switchEndpoint(NSFW_ENDPOINT);
    }

    if (change.nsfwMode === false) {
      if (!this.session.nsfwMode) {
        this.notice('Already in safe mode.');
        return null;
      }
      const endpoint = this.session.safeEndpoint ?? FALLBACK_SAFE_ENDPOINT;
      this.session.nsfwMode = false;
      this.session.safeEndpoint = undefined;
      return this.switchEndpoint(endpoint);
    }

    if (change.endpoint) {
      if (this.session.nsfwMode && change.endpoint !== NSFW_ENDPOINT) {
        this.session.nsfwMode = false;
        this.session.safeEndpoint = undefined;
      }
      return this.switchEndpoint(change.endpoint);
    }

    if (change.model) {
      const wasActive = this.skillsActive;
      this.session.model = change.model;
      this.skillsActive = this.computeSkillsActive();
      this.touch();
      this.publishContext();
      if (wasActive && !this.skillsActive) {
        return `Skills disabled: ${change.model} does not support function calling`;
      }
      if (!wasActive && this.skillsActive) {
        return 'Skills enabled';
      }
      return undefined;
    }

    if (change.compact) {
      if (this.state !== 'idle') {
        this.notice('⏳ Still working on the previous message; please wait.', 'error');
        return null;
      }
      return this.startCompaction(false);
    }

    if (change.session) {
      return this.applySessionAction(change.session);
    }
    return undefined;
  }

  private switchEndpoint(endpoint: string): string {
    const selection = resolveEndpointModel(endpoint, this.session.model);
    this.session.endpoint = endpoint;
    this.session.model = selection.model;
    this.skillsActive = this.computeSkillsActive();
    this.touch();
    this.publishContext();
    console.log(`🔄 Endpoint ${endpoint}, model ${selection.model}, skills ${this.skillsActive ? 'on' : 'off'}`);
    return `Model: ${selection.model} (skills ${this.skillsActive ? 'enabled' : 'disabled'})`;
  }

  private applySessionAction(action: SessionAction): string | undefined {
    try {
      switch (action.action) {
        case 'new': {
          this.abandonTurn();
          const session = this.store.create({
            endpoint: this.session.endpoint,
            model: this.session.model,
            nsfwMode: this.session.nsfwMode,
            safeEndpoint: this.session.safeEndpoint,
            name: action.name,
          });
          this.replaceSession(session);
          return `🆕 New session ${session.id}`;
        }
        case 'resume': {
          if (action.sessionId === this.session.id) {
            return `Already in session ${action.sessionId}`;
          }
          const session = this.store.load(action.sessionId);
          if (!session) {
            this.notice(`Session not found: ${action.sessionId}`, 'error');
            return undefined;
          }
          this.abandonTurn();
          this.replaceSession(session);
          return `📂 Resumed session ${session.id} (${session.messages.length} messages, ${session.endpoint}/${session.model})`;
        }
        case 'list': {
          const sessions = this.store.list();
          if (sessions.length === 0) return 'No saved sessions.';
          const lines = ['💾 Sessions:'];
          for (const s of sessions) {
            const marker = s.id === this.session.id ? '▶' : ' ';
            const label = s.name ? ` "${s.name}"` : '';
            lines.push(`${marker} ${s.id}${label}  ${s.messageCount} messages  ${s.endpoint}/${s.model}  ${s.updatedAt.toISOString()}`);
          }
          return lines.join('\n');
        }
        case 'delete': {
          if (action.sessionId === this.session.id) {
            this.notice('Cannot delete the active session; switch to another one first.', 'error');
            return undefined;
          }
          if (!this.store.delete(action.sessionId)) {
            this.notice(`Session not found: ${action.sessionId}`, 'error');
            return undefined;
          }
          console.log(`🗑 Session deleted: ${action.sessionId}`);
          return `🗑 Deleted session ${action.sessionId}`;
        }
        case 'export': {
          const session = action.sessionId && action.sessionId !== this.session.id
            ? this.store.load(action.sessionId)
            : this.session;
          if (!session) {
            this.notice(`Session not found: ${action.sessionId}`, 'error');
            return undefined;
          }
          const filePath = exportSession(session, action.format, this.settings.exportDir);
          return `📤 Exported session ${session.id} (${action.format}) to ${filePath}`;
        }
        case 'stats':
          return formatUsageStats(this.store.stats());
        case 'info': {
          const s = this.session;
          return [
            `💾 Session ${s.id}${s.name ? ` "${s.name}"` : ''}`,
            `Endpoint: ${s.endpoint}  Model: ${s.model}${s.nsfwMode ? '  (NSFW)' : ''}`,
            `Messages: ${s.messages.length}  Context: ${formatContextSummary(this.getContextUsage())}`,
            `Created: ${s.createdAt.toISOString()}`,
          ].join('\n');
        }
      }
    } catch (err) {
      console.error(`⚠️ Session ${action.action} failed:`, err);
      const label = action.action === 'export' ? 'Export failed' : 'Session store error';
      this.notice(`${label}: ${errorMessage(err)}`, 'error');
      return undefined;
    }
  }

  private replaceSession(session: Session): void {
    this.session = session;
    this.skillsActive = this.computeSkillsActive();
    this.lastWarningLevel = this.getContextUsage().warningLevel;
    this.hooks.onContextUpdate?.(this.getContextUsage());
  }

  // ============================================
  // Helpers
  // ============================================

  private computeSkillsActive(): boolean {
    return this.settings.skillsEnabled
      && !this.session.nsfwMode
      && endpointSupportsTools(this.session.endpoint)
      && modelSupportsTools(this.session.model, this.session.endpoint);
  }

  private appendMessage(message: ConversationMessage): void {
    this.session.messages.push(message);
    this.touch();
  }

  /** Mark the session changed and schedule a background save */
  private touch(): void {
    this.session.updatedAt = new Date();
    this.persist();
  }

  private persist(): void {
    const snapshot: Session = {
      ...this.session,
      messages: [...this.session.messages],
      tokenUsage: { ...this.session.tokenUsage },
    };
    this.saveChain = this.saveChain
      .then(() => new Promise<void>(resolve => setImmediate(resolve)))
      .then(() => this.store.save(snapshot))
      .catch((error: unknown) => this.loop.post({ type: 'save_failed', error }));
  }

  private updateContext(response: ProviderResponse): void {
    this.session.tokenUsage = response.usage
      ? { ...response.usage }
      : estimateUsage(this.session.messages);
    this.touch();
    this.publishContext();
  }

  private publishContext(): void {
    const usage = this.getContextUsage();
    this.hooks.onContextUpdate?.(usage);
    if (usage.warningLevel !== this.lastWarningLevel && usage.warningLevel !== 'ok') {
      this.hooks.onContextWarning?.(usage, formatContextWarning(usage));
    }
    this.lastWarningLevel = usage.warningLevel;
  }

  private abandonTurn(): void {
    const id = this.turn?.id ?? this.compaction?.id;
    if (id === undefined) return;
    console.log(`⏭ Abandoning turn ${id}`);
    this.clearTurn();
    this.compaction = undefined;
    this.hooks.onTurnAbandoned?.();
    this.setState('idle');
  }

  private clearTurn(): void {
    if (this.turn?.timer) {
      clearTimeout(this.turn.timer);
    }
    this.turn = undefined;
  }

  private notice(message: string, kind: NoticeKind = 'info'): void {
    this.hooks.onNotice?.(message, kind);
  }

  private setState(state: OrchestratorState): void {
    if (state === this.state) return;
    const previous = this.state;
    this.state = state;
    this.hooks.onStateChange?.(state, previous);
  }

  private isSettled(): boolean {
    return this.state === 'idle' && !this.loop.busy && this.loop.pending === 0;
  }

  private notifyIfSettled(): void {
    if (this.state !== 'idle' || this.loop.pending > 0 || this.idleWaiters.length === 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
