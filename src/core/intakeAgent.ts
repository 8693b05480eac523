/**
 * Intake engine - one turn of the per-thread conversation
 *
 * Resolves the thread's state (recovering it when nothing is stored), asks the
 * classifier what the latest message means, and carries out the resulting action
 * against Notion and Slack. Turns for the same thread never overlap.
 */

import type { IntakeSettings } from '../config';
import {
  Embed,
  ExtractedIntent,
  IncomingMessage,
  IntakeOutcome,
  TaskDraft,
  ThreadRef,
  TranscriptMessage,
  isOpeningMessage,
  threadCreatedAt,
  threadKey
} from '../types/core';
import { IntakeState, ThreadState, ThreadStateStore } from '../types/threadState';
import type { ConversationTransport, IntentClassifier, TaskStore, ThreadMapping } from '../types/integrations';
import { normalizeDeadline, parseIsoDate } from '../parsers/deadlineParser';
import { matchProject } from '../parsers/projectMatcher';
import { interpretIntent } from '../services/intentClassifier';
import { StateRecovery, isAllowlisted } from '../services/recoveryService';
import { KeyedLock } from '../utils/keyedLock';
import { pTimeout } from '../utils/timeout';
import { approvalEmbed, replies } from './replies';
import { buildIntakePrompt, buildRevalidationPrompt, PromptBundle } from './prompts';
import { classifyFailure, describeError } from './errors';

const DEFAULT_TITLE = 'New design request';

export interface IntakeAgentDeps {
  store: ThreadStateStore;
  classifier: IntentClassifier;
  taskStore: TaskStore;
  transport: ConversationTransport;
  mapping: ThreadMapping;
  settings: IntakeSettings;
  promptTemplate: string;
  bootTime?: Date;
}

interface TurnContext {
  thread: ThreadRef;
  key: string;
  record: ThreadState;
  referenceDate: Date;
  latest: IncomingMessage | null;
}

interface ProjectResolution {
  matched: string | null;
  options: string[];
}

export class IntakeAgent {
  private store: ThreadStateStore;
  private classifier: IntentClassifier;
  private taskStore: TaskStore;
  private transport: ConversationTransport;
  private settings: IntakeSettings;
  private promptTemplate: string;
  private recovery: StateRecovery;
  private locks = new KeyedLock();

  constructor(deps: IntakeAgentDeps) {
    this.store = deps.store;
    this.classifier = deps.classifier;
    this.taskStore = deps.taskStore;
    this.transport = deps.transport;
    this.settings = deps.settings;
    this.promptTemplate = deps.promptTemplate;
    this.recovery = new StateRecovery(deps.transport, deps.taskStore, deps.mapping, {
      notion: { databaseId: deps.settings.notionDatabaseId, workspace: deps.settings.notionWorkspace },
      allowlist: deps.settings.recoveryAllowlist,
      scanLimit: deps.settings.recoveryScanLimit,
      bootTime: deps.bootTime ?? new Date(),
      timeoutMs: deps.settings.externalCallTimeoutMs
    });
  }

  /**
   * Main entry point: one inbound message in an intake thread.
   * Never rejects.
   */
  async handleMessage(message: IncomingMessage): Promise<IntakeOutcome> {
    const key = threadKey(message.thread);
    return this.locks.run(key, () => this.guardTurn(message.thread, () => this.runTurn(message)));
  }

  /**
   * The opening message was edited. While we wait for that edit, re-check it
   * right away instead of waiting for the requester to say so.
   */
  async handleOpeningEdit(thread: ThreadRef): Promise<IntakeOutcome> {
    const key = threadKey(thread);
    return this.locks.run(key, () => this.guardTurn(thread, async () => {
      const record = await this.store.getThreadState(key);
      if (record.state !== 'waiting_edit') {
        return { type: 'skipped', state: record.state, reason: 'not waiting for an edit' };
      }

      const ctx: TurnContext = { thread, key, record, referenceDate: threadCreatedAt(thread), latest: null };
      const intent: ExtractedIntent = { action: 'validate_edit', rawAction: 'validate_edit', feedback: '', data: {} };
      const state = await this.validateEdit(ctx, intent);
      return { type: 'handled', action: 'validate_edit', state };
    }));
  }

  private async guardTurn(thread: ThreadRef, turn: () => Promise<IntakeOutcome>): Promise<IntakeOutcome> {
    try {
      return await turn();
    } catch (error) {
      console.error(`[intake] Turn failed for ${threadKey(thread)} (${classifyFailure(error)}):`, error);
      await this.say(thread, replies.technicalDifficulty);
      return { type: 'error', message: describeError(error) };
    }
  }

  private async runTurn(message: IncomingMessage): Promise<IntakeOutcome> {
    const { thread } = message;
    const key = threadKey(thread);
    let record = await this.store.getThreadState(key);

    if (record.state === 'approved') {
      return { type: 'skipped', state: record.state, reason: 'already approved' };
    }

    if (record.state === 'ignored_existing') {
      if (!isAllowlisted(thread, this.settings.recoveryAllowlist)) {
        return { type: 'skipped', state: record.state, reason: 'thread ignored' };
      }
      console.log(`[intake] ${key} is allow-listed, resetting to init`);
      record = await this.store.updateThreadState(key, { state: 'init', errorCount: 0 });
    }

    if (record.state === 'init') {
      const recovered = await this.recovery.recover(thread);
      if (recovered) {
        record = await this.store.updateThreadState(key, {
          state: recovered.state,
          taskReference: recovered.taskReference
        });
        if (recovered.state === 'approved' || recovered.state === 'ignored_existing') {
          return { type: 'recovered', state: recovered.state };
        }
      }
    }

    const ctx: TurnContext = { thread, key, record, referenceDate: threadCreatedAt(thread), latest: message };

    const bundle = await this.buildPrompt(ctx, message);
    const intent = await this.classify(bundle);
    if (!intent) {
      await this.say(thread, replies.technicalDifficulty);
      return { type: 'error', message: 'classifier unavailable' };
    }

    if (intent.action === 'unrecognized') {
      console.warn(`[intake] Unrecognized action "${intent.rawAction}" for ${key}`);
    } else {
      console.log(`[intake] ${key} [${record.state}] -> ${intent.action}`);
    }

    const state = await this.dispatch(ctx, intent);
    return { type: 'handled', action: intent.action, state };
  }

  /**
   * Returns the thread's state after the action, null once it is cleared
   */
  private async dispatch(ctx: TurnContext, intent: ExtractedIntent): Promise<IntakeState | null> {
    switch (intent.action) {
      case 'approve':
        return this.approve(ctx, intent);
      case 'offer_creation':
        await this.sayIfAny(ctx.thread, intent.feedback);
        await this.say(ctx.thread, replies.askTaskDetails);
        return this.transition(ctx, 'waiting_task_details');
      case 'create_task':
        return this.createTaskFromReply(ctx, intent);
      case 'validate_edit':
        return this.validateEdit(ctx, intent);
      case 'synthesize':
      case 'request_edit':
        await this.sayIfAny(ctx.thread, intent.feedback);
        return this.transition(ctx, 'waiting_edit');
      case 'delete_history':
        await this.deleteHistory(ctx);
        return null;
      case 'handoff':
      case 'wait':
      case 'unrecognized':
        await this.sayIfAny(ctx.thread, intent.feedback);
        return ctx.record.state;
      default:
        return assertNever(intent.action);
    }
  }

  private async approve(ctx: TurnContext, intent: ExtractedIntent): Promise<IntakeState> {
    if (ctx.record.taskReference) {
      await this.say(ctx.thread, replies.alreadyCompleted(ctx.record.taskReference));
      return this.transition(ctx, 'approved');
    }

    const project = await this.resolveProject(intent.data.project);
    if (!project.matched) {
      await this.say(ctx.thread, replies.projectClarification(intent.data.project, project.options));
      return this.transition(ctx, 'waiting_task_details');
    }

    const title = intent.data.title ?? DEFAULT_TITLE;
    const deadline = normalizeDeadline(intent.data.deadline ?? null, ctx.referenceDate);
    const opening = await this.readOpening(ctx);
    const threadLink = await this.threadLink(ctx.thread);

    const reference = await this.createRecord({
      title,
      project: project.matched,
      deadline,
      content: `Original request in Slack: ${threadLink ?? '(link unavailable)'}\n\nDescription:\n${opening}`,
      backLink: threadLink ?? undefined
    });

    if (!reference) {
      await this.say(ctx.thread, replies.creationFailed);
      return ctx.record.state;
    }

    await this.store.updateThreadState(ctx.key, { state: 'approved', taskReference: reference, errorCount: 0 });
    await this.notifyTeam({ project: project.matched, title, reference, threadLink, edited: false });
    await this.say(ctx.thread, approvalEmbed(replies.approvalBody(intent.feedback, reference)));
    return 'approved';
  }

  private async createTaskFromReply(ctx: TurnContext, intent: ExtractedIntent): Promise<IntakeState> {
    if (ctx.record.taskReference) {
      await this.say(ctx.thread, replies.alreadyCompleted(ctx.record.taskReference));
      return ctx.record.state;
    }

    const { project: rawProject, title } = intent.data;
    if (!rawProject && !title) {
      await this.say(ctx.thread, replies.missingTitle);
      return ctx.record.state;
    }

    const project = await this.resolveProject(rawProject);
    if (!project.matched) {
      await this.say(ctx.thread, replies.projectClarification(rawProject, project.options));
      return this.transition(ctx, 'waiting_task_details');
    }

    if (!title) {
      await this.say(ctx.thread, replies.missingTitle);
      return ctx.record.state;
    }

    const deadline = normalizeDeadline(intent.data.deadline ?? null, ctx.referenceDate);
    const opening = await this.readOpening(ctx);
    const threadLink = await this.threadLink(ctx.thread);

    const reference = await this.createRecord({
      title,
      project: project.matched,
      deadline,
      content: `Created from Slack thread: ${threadLink ?? '(link unavailable)'}\n\n${opening}`,
      backLink: threadLink ?? undefined
    });

    if (reference) {
      await this.store.updateThreadState(ctx.key, { state: 'waiting_edit', taskReference: reference, errorCount: 0 });
      await this.say(ctx.thread, replies.taskCreated(reference));
      return 'waiting_edit';
    }

    const errors = ctx.record.errorCount + 1;
    if (errors >= this.settings.taskErrorThreshold) {
      console.warn(`[intake] ${ctx.key} hit ${errors} task creation failures, sending manual fallback`);
      await this.say(ctx.thread, replies.manualFallback(this.settings.manualFormUrl));
      await this.store.updateThreadState(ctx.key, { state: 'waiting_edit', errorCount: 0 });
      return 'waiting_edit';
    }

    const pending: IntakeState = ctx.record.state === 'init' ? 'waiting_task_details' : ctx.record.state;
    await this.say(ctx.thread, replies.creationFailed);
    await this.store.updateThreadState(ctx.key, { state: pending, errorCount: errors });
    return pending;
  }

  /**
   * Re-check the freshly edited opening message on its own
   */
  private async validateEdit(ctx: TurnContext, intent: ExtractedIntent): Promise<IntakeState> {
    let opening: TranscriptMessage;
    try {
      opening = await this.external(this.transport.fetchMessage(ctx.thread, ctx.thread.threadTs), 'opening message');
    } catch (error) {
      console.error(`[intake] Could not fetch opening message for ${ctx.key}:`, error);
      await this.say(ctx.thread, replies.openingUnreadable);
      return ctx.record.state;
    }

    const fresh = await this.classify(buildRevalidationPrompt(this.promptTemplate, ctx.referenceDate, opening.content));
    if (!fresh) {
      await this.say(ctx.thread, replies.technicalDifficulty);
      return ctx.record.state;
    }

    const valid = fresh.valid ?? fresh.action === 'approve';
    if (!valid) {
      await this.sayIfAny(ctx.thread, fresh.feedback || intent.feedback);
      return ctx.record.state;
    }

    const threadLink = await this.threadLink(ctx.thread);
    const title = fresh.data.title ?? DEFAULT_TITLE;
    let reference = ctx.record.taskReference;
    let project = fresh.data.project ?? '';

    if (!reference) {
      const resolution = await this.resolveProject(fresh.data.project);
      if (!resolution.matched) {
        await this.say(ctx.thread, replies.projectClarification(fresh.data.project, resolution.options));
        return this.transition(ctx, 'waiting_task_details');
      }
      project = resolution.matched;

      const created = await this.createRecord({
        title,
        project,
        deadline: normalizeDeadline(fresh.data.deadline ?? null, ctx.referenceDate),
        content: `Original request in Slack (intake): ${threadLink ?? '(link unavailable)'}\n\nContent:\n${opening.content}`,
        backLink: threadLink ?? undefined
      });
      if (!created) {
        await this.say(ctx.thread, replies.creationFailed);
        return ctx.record.state;
      }
      reference = created;
    }

    await this.store.updateThreadState(ctx.key, { state: 'waiting_delete', taskReference: reference, errorCount: 0 });
    await this.notifyTeam({ project, title, reference, threadLink, edited: true });
    await this.say(ctx.thread, approvalEmbed(replies.approvalBody(fresh.feedback, reference)));
    await this.say(ctx.thread, replies.offerCleanup);
    return 'waiting_delete';
  }

  /**
   * Remove every reply, keep the opening message, forget the thread
   */
  private async deleteHistory(ctx: TurnContext): Promise<void> {
    await this.say(ctx.thread, replies.cleaningUp);
    const isOpening = (message: TranscriptMessage) => message.ts === ctx.thread.threadTs;

    try {
      const messages = await this.external(
        this.transport.history(ctx.thread, this.settings.cleanupHistoryLimit, true),
        'cleanup history'
      );
      const doomed = messages.filter(message => !isOpening(message));
      if (doomed.length > 0) {
        await this.external(this.transport.deleteMessages(ctx.thread, doomed), 'delete messages');
      }
    } catch (error) {
      console.warn(`[intake] Bulk delete failed for ${ctx.key}, falling back to purge: ${describeError(error)}`);
      try {
        const removed = await this.external(this.transport.purge(ctx.thread, isOpening), 'purge');
        console.log(`[intake] Purged ${removed} messages from ${ctx.key}`);
      } catch (purgeError) {
        console.error(`[intake] Purge failed for ${ctx.key}:`, purgeError);
      }
    }

    await this.store.clearThreadState(ctx.key);
  }

  private async buildPrompt(ctx: TurnContext, message: IncomingMessage): Promise<PromptBundle> {
    let history: TranscriptMessage[] = [];
    if (this.settings.historyWindow > 0) {
      try {
        const recent = await this.external(
          this.transport.history(ctx.thread, this.settings.historyWindow + 1, true),
          'history'
        );
        history = recent.filter(m => m.ts !== message.ts).slice(-this.settings.historyWindow);
      } catch (error) {
        console.warn(`[intake] Could not load history for ${ctx.key}: ${describeError(error)}`);
      }
    }

    return buildIntakePrompt({
      template: this.promptTemplate,
      state: ctx.record.state,
      isOpeningMessage: isOpeningMessage(message),
      referenceDate: ctx.referenceDate,
      openingContent: await this.readOpening(ctx),
      history,
      latestMessage: message.content
    });
  }

  private async classify(bundle: PromptBundle): Promise<ExtractedIntent | null> {
    try {
      const raw = await this.external(this.classifier.classify(bundle.system, bundle.user), 'classifier');
      return interpretIntent(raw);
    } catch (error) {
      console.error(`[intake] Classifier failed (${classifyFailure(error)}): ${describeError(error)}`);
      return null;
    }
  }

  private async resolveProject(raw: string | undefined): Promise<ProjectResolution> {
    let options: string[] = [];
    try {
      options = await this.external(this.taskStore.getValidProjectOptions(), 'project options');
    } catch (error) {
      console.warn(`[intake] Project options unavailable: ${describeError(error)}`);
    }
    if (options.length === 0) {
      options = [...this.settings.projectFallbackOptions];
    }
    return { matched: matchProject(raw, options), options };
  }

  /**
   * A deadline that is not a calendar date goes into the page body as written
   */
  private async createRecord(draft: TaskDraft): Promise<string | null> {
    const { deadline } = draft;
    if (deadline && !parseIsoDate(deadline)) {
      const note = `Deadline (as written): ${deadline}`;
      draft = { ...draft, deadline: null, content: draft.content ? `${draft.content}\n\n${note}` : note };
    }

    try {
      return await this.external(this.taskStore.createRecord(draft), 'create task');
    } catch (error) {
      console.error(`[intake] Task creation failed: ${describeError(error)}`);
      return null;
    }
  }

  /**
   * Full text of the opening message; falls back to the message at hand
   */
  private async readOpening(ctx: TurnContext): Promise<string> {
    if (ctx.latest && isOpeningMessage(ctx.latest)) {
      return ctx.latest.content;
    }
    try {
      const opening = await this.external(this.transport.fetchMessage(ctx.thread, ctx.thread.threadTs), 'opening message');
      return opening.content;
    } catch (error) {
      console.warn(`[intake] Opening message unavailable for ${ctx.key}: ${describeError(error)}`);
      return ctx.latest?.content ?? '';
    }
  }

  private async threadLink(thread: ThreadRef): Promise<string | null> {
    try {
      return await this.external(this.transport.permalink(thread, thread.threadTs), 'permalink');
    } catch (error) {
      console.warn(`[intake] No permalink for ${threadKey(thread)}: ${describeError(error)}`);
      return null;
    }
  }

  private async notifyTeam(args: {
    project: string;
    title: string;
    reference: string;
    threadLink: string | null;
    edited: boolean;
  }): Promise<void> {
    const channel = this.settings.notifyChannelId;
    if (!channel) return;

    const text = replies.teamNotification({
      mention: this.settings.notifyMention,
      project: args.project,
      title: args.title,
      reference: args.reference,
      threadLink: args.threadLink ?? '(link unavailable)',
      edited: args.edited
    });
    try {
      await this.external(this.transport.post(channel, text), 'team notification');
    } catch (error) {
      console.error('[intake] Failed to notify the design team:', error);
    }
  }

  private async transition(ctx: TurnContext, state: IntakeState): Promise<IntakeState> {
    await this.store.updateThreadState(ctx.key, { state });
    return state;
  }

  private async say(thread: ThreadRef, content: string | Embed): Promise<boolean> {
    try {
      await this.external(this.transport.send(thread, content), 'send');
      return true;
    } catch (error) {
      console.error(`[intake] Failed to reply in ${threadKey(thread)}:`, error);
      return false;
    }
  }

  private async sayIfAny(thread: ThreadRef, text: string): Promise<void> {
    if (text.trim()) {
      await this.say(thread, text);
    }
  }

  private external<T>(promise: Promise<T>, label: string): Promise<T> {
    return pTimeout(promise, this.settings.externalCallTimeoutMs, label);
  }
}

function assertNever(value: never): never {
  throw new Error(`Unhandled intake action: ${String(value)}`);
}
