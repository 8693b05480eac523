import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import type { IntakeSettings } from '../config';
import { ThreadStateService } from '../services/threadStateService';
import type { IncomingMessage, ThreadRef } from '../types/core';
import {
  FakeMapping,
  FakeTaskStore,
  FakeTransport,
  ScriptedClassifier,
  TEAM_CHANNEL,
  permalinkFor
} from '../testing/fakes';
import { IntakeAgent } from './intakeAgent';
import { approvalEmbed, replies } from './replies';

const THREAD: ThreadRef = { channelId: 'C1', threadTs: '1750000000.000100' };
const KEY = 'C1:1750000000.000100';
const OPENING = 'Need a banner for the spring sale on the website, due July 4';
const LINK = permalinkFor(THREAD, THREAD.threadTs);
const FIRST_TASK = `https://www.notion.so/acme/Task-${'1'.padStart(32, '0')}`;
const EXISTING_TASK = 'https://www.notion.so/acme/Task-ffffffffffffffffffffffffffffffff';

const SETTINGS: IntakeSettings = {
  notifyChannelId: TEAM_CHANNEL,
  notifyMention: '@design',
  manualFormUrl: 'https://forms.example.com/intake',
  recoveryAllowlist: [],
  projectFallbackOptions: ['Web Redesign'],
  notionDatabaseId: 'aaaabbbbccccddddeeeeffff00001111',
  taskErrorThreshold: 2,
  historyWindow: 10,
  recoveryScanLimit: 5,
  cleanupHistoryLimit: 100,
  externalCallTimeoutMs: 1000
};

describe('IntakeAgent', () => {
  let dir: string;
  let store: ThreadStateService;
  let transport: FakeTransport;
  let taskStore: FakeTaskStore;
  let mapping: FakeMapping;
  let classifier: ScriptedClassifier;
  let agent: IntakeAgent;

  const makeAgent = (settings: Partial<IntakeSettings> = {}) =>
    new IntakeAgent({
      store,
      classifier,
      taskStore,
      transport,
      mapping,
      settings: { ...SETTINGS, ...settings },
      promptTemplate: 'TEMPLATE',
      bootTime: new Date('2025-01-01T00:00:00Z')
    });

  const opening = (): IncomingMessage => ({ thread: THREAD, ts: THREAD.threadTs, userId: 'U1', content: OPENING });

  const reply = (ts: string, content: string): IncomingMessage => {
    transport.add(THREAD, { ts, authorIsBot: false, content });
    return { thread: THREAD, ts, userId: 'U1', content };
  };

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'intake-agent-'));
    store = new ThreadStateService(path.join(dir, 'intake_state.json'));
    await store.whenReady();
    transport = new FakeTransport();
    taskStore = new FakeTaskStore();
    taskStore.options = ['Web Redesign', 'Branding'];
    mapping = new FakeMapping();
    classifier = new ScriptedClassifier();
    agent = makeAgent();

    transport.add(THREAD, { ts: THREAD.threadTs, authorIsBot: false, content: OPENING });
  });

  afterEach(async () => {
    await store.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('approve', () => {
    beforeEach(() => {
      classifier.push({
        action: 'approve',
        feedback: 'Complete request.',
        data: { project: 'web redesign', title: 'Spring banner', deadline: '2025-07-04' }
      });
    });

    it('creates the task, notifies the team and confirms in the thread', async () => {
      const outcome = await agent.handleMessage(opening());

      expect(outcome).toEqual({ type: 'handled', action: 'approve', state: 'approved' });
      expect(taskStore.created).toEqual([{
        title: 'Spring banner',
        project: 'Web Redesign',
        deadline: '2025-07-04',
        content: `Original request in Slack: ${LINK}\n\nDescription:\n${OPENING}`,
        backLink: LINK
      }]);

      const record = await store.getThreadState(KEY);
      expect(record.state).toBe('approved');
      expect(record.taskReference).toBe(FIRST_TASK);

      expect(transport.posted).toEqual([{
        channelId: TEAM_CHANNEL,
        content: replies.teamNotification({
          mention: '@design',
          project: 'Web Redesign',
          title: 'Spring banner',
          reference: FIRST_TASK,
          threadLink: LINK,
          edited: false
        })
      }]);
      expect(transport.sent.at(-1)?.content).toEqual(approvalEmbed(replies.approvalBody('Complete request.', FIRST_TASK)));
    });

    it('gives the classifier the state, thread date and opening message', async () => {
      await agent.handleMessage(opening());

      const [call] = classifier.calls;
      expect(call.system).toContain('Current State: init\nIs Starter Message: true\nThread Date (UTC): 2025-06-15');
      expect(call.user).toBe([
        'STARTER MESSAGE CONTENT:',
        OPENING,
        '',
        'RECENT THREAD HISTORY (oldest first):',
        '(none)',
        '',
        `Message: ${OPENING}`
      ].join('\n'));
    });

    it('ignores every later message once approved', async () => {
      await agent.handleMessage(opening());
      const outcome = await agent.handleMessage(reply('1750000100.000100', 'thanks!'));

      expect(outcome).toEqual({ type: 'skipped', state: 'approved', reason: 'already approved' });
      expect(classifier.calls).toHaveLength(1);
      expect(taskStore.created).toHaveLength(1);
    });

    it('creates one task when two messages race', async () => {
      classifier.push({ action: 'approve', data: { project: 'Web Redesign', title: 'Again' } });

      const outcomes = await Promise.all([
        agent.handleMessage(opening()),
        agent.handleMessage(reply('1750000100.000100', 'ping'))
      ]);

      expect(outcomes[0]).toEqual({ type: 'handled', action: 'approve', state: 'approved' });
      expect(outcomes[1]).toEqual({ type: 'skipped', state: 'approved', reason: 'already approved' });
      expect(taskStore.created).toHaveLength(1);
    });

    it('reuses a stored task reference instead of creating another', async () => {
      await store.updateThreadState(KEY, { state: 'waiting_edit', taskReference: EXISTING_TASK });

      const outcome = await agent.handleMessage(reply('1750000100.000100', 'edited, please check'));

      expect(outcome).toEqual({ type: 'handled', action: 'approve', state: 'approved' });
      expect(taskStore.created).toEqual([]);
      expect(transport.sentTexts()).toEqual([replies.alreadyCompleted(EXISTING_TASK)]);
      expect((await store.getThreadState(KEY)).taskReference).toBe(EXISTING_TASK);
    });

    it('asks for the project when it matches no option', async () => {
      classifier = new ScriptedClassifier([
        { action: 'approve', feedback: '', data: { project: 'Marketing', title: 'Spring banner' } }
      ]);
      agent = makeAgent();

      const outcome = await agent.handleMessage(opening());

      expect(outcome).toEqual({ type: 'handled', action: 'approve', state: 'waiting_task_details' });
      expect(transport.sentTexts()).toEqual([replies.projectClarification('Marketing', ['Web Redesign', 'Branding'])]);
      expect(taskStore.created).toEqual([]);
    });

    it('keeps the state when Notion rejects the task', async () => {
      taskStore.failCreate = true;

      const outcome = await agent.handleMessage(opening());

      expect(outcome).toEqual({ type: 'handled', action: 'approve', state: 'init' });
      expect(transport.sentTexts()).toEqual([replies.creationFailed]);
      expect((await store.getThreadState(KEY)).state).toBe('init');
    });
  });

  describe('create_task', () => {
    beforeEach(async () => {
      await store.updateThreadState(KEY, { state: 'waiting_task_details' });
    });

    it('creates the task from the reply and waits for the edit', async () => {
      classifier.push({ action: 'create_task', data: { project: 'branding', title: 'Logo refresh' } });

      const outcome = await agent.handleMessage(reply('1750000100.000100', 'Branding - Logo refresh'));

      expect(outcome).toEqual({ type: 'handled', action: 'create_task', state: 'waiting_edit' });
      expect(taskStore.created).toEqual([{
        title: 'Logo refresh',
        project: 'Branding',
        deadline: null,
        content: `Created from Slack thread: ${LINK}\n\n${OPENING}`,
        backLink: LINK
      }]);
      expect(transport.sentTexts()).toEqual([replies.taskCreated(FIRST_TASK)]);

      const record = await store.getThreadState(KEY);
      expect(record.state).toBe('waiting_edit');
      expect(record.taskReference).toBe(FIRST_TASK);
    });

    it('uses the fallback project list when Notion has none', async () => {
      taskStore.options = [];
      classifier.push({ action: 'create_task', data: { project: 'Web Redesign', title: 'Hero image' } });

      await agent.handleMessage(reply('1750000100.000100', 'Web Redesign - Hero image'));

      expect(taskStore.created[0]?.project).toBe('Web Redesign');
    });

    it('asks for the project and creates nothing when it matches no option', async () => {
      taskStore.options = ['Vexia', 'Emerald'];
      classifier.push({ action: 'create_task', data: { project: 'Foo', title: 'Landing page' } });

      const outcome = await agent.handleMessage(reply('1750000100.000100', 'Foo - Landing page'));

      expect(outcome).toEqual({ type: 'handled', action: 'create_task', state: 'waiting_task_details' });
      expect(transport.sentTexts()).toEqual([replies.projectClarification('Foo', ['Vexia', 'Emerald'])]);
      expect(transport.sentTexts()[0]).toContain('Vexia');
      expect(transport.sentTexts()[0]).toContain('Emerald');
      expect(taskStore.created).toEqual([]);
      expect((await store.getThreadState(KEY)).state).toBe('waiting_task_details');
    });

    it('files a loose deadline in the page body instead of the date property', async () => {
      classifier.push({ action: 'create_task', data: { project: 'Branding', title: 'Logo refresh', deadline: 'Feb 14' } });

      const outcome = await agent.handleMessage(reply('1750000100.000100', 'Branding - Logo refresh, by Feb 14'));

      expect(outcome).toEqual({ type: 'handled', action: 'create_task', state: 'waiting_edit' });
      expect(taskStore.created).toEqual([{
        title: 'Logo refresh',
        project: 'Branding',
        deadline: null,
        content: `Created from Slack thread: ${LINK}\n\n${OPENING}\n\nDeadline (as written): Feb 14`,
        backLink: LINK
      }]);
    });

    it('passes earlier thread messages to the classifier, without the current one', async () => {
      await transport.send(THREAD, replies.askTaskDetails);
      classifier.push({ action: 'create_task', data: { project: 'Branding', title: 'Logo refresh' } });

      await agent.handleMessage(reply('1750000100.000100', 'Branding - Logo refresh'));

      expect(classifier.calls[0].user).toContain([
        'RECENT THREAD HISTORY (oldest first):',
        `USER: ${OPENING}`,
        `BOT: ${replies.askTaskDetails}`,
        '',
        'Message: Branding - Logo refresh'
      ].join('\n'));
    });

    it('does not create a second task for a linked thread', async () => {
      await store.updateThreadState(KEY, { taskReference: EXISTING_TASK });
      classifier.push({ action: 'create_task', data: { project: 'Branding', title: 'Logo refresh' } });

      const outcome = await agent.handleMessage(reply('1750000100.000100', 'Branding - Logo refresh'));

      expect(outcome).toEqual({ type: 'handled', action: 'create_task', state: 'waiting_task_details' });
      expect(taskStore.created).toEqual([]);
      expect(transport.sentTexts()).toEqual([replies.alreadyCompleted(EXISTING_TASK)]);
    });

    it('asks again when the title is missing', async () => {
      classifier.push(
        { action: 'create_task', data: { project: 'Branding' } },
        { action: 'create_task', data: {} }
      );

      await agent.handleMessage(reply('1750000100.000100', 'Branding'));
      await agent.handleMessage(reply('1750000101.000100', 'hmm'));

      expect(transport.sentTexts()).toEqual([replies.missingTitle, replies.missingTitle]);
      expect(taskStore.created).toEqual([]);
      expect((await store.getThreadState(KEY)).state).toBe('waiting_task_details');
    });

    it('offers the manual form after repeated failures', async () => {
      taskStore.failCreate = true;
      classifier.push(
        { action: 'create_task', data: { project: 'Branding', title: 'Logo refresh' } },
        { action: 'create_task', data: { project: 'Branding', title: 'Logo refresh' } }
      );

      const first = await agent.handleMessage(reply('1750000100.000100', 'Branding - Logo refresh'));
      expect(first).toEqual({ type: 'handled', action: 'create_task', state: 'waiting_task_details' });
      expect((await store.getThreadState(KEY)).errorCount).toBe(1);

      const second = await agent.handleMessage(reply('1750000101.000100', 'try again'));
      expect(second).toEqual({ type: 'handled', action: 'create_task', state: 'waiting_edit' });

      expect(transport.sentTexts()).toEqual([
        replies.creationFailed,
        replies.manualFallback('https://forms.example.com/intake')
      ]);
      const record = await store.getThreadState(KEY);
      expect(record.state).toBe('waiting_edit');
      expect(record.errorCount).toBe(0);
    });

    it('moves a fresh thread to waiting_task_details on the first failure', async () => {
      await store.clearThreadState(KEY);
      taskStore.failCreate = true;
      classifier.push({ action: 'create_task', data: { project: 'Branding', title: 'Logo refresh' } });

      const outcome = await agent.handleMessage(opening());

      expect(outcome).toEqual({ type: 'handled', action: 'create_task', state: 'waiting_task_details' });
      expect((await store.getThreadState(KEY)).errorCount).toBe(1);
    });
  });

  describe('validate_edit', () => {
    const EDITED = 'Spring sale banner for the website homepage. Project: Web Redesign. Due 2025-07-04.';

    beforeEach(async () => {
      await store.updateThreadState(KEY, { state: 'waiting_edit' });
      transport.messagesOf(THREAD)[0].content = EDITED;
    });

    it('re-checks the edited opening message and approves it', async () => {
      classifier.push(
        { action: 'validate_edit', feedback: '' },
        {
          action: 'approve',
          valid: true,
          feedback: 'Looks good now.',
          data: { project: 'Web Redesign', title: 'Spring banner', deadline: '2025-07-04' }
        }
      );

      const outcome = await agent.handleMessage(reply('1750000100.000100', 'done, I edited it'));

      expect(outcome).toEqual({ type: 'handled', action: 'validate_edit', state: 'waiting_delete' });
      expect(classifier.calls[1].user).toBe(`STARTER MESSAGE CONTENT: ${EDITED}`);
      expect(taskStore.created).toEqual([{
        title: 'Spring banner',
        project: 'Web Redesign',
        deadline: '2025-07-04',
        content: `Original request in Slack (intake): ${LINK}\n\nContent:\n${EDITED}`,
        backLink: LINK
      }]);
      expect(transport.posted[0]?.content).toBe(replies.teamNotification({
        mention: '@design',
        project: 'Web Redesign',
        title: 'Spring banner',
        reference: FIRST_TASK,
        threadLink: LINK,
        edited: true
      }));
      expect(transport.sent.slice(-2).map(entry => entry.content)).toEqual([
        approvalEmbed(replies.approvalBody('Looks good now.', FIRST_TASK)),
        replies.offerCleanup
      ]);

      const record = await store.getThreadState(KEY);
      expect(record.state).toBe('waiting_delete');
      expect(record.taskReference).toBe(FIRST_TASK);
    });

    it('relays the feedback when the edit is still incomplete', async () => {
      classifier.push(
        { action: 'validate_edit' },
        { action: 'request_edit', valid: false, feedback: 'Still missing the deadline.' }
      );

      const outcome = await agent.handleMessage(reply('1750000100.000100', 'updated'));

      expect(outcome).toEqual({ type: 'handled', action: 'validate_edit', state: 'waiting_edit' });
      expect(transport.sentTexts()).toEqual(['Still missing the deadline.']);
      expect(taskStore.created).toEqual([]);
      expect((await store.getThreadState(KEY)).state).toBe('waiting_edit');
    });

    it('keeps the task created earlier in the thread', async () => {
      await store.updateThreadState(KEY, { taskReference: EXISTING_TASK });
      classifier.push(
        { action: 'validate_edit' },
        { action: 'approve', feedback: 'All set.', data: { project: 'Web Redesign', title: 'Spring banner' } }
      );

      const outcome = await agent.handleMessage(reply('1750000100.000100', 'link added'));

      expect(outcome).toEqual({ type: 'handled', action: 'validate_edit', state: 'waiting_delete' });
      expect(taskStore.created).toEqual([]);
      expect((await store.getThreadState(KEY)).taskReference).toBe(EXISTING_TASK);
    });

    it('runs on an edit of the opening message without a reply', async () => {
      classifier.push({ action: 'approve', valid: true, feedback: 'Great.', data: { project: 'Branding', title: 'Banner' } });

      const outcome = await agent.handleOpeningEdit(THREAD);

      expect(outcome).toEqual({ type: 'handled', action: 'validate_edit', state: 'waiting_delete' });
      expect(classifier.calls).toHaveLength(1);
      expect(taskStore.created[0]?.project).toBe('Branding');
    });

    it('leaves opening edits alone in other states', async () => {
      await store.updateThreadState(KEY, { state: 'waiting_task_details' });

      const outcome = await agent.handleOpeningEdit(THREAD);

      expect(outcome).toEqual({ type: 'skipped', state: 'waiting_task_details', reason: 'not waiting for an edit' });
      expect(classifier.calls).toHaveLength(0);
    });
  });

  describe('delete_history', () => {
    beforeEach(async () => {
      await store.updateThreadState(KEY, { state: 'waiting_delete', taskReference: EXISTING_TASK });
      await transport.send(THREAD, replies.askTaskDetails);
      await transport.send(THREAD, replies.offerCleanup);
      classifier.push({ action: 'delete_history' });
    });

    it('removes every reply, keeps the opening message and forgets the thread', async () => {
      const outcome = await agent.handleMessage(reply('1750000100.000100', 'yes'));

      expect(outcome).toEqual({ type: 'handled', action: 'delete_history', state: null });
      expect(transport.messagesOf(THREAD)).toEqual([{ ts: THREAD.threadTs, authorIsBot: false, content: OPENING }]);
      expect(transport.purgeCalls).toBe(0);

      const record = await store.getThreadState(KEY);
      expect(record.state).toBe('init');
      expect(record.taskReference).toBeUndefined();
    });

    it('falls back to purging one message at a time', async () => {
      transport.failDelete = true;

      await agent.handleMessage(reply('1750000100.000100', 'yes'));

      expect(transport.purgeCalls).toBe(1);
      expect(transport.messagesOf(THREAD).map(message => message.ts)).toEqual([THREAD.threadTs]);
      expect((await store.getThreadState(KEY)).state).toBe('init');
    });
  });

  describe('conversation actions', () => {
    it('offers to create the task for an incomplete request', async () => {
      classifier.push({ action: 'offer_creation', feedback: 'Missing deliverables.' });

      const outcome = await agent.handleMessage(opening());

      expect(outcome).toEqual({ type: 'handled', action: 'offer_creation', state: 'waiting_task_details' });
      expect(transport.sentTexts()).toEqual(['Missing deliverables.', replies.askTaskDetails]);
    });

    it('asks for an edit', async () => {
      classifier.push({ action: 'request_edit', feedback: 'Please add the audience.' });

      const outcome = await agent.handleMessage(opening());

      expect(outcome).toEqual({ type: 'handled', action: 'request_edit', state: 'waiting_edit' });
      expect(transport.sentTexts()).toEqual(['Please add the audience.']);
    });

    it('relays feedback for unknown actions without a transition', async () => {
      await store.updateThreadState(KEY, { state: 'waiting_edit' });
      classifier.push({ action: 'escalate', feedback: 'Let me check.' });

      const outcome = await agent.handleMessage(reply('1750000100.000100', '?'));

      expect(outcome).toEqual({ type: 'handled', action: 'unrecognized', state: 'waiting_edit' });
      expect(transport.sentTexts()).toEqual(['Let me check.']);
    });

    it('stays quiet on wait without feedback', async () => {
      classifier.push({ action: 'wait', feedback: '' });

      const outcome = await agent.handleMessage(opening());

      expect(outcome).toEqual({ type: 'handled', action: 'wait', state: 'init' });
      expect(transport.sent).toEqual([]);
    });
  });

  describe('failures', () => {
    it('apologizes and keeps the state when the classifier fails', async () => {
      await store.updateThreadState(KEY, { state: 'waiting_task_details', errorCount: 1 });
      const before = await store.getThreadState(KEY);
      classifier.push(new Error('overloaded'));

      const outcome = await agent.handleMessage(reply('1750000100.000100', 'Branding - Logo'));

      expect(outcome).toEqual({ type: 'error', message: 'classifier unavailable' });
      expect(transport.sentTexts()).toEqual([replies.technicalDifficulty]);
      expect(await store.getThreadState(KEY)).toEqual(before);
    });

    it('reports a failed turn instead of throwing', async () => {
      await store.updateThreadState(KEY, { state: 'waiting_task_details' });
      classifier.push({ action: 'create_task', data: { project: 'Branding', title: 'Logo refresh' } });
      vi.spyOn(store, 'updateThreadState').mockRejectedValue(new Error('disk full'));

      const outcome = await agent.handleMessage(reply('1750000100.000100', 'Branding - Logo refresh'));

      expect(outcome).toEqual({ type: 'error', message: 'Error: disk full' });
      expect(transport.sentTexts().at(-1)).toBe(replies.technicalDifficulty);
    });
  });

  describe('recovery and ignored threads', () => {
    it('adopts a recovered approval without calling the classifier', async () => {
      mapping.entries = [{ threadId: KEY, taskReference: EXISTING_TASK, status: 'approved' }];

      const outcome = await agent.handleMessage(reply('1750000100.000100', 'any news?'));

      expect(outcome).toEqual({ type: 'recovered', state: 'approved' });
      expect(classifier.calls).toHaveLength(0);
      expect((await store.getThreadState(KEY)).taskReference).toBe(EXISTING_TASK);
    });

    it('continues from a recovered non-terminal state', async () => {
      await transport.send(THREAD, replies.askTaskDetails);
      classifier.push({ action: 'wait' });

      await agent.handleMessage(reply('1750000100.000100', 'let me think'));

      expect(classifier.calls[0].system).toContain('Current State: waiting_task_details');
    });

    it('skips ignored threads', async () => {
      await store.updateThreadState(KEY, { state: 'ignored_existing' });

      const outcome = await agent.handleMessage(reply('1750000100.000100', 'hello?'));

      expect(outcome).toEqual({ type: 'skipped', state: 'ignored_existing', reason: 'thread ignored' });
      expect(transport.sent).toEqual([]);
    });

    it('picks an ignored thread back up once it is allow-listed', async () => {
      await store.updateThreadState(KEY, { state: 'ignored_existing' });
      agent = makeAgent({ recoveryAllowlist: [KEY] });
      classifier.push({ action: 'request_edit', feedback: 'Please add a deadline.' });

      const outcome = await agent.handleMessage(reply('1750000100.000100', 'hello?'));

      expect(outcome).toEqual({ type: 'handled', action: 'request_edit', state: 'waiting_edit' });
    });

    it('ignores threads opened before the bot started', async () => {
      agent = new IntakeAgent({
        store,
        classifier,
        taskStore,
        transport,
        mapping,
        settings: SETTINGS,
        promptTemplate: 'TEMPLATE',
        bootTime: new Date('2025-07-01T00:00:00Z')
      });

      const outcome = await agent.handleMessage(reply('1750000100.000100', 'hello?'));

      expect(outcome).toEqual({ type: 'recovered', state: 'ignored_existing' });
      expect((await store.getThreadState(KEY)).state).toBe('ignored_existing');
    });
  });
});
