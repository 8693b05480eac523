#!/usr/bin/env node
/**
 * Operator CLI for the intake bot
 * Usage: npm run cli -- state C0123:1700000000.000100
 */

import { WebClient } from '@slack/web-api';
import { Env, loadConfig, requireKeys } from './config';
import { normalizeDeadline } from './parsers/deadlineParser';
import { matchProject } from './parsers/projectMatcher';
import { createNotionService } from './services/factory';
import { ThreadStateService } from './services/threadStateService';
import { describeError } from './core/errors';

const USAGE = `
Intake bot CLI

Commands:
  state <channel:threadTs>                 Show the stored record for a thread
  clear <channel:threadTs>                 Forget a thread (it starts over at init)
  ignore <channel:threadTs>                Mark a thread as ignored_existing
  link <channelId> <threadTs> <notionUrl>  Link an existing Notion task and mark the thread approved
  normalize-date <date> [referenceIso]     Show how a deadline would be stored
  match-project <name>                     Match a project name against the Notion options
`;

async function withStore<T>(env: Env, work: (store: ThreadStateService) => Promise<T>): Promise<T> {
  const store = new ThreadStateService(env.INTAKE_STATE_PATH);
  await store.whenReady();
  try {
    return await work(store);
  } finally {
    await store.close();
  }
}

export async function main(args: string[] = process.argv.slice(2)): Promise<number> {
  const [command, ...rest] = args;
  const env = loadConfig();

  switch (command) {
    case 'state': {
      const [key] = rest;
      if (!key) break;
      await withStore(env, async store => {
        const record = await store.getThreadState(key);
        console.log(JSON.stringify(record, null, 2));
      });
      return 0;
    }

    case 'clear': {
      const [key] = rest;
      if (!key) break;
      await withStore(env, store => store.clearThreadState(key));
      console.log(`✅ Cleared ${key}`);
      return 0;
    }

    case 'ignore': {
      const [key] = rest;
      if (!key) break;
      await withStore(env, store => store.updateThreadState(key, { state: 'ignored_existing' }));
      console.log(`✅ ${key} is now ignored_existing`);
      return 0;
    }

    case 'link': {
      const [channelId, threadTs, notionUrl] = rest;
      if (!channelId || !threadTs || !notionUrl) break;
      requireKeys(env, ['SLACK_BOT_TOKEN']);

      const slack = new WebClient(env.SLACK_BOT_TOKEN);
      const { permalink } = await slack.chat.getPermalink({ channel: channelId, message_ts: threadTs });
      if (!permalink) {
        console.error('❌ Slack returned no permalink for that thread');
        return 1;
      }

      const linked = await createNotionService(env).linkRecordToThread(notionUrl, permalink);
      if (!linked) {
        console.error('❌ Could not update the Notion page');
        return 1;
      }

      const key = `${channelId}:${threadTs}`;
      await withStore(env, store => store.updateThreadState(key, {
        state: 'approved',
        taskReference: notionUrl,
        errorCount: 0
      }));
      console.log(`✅ ${key} linked to ${notionUrl}`);
      return 0;
    }

    case 'normalize-date': {
      const [raw, reference] = rest;
      if (!raw) break;
      const referenceDate = reference ? new Date(reference) : new Date();
      if (Number.isNaN(referenceDate.getTime())) {
        console.error(`❌ Invalid reference date: ${reference}`);
        return 1;
      }
      console.log(normalizeDeadline(raw, referenceDate) ?? '(none)');
      return 0;
    }

    case 'match-project': {
      const name = rest.join(' ');
      if (!name) break;
      let options = await createNotionService(env).getValidProjectOptions();
      if (options.length === 0) {
        console.log('Notion options unavailable, using PROJECT_FALLBACK_OPTIONS');
        options = env.PROJECT_FALLBACK_OPTIONS;
      }
      console.log(matchProject(name, options) ?? '(no match)');
      return 0;
    }
  }

  console.log(USAGE);
  return command ? 1 : 0;
}

if (require.main === module) {
  main()
    .then(code => process.exit(code))
    .catch(error => {
      console.error('❌ Error:', describeError(error));
      process.exit(1);
    });
}
