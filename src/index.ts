#!/usr/bin/env node
/**
 * Intake bot entry point
 * `bot` starts the Slack listener, anything else goes to the operator CLI
 */

import { main as runCli } from './cli';
import { describeError } from './core/errors';
import { startBot } from './slack/bot';

async function main() {
  const args = process.argv.slice(2);

  if (args[0] === 'bot') {
    await startBot();
    return;
  }

  const code = await runCli(args);
  process.exit(code);
}

if (require.main === module) {
  main().catch(error => {
    console.error('Error:', describeError(error));
    process.exit(1);
  });
}
