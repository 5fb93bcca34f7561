#!/usr/bin/env node

import { createRequire } from 'node:module';
import { Command, CommanderError } from 'commander';
import { registerAnalyzeCommand } from './commands/analyze.js';
import { registerSessionsCommand } from './commands/sessions.js';
import { registerBriefingCommand } from './commands/briefing.js';
import { registerStatusCommand } from './commands/status.js';
import { registerHookCommand } from './commands/hook.js';
import { registerMcpCommand } from './commands/mcp.js';
import { SessbriefError } from '../domain/errors/DomainErrors.js';

// 版本號取自 package.json
const require = createRequire(import.meta.url);
const { version } = require('../../package.json') as { version: string };

const program = new Command();

program
  .name('sessbrief')
  .description('Turn coding-agent session transcripts into post-session briefings')
  .version(version);

registerAnalyzeCommand(program);
registerSessionsCommand(program);
registerBriefingCommand(program);
registerStatusCommand(program);
registerHookCommand(program);
registerMcpCommand(program);

/** 全域錯誤處理 */
program.exitOverride();

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      process.exit(err.code === 'commander.helpDisplayed' || err.code === 'commander.version' ? 0 : err.exitCode);
    }
    const code = err instanceof SessbriefError ? ` [${err.code}]` : '';
    process.stderr.write(`Error${code}: ${err instanceof Error ? err.message : 'Unknown error'}\n`);
    process.exit(1);
  }
}

void main();
