import type { Command } from 'commander';

interface BriefingOptions {
  configDir?: string;
  sessionId?: string;
  list?: boolean;
  format: string;
}

/** 註冊 briefing 指令：顯示已儲存的 briefing */
export function registerBriefingCommand(program: Command): void {
  program
    .command('briefing')
    .description('Show a saved briefing (default: the most recent one)')
    .option('--config-dir <path>', 'Configuration and data directory')
    .option('--session-id <id>', 'Session whose briefing to show')
    .option('--list', 'List saved briefings instead')
    .option('--format <format>', 'Output format: json, markdown or text', 'markdown')
    .action(async (opts: BriefingOptions) => {
      const { bootstrap } = await import('../container.js');
      const { OutputFormatter, parseOutputFormat } = await import('../formatters/OutputFormatter.js');
      const format = parseOutputFormat(opts.format);
      const { container } = bootstrap(opts.configDir);
      const formatter = new OutputFormatter();

      if (opts.list) {
        const listings = await container.briefings.list();
        process.stdout.write(formatter.formatObject(listings, format === 'json' ? 'json' : 'text') + '\n');
        return;
      }

      const sessionId = opts.sessionId ?? (await container.briefings.list())[0]?.sessionId;
      const briefing = sessionId ? await container.briefings.load(sessionId) : undefined;
      if (!briefing) {
        process.stderr.write(sessionId ? `No briefing for session "${sessionId}".\n` : 'No briefings saved yet.\n');
        process.exitCode = 1;
        return;
      }

      process.stdout.write(formatter.formatBriefing(briefing, format) + '\n');
    });
}
