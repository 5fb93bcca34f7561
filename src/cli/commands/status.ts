import type { Command } from 'commander';

interface StatusOptions {
  configDir?: string;
  format: string;
}

export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show session, briefing and insight counts')
    .option('--config-dir <path>', 'Configuration and data directory')
    .option('--format <format>', 'Output format: json or text', 'text')
    .action(async (opts: StatusOptions) => {
      const { bootstrap } = await import('../container.js');
      const { OutputFormatter, parseOutputFormat } = await import('../formatters/OutputFormatter.js');
      const format = parseOutputFormat(opts.format);
      const { container } = bootstrap(opts.configDir);
      const report = await container.status.execute();
      process.stdout.write(new OutputFormatter().formatObject(report, format) + '\n');
    });
}
