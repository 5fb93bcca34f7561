import type { Command } from 'commander';
import path from 'node:path';

interface SessionsOptions {
  configDir?: string;
  project?: string;
  limit: string;
  format: string;
}

/** 註冊 sessions 指令：列出可分析的 session（最新的在前） */
export function registerSessionsCommand(program: Command): void {
  program
    .command('sessions')
    .description('List recorded sessions, most recent first')
    .option('--config-dir <path>', 'Configuration and data directory')
    .option('--project <path>', 'Only sessions of this project')
    .option('--limit <n>', 'Maximum number of sessions to show', '20')
    .option('--format <format>', 'Output format: json or text', 'text')
    .action(async (opts: SessionsOptions) => {
      const { bootstrap } = await import('../container.js');
      const { OutputFormatter, parseOutputFormat } = await import('../formatters/OutputFormatter.js');
      const format = parseOutputFormat(opts.format);
      const { container } = bootstrap(opts.configDir);
      const limit = parseInt(opts.limit, 10);

      const sessions = await container.source.list(opts.project ? path.resolve(opts.project) : undefined);
      const shown = Number.isFinite(limit) && limit > 0 ? sessions.slice(0, limit) : sessions;

      if (format === 'json') {
        process.stdout.write(new OutputFormatter().formatObject(shown, 'json') + '\n');
        return;
      }
      if (shown.length === 0) {
        process.stdout.write('No sessions found.\n');
        return;
      }

      const lines = shown.map((s) => {
        const prompt = s.firstPrompt.replace(/\s+/g, ' ').slice(0, 60);
        return `${s.sessionId}  ${s.modified.slice(0, 19).replace('T', ' ')}  ${s.messageCount} msgs  ${s.projectPath}\n    ${s.summary || prompt}`;
      });
      process.stdout.write(lines.join('\n') + '\n');
    });
}
