import type { Command } from 'commander';

interface McpOptions {
  configDir?: string;
}

/**
 * 註冊 mcp 指令
 *
 * 用法：
 *   sessbrief mcp [--config-dir <path>]
 */
export function registerMcpCommand(program: Command): void {
  program
    .command('mcp')
    .description('Start the MCP server on stdio')
    .option('--config-dir <path>', 'Configuration and data directory')
    .action(async (opts: McpOptions) => {
      const { bootstrap } = await import('../container.js');
      const { createMcpServer } = await import('../../mcp/McpServer.js');
      const { startStdioTransport } = await import('../../mcp/transports/StdioTransport.js');
      const { container } = bootstrap(opts.configDir);
      const server = createMcpServer(container);

      // stdio 模式：持續執行直到 stdin 關閉
      await startStdioTransport(server);

      process.on('SIGINT', () => {
        void server.close().finally(() => process.exit(0));
      });
    });
}
