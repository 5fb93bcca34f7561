import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { StatusUseCase } from '../../application/StatusUseCase.js';

/**
 * MCP Tool: sessbrief_status
 * 對應 CLI: sessbrief status
 */
export function registerStatusTool(server: McpServer, status: StatusUseCase): void {
  server.tool(
    'sessbrief_status',
    'Show session and briefing counts, known projects and accumulated insights',
    {},
    async () => {
      const report = await status.execute();

      const lines: string[] = [
        '# sessbrief status',
        '',
        `Sessions: ${report.totalSessions}`,
        `Briefings: ${report.totalBriefings}`,
        '',
        '## Projects',
      ];
      for (const p of report.projects) lines.push(`  ${p}`);

      for (const insight of report.insights) {
        lines.push('', `## Insights: ${insight.projectPath || '(no project)'}`);
        lines.push(`  Briefings merged: ${insight.briefingCount}`);
        if (insight.recurringPatterns.length > 0) {
          lines.push(`  Patterns: ${insight.recurringPatterns.join(', ')}`);
        }
        for (const issue of insight.knownIssues) lines.push(`  Issue: ${issue}`);
      }

      return { content: [{ type: 'text' as const, text: lines.join('\n') }] };
    },
  );
}
