import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { TranscriptSourcePort } from '../../domain/ports/TranscriptSourcePort.js';

/**
 * MCP Tool: sessbrief_session_list
 * 列出 sessions（最新的在前），可依專案過濾。
 */
export function registerSessionListTool(server: McpServer, source: TranscriptSourcePort): void {
  server.tool(
    'sessbrief_session_list',
    'List recorded sessions, most recent first',
    {
      projectPath: z.string().optional().describe('Only sessions of this project'),
      limit: z.number().int().positive().optional().default(10)
        .describe('Maximum number of sessions to return'),
    },
    async ({ projectPath, limit }) => {
      const sessions = (await source.list(projectPath)).slice(0, limit);

      const lines: string[] = [`Found ${sessions.length} session(s)\n`];
      for (const s of sessions) {
        const date = s.modified.slice(0, 19).replace('T', ' ');
        lines.push(`- ${s.sessionId}  ${date}  msgs:${s.messageCount}  ${s.projectPath}`);
        if (s.summary) lines.push(`    ${s.summary}`);
      }

      return { content: [{ type: 'text' as const, text: lines.join('\n') }] };
    },
  );
}
