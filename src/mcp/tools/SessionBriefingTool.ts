import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { BriefingStorePort } from '../../domain/ports/BriefingStorePort.js';
import { renderBriefingMarkdown } from '../../infrastructure/storage/BriefingMarkdown.js';

/**
 * MCP Tool: sessbrief_session_briefing
 * 對應 CLI: sessbrief briefing
 * 讀取已儲存的 briefing；未指定 sessionId 時取最新一份。
 */
export function registerSessionBriefingTool(server: McpServer, briefings: BriefingStorePort): void {
  server.tool(
    'sessbrief_session_briefing',
    'Read a saved session briefing (default: the most recent)',
    {
      sessionId: z.string().optional().describe('Session whose briefing to read'),
    },
    async ({ sessionId }) => {
      const id = sessionId ?? (await briefings.list())[0]?.sessionId;
      const briefing = id ? await briefings.load(id) : undefined;

      if (!briefing) {
        return {
          content: [{
            type: 'text' as const,
            text: id ? `No briefing for session "${id}".` : 'No briefings saved yet.',
          }],
          isError: true,
        };
      }

      return { content: [{ type: 'text' as const, text: renderBriefingMarkdown(briefing) }] };
    },
  );
}
