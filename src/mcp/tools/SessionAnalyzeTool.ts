import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { ExtractionUseCase } from '../../application/ExtractionUseCase.js';
import { renderBriefingMarkdown } from '../../infrastructure/storage/BriefingMarkdown.js';
import { errorMessage } from '../../shared/Logger.js';

/**
 * MCP Tool: sessbrief_session_analyze
 * 對應 CLI: sessbrief analyze
 */
export function registerSessionAnalyzeTool(server: McpServer, extraction: ExtractionUseCase): void {
  server.tool(
    'sessbrief_session_analyze',
    'Analyze a session (default: the most recent) and save its briefing. Calls the summarizer.',
    {
      sessionId: z.string().optional().describe('Session to analyze'),
      projectPath: z.string().optional().describe('Project path; also filters session lookup'),
    },
    async ({ sessionId, projectPath }) => {
      try {
        const result = await extraction.run({ sessionId, projectPath });
        const text = [
          renderBriefingMarkdown(result.briefing),
          '',
          `Saved: ${result.markdownPath}`,
          `Messages kept: ${result.stats.keptCount}/${result.stats.originalCount}`,
          `Change set: ${result.changeSet.provenance}, ${result.changeSet.files} file(s)`,
        ].join('\n');
        return { content: [{ type: 'text' as const, text }] };
      } catch (err) {
        return {
          content: [{ type: 'text' as const, text: `Analysis failed: ${errorMessage(err)}` }],
          isError: true,
        };
      }
    },
  );
}
