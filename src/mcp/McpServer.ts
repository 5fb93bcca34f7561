import { McpServer as SDKMcpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { TranscriptSourcePort } from '../domain/ports/TranscriptSourcePort.js';
import type { BriefingStorePort } from '../domain/ports/BriefingStorePort.js';
import type { ExtractionUseCase } from '../application/ExtractionUseCase.js';
import type { StatusUseCase } from '../application/StatusUseCase.js';
import { registerSessionAnalyzeTool } from './tools/SessionAnalyzeTool.js';
import { registerSessionListTool } from './tools/SessionListTool.js';
import { registerSessionBriefingTool } from './tools/SessionBriefingTool.js';
import { registerStatusTool } from './tools/StatusTool.js';

/**
 * MCP Server Factory
 *
 * 建立 MCP server 實例並註冊所有工具；工具與 CLI 指令一一對應。
 */

export interface McpDependencies {
  source: TranscriptSourcePort;
  briefings: BriefingStorePort;
  extraction: ExtractionUseCase;
  status: StatusUseCase;
}

export const SERVER_NAME = 'sessbrief';
export const SERVER_VERSION = '0.1.0';

export function createMcpServer(deps: McpDependencies): SDKMcpServer {
  const server = new SDKMcpServer(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { instructions: buildInstructions() },
  );

  registerSessionAnalyzeTool(server, deps.extraction);
  registerSessionListTool(server, deps.source);
  registerSessionBriefingTool(server, deps.briefings);
  registerStatusTool(server, deps.status);

  return server;
}

/** 建構 MCP server 的 instructions 文字 */
export function buildInstructions(): string {
  return [
    'sessbrief: post-session briefings built from coding-agent transcripts and the code they changed.',
    '',
    'Available tools:',
    '- sessbrief_session_list: List recorded sessions, most recent first',
    '- sessbrief_session_analyze: Analyze a session now and save its briefing',
    '- sessbrief_session_briefing: Read a saved briefing',
    '- sessbrief_status: Session and briefing counts plus accumulated project insights',
    '',
    'Typical workflow:',
    '1. sessbrief_session_briefing to see what the last session changed',
    '2. sessbrief_session_analyze when no briefing exists yet (this calls the summarizer and may take a while)',
    '3. sessbrief_status to review recurring patterns and known issues per project',
  ].join('\n');
}
