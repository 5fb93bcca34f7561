import matter from 'gray-matter';
import type { SessionBriefing } from '../../domain/entities/Briefing.js';

/** 將 briefing 轉成帶 frontmatter 的 Markdown 文件 */
export function renderBriefingMarkdown(briefing: SessionBriefing): string {
  const lines: string[] = [
    `# Session Briefing: ${briefing.sessionId}`,
    '',
    `**Project:** ${briefing.projectPath}`,
    `**Generated:** ${briefing.createdAt}`,
    '',
    '## Summary',
    briefing.sessionSummary,
    '',
  ];

  if (briefing.whatGotBuilt.length > 0) {
    lines.push('## What Got Built');
    for (const item of briefing.whatGotBuilt) {
      lines.push(`### \`${item.file}\``);
      lines.push(item.description);
      if (item.keyCode) lines.push(`- **Key code:** ${item.keyCode}`);
      for (const decision of item.keyDecisions) lines.push(`- ${decision}`);
      lines.push('');
    }
  }

  if (briefing.howPiecesConnect) {
    lines.push('## How Pieces Connect', briefing.howPiecesConnect, '');
  }

  if (briefing.patternsUsed.length > 0) {
    lines.push('## Patterns Used');
    for (const p of briefing.patternsUsed) {
      lines.push(`- **${p.pattern}** (${p.where}): ${p.explained}`);
    }
    lines.push('');
  }

  const risk = briefing.willBiteYou;
  if (risk) {
    lines.push(
      '## Will Bite You',
      `**Issue:** ${risk.issue}`,
      `**Where:** ${risk.where}`,
      `**Why:** ${risk.why}`,
      `**What to check:** ${risk.whatToCheck}`,
      '',
    );
  }

  if (briefing.conceptsTouched.length > 0) {
    lines.push('## Concepts Touched');
    for (const c of briefing.conceptsTouched) {
      lines.push(`- **${c.concept}** [${c.developerUnderstood ? 'Y' : 'N'}] (${c.inCode}): ${c.evidence}`);
    }
    lines.push('');
  }

  return matter.stringify(lines.join('\n'), {
    session_id: briefing.sessionId,
    project_path: briefing.projectPath,
    created_at: briefing.createdAt,
  });
}
