import type { Command } from 'commander';
import { createTrigger } from '../triggerContainer.js';
import { HOOK_RESPONSE, parseHookPayload } from '../../application/dto/HookPayload.js';
import type { HookPayload } from '../../application/dto/HookPayload.js';
import { Logger, errorMessage } from '../../shared/Logger.js';

export interface HookOptions {
  configDir?: string;
}

export type HookEvent = 'stop' | 'pre-compact';

/** 事件 JSON 的來源與完成訊號的去處 */
export interface HookIO {
  readInput(): Promise<string>;
  writeOutput(text: string): void;
}

async function readStdin(): Promise<string> {
  if (process.stdin.isTTY) return '';
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

const processIO: HookIO = {
  readInput: readStdin,
  writeOutput: (text) => {
    process.stdout.write(text);
  },
};

/** 觸發端：不論結果都回傳完成訊號；回傳值為結束碼，一律為 0 */
export async function runHook(event: HookEvent, opts: HookOptions, io: HookIO = processIO): Promise<number> {
  const logger = new Logger('hook');
  try {
    const payload: HookPayload | undefined = parseHookPayload(await io.readInput());
    const trigger = createTrigger(opts.configDir);
    const outcome = event === 'stop'
      ? trigger.onStop(payload)
      : trigger.onPreCompact(payload);
    logger.debug('Hook handled', { event, outcome, sessionId: payload?.session_id });
  } catch (err) {
    logger.error('Hook failed', { event, error: errorMessage(err) });
  }
  io.writeOutput(JSON.stringify(HOOK_RESPONSE));
  return 0;
}

/**
 * 註冊 hook 指令群組
 *
 * 用法（由 agent 的 hook 設定呼叫，stdin 為事件 JSON）：
 *   sessbrief hook stop
 *   sessbrief hook pre-compact
 */
export function registerHookCommand(program: Command): void {
  const hookCmd = program
    .command('hook')
    .description('Trigger entry points for agent lifecycle events');

  hookCmd
    .command('stop')
    .description('Turn finished: start a background analysis unless one is running')
    .option('--config-dir <path>', 'Configuration and data directory')
    .action(async (opts: HookOptions) => {
      process.exitCode = await runHook('stop', opts);
    });

  hookCmd
    .command('pre-compact')
    .description('Context about to be compacted: start a snapshot analysis')
    .option('--config-dir <path>', 'Configuration and data directory')
    .action(async (opts: HookOptions) => {
      process.exitCode = await runHook('pre-compact', opts);
    });
}
