import { z } from 'zod';

/** 觸發事件由 stdin 傳入的 JSON；其他欄位原樣保留 */
export const HookPayloadSchema = z
  .object({
    session_id: z.string().optional(),
    cwd: z.string().optional(),
  })
  .passthrough();

export type HookPayload = z.infer<typeof HookPayloadSchema>;

/** 觸發端一律回傳的完成訊號 */
export const HOOK_RESPONSE = { continue: true, suppressOutput: true } as const;

/** 空白、非 JSON 或形狀不符時回傳 undefined */
export function parseHookPayload(raw: string): HookPayload | undefined {
  if (!raw.trim()) return undefined;

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return undefined;
  }

  const parsed = HookPayloadSchema.safeParse(json);
  return parsed.success ? parsed.data : undefined;
}
