import type { FinishReason } from "../types";

const FINISH_REASONS: ReadonlyMap<string, FinishReason> = new Map([
  ["tool_use", "tool_calls"],
  ["finished", "stop"],
  ["end_turn", "stop"],
  ["stop_sequence", "stop"],
  ["complete", "stop"],
  ["max_tokens", "length"],
  ["content_filtered", "content_filter"],
]);

/** Backend stop reason to generic finish reason. Unknown reasons pass through lower-cased. */
export function mapFinishReason(reason: string | null | undefined): FinishReason | null {
  if (reason === null || reason === undefined) return null;
  const key = reason.toLowerCase();
  return FINISH_REASONS.get(key) ?? key;
}
