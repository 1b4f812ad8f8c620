import { randomUUID } from "node:crypto";
import type { ConverseResponse, TokenUsage } from "../converse/types";
import type { ChatCompletion, CompletionMessage, ToolCall, Usage } from "../types";
import { mapFinishReason } from "./finish-reason";

export interface CompletionMeta {
  id: string;
  model: string;
  created: number;
}

export const SYSTEM_FINGERPRINT = "fp";

export function newCompletionMeta(model: string): CompletionMeta {
  return {
    id: `chatcmpl-${randomUUID().replace(/-/g, "").slice(0, 24)}`,
    model,
    created: Math.floor(Date.now() / 1000),
  };
}

export function toUsage(usage: TokenUsage | undefined): Usage {
  const prompt = usage?.inputTokens ?? 0;
  const completion = usage?.outputTokens ?? 0;
  return { prompt_tokens: prompt, completion_tokens: completion, total_tokens: prompt + completion };
}

export function addUsage(a: Usage, b: Usage): Usage {
  return {
    prompt_tokens: a.prompt_tokens + b.prompt_tokens,
    completion_tokens: a.completion_tokens + b.completion_tokens,
    total_tokens: a.total_tokens + b.total_tokens,
  };
}

/**
 * Build the generic completion from a finished backend response. The text
 * body is the first text block; tool-use blocks become `tool_calls`.
 */
export function assembleCompletion(response: ConverseResponse, meta: CompletionMeta): ChatCompletion {
  const blocks = response.message.content;
  let text: string | undefined;
  const toolCalls: ToolCall[] = [];
  for (const block of blocks) {
    if ("text" in block) {
      text ??= block.text;
    } else if ("toolUse" in block) {
      toolCalls.push({
        id: block.toolUse.toolUseId,
        type: "function",
        function: { name: block.toolUse.name, arguments: JSON.stringify(block.toolUse.input) },
      });
    }
  }

  const message: CompletionMessage =
    toolCalls.length > 0
      ? { role: "assistant", content: text ?? null, tool_calls: toolCalls }
      : { role: "assistant", content: text ?? "" };

  return {
    id: meta.id,
    object: "chat.completion",
    created: meta.created,
    model: meta.model,
    system_fingerprint: SYSTEM_FINGERPRINT,
    choices: [{ index: 0, message, finish_reason: mapFinishReason(response.stopReason), logprobs: null }],
    usage: toUsage(response.usage),
  };
}
