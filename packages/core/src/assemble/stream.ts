import type { ConverseStreamEvent, ToolUseBlock } from "../converse/types";
import { errorMessage } from "../errors";
import { JsonValueSchema, parseJson } from "../json";
import type { ChatCompletionChunk, ChunkDelta, FinishReason, Usage } from "../types";
import { mapFinishReason } from "./finish-reason";
import { type CompletionMeta, SYSTEM_FINGERPRINT, toUsage } from "./response";

export type AssemblerState = "awaiting-message" | "in-text" | "in-tool-call" | "done";

export interface PendingToolCall {
  toolUseId: string;
  name: string;
  /** Position among the message's tool calls; the outward delta index */
  ordinal: number;
  fragments: string[];
}

export type ParsedToolCalls =
  | { ok: true; toolUses: ToolUseBlock[] }
  | { ok: false; call: PendingToolCall; raw: string; error: string };

/**
 * Turns one backend stream (one leg) into outward chunks, at most one chunk
 * per event. Keeps the leg's assistant text and the argument fragments of
 * each tool call so the caller can continue the conversation afterwards.
 */
export class StreamAssembler {
  private _state: AssemblerState = "awaiting-message";
  private readonly text: string[] = [];
  // Keyed by content block index
  private readonly calls = new Map<number, PendingToolCall>();
  private _finishReason: FinishReason | null = null;
  private _usage: Usage | undefined;

  constructor(
    private readonly meta: CompletionMeta,
    private readonly includeUsage: boolean,
  ) {}

  get state(): AssemblerState {
    return this._state;
  }

  get finishReason(): FinishReason | null {
    return this._finishReason;
  }

  get usage(): Usage | undefined {
    return this._usage;
  }

  get assistantText(): string {
    return this.text.join("");
  }

  get toolCalls(): PendingToolCall[] {
    return [...this.calls.values()];
  }

  consume(event: ConverseStreamEvent): ChatCompletionChunk | undefined {
    switch (event.type) {
      case "messageStart":
        this._state = "awaiting-message";
        return this.chunk({ role: "assistant" });

      case "contentBlockStart": {
        if (!event.toolUse) return undefined;
        const call: PendingToolCall = {
          toolUseId: event.toolUse.toolUseId,
          name: event.toolUse.name,
          ordinal: this.calls.size,
          fragments: [],
        };
        this.calls.set(event.contentBlockIndex, call);
        this._state = "in-tool-call";
        return this.chunk({
          tool_calls: [
            { index: call.ordinal, id: call.toolUseId, type: "function", function: { name: call.name, arguments: "" } },
          ],
        });
      }

      case "contentBlockDelta": {
        const delta = event.delta;
        switch (delta.kind) {
          case "text":
            this._state = "in-text";
            this.text.push(delta.text);
            return this.chunk({ content: delta.text });
          case "toolUse": {
            const call = this.calls.get(event.contentBlockIndex);
            if (!call) return undefined;
            call.fragments.push(delta.input);
            return this.chunk({ tool_calls: [{ index: call.ordinal, function: { arguments: delta.input } }] });
          }
          case "reasoning":
            return undefined;
        }
      }

      case "contentBlockStop":
        return undefined;

      case "messageStop":
        this._state = "done";
        this._finishReason = mapFinishReason(event.stopReason);
        return this.chunk({}, this._finishReason);

      case "metadata":
        if (!event.usage) return undefined;
        this._usage = toUsage(event.usage);
        if (!this.includeUsage) return undefined;
        return { ...this.envelope([]), usage: this._usage };
    }
  }

  /** Parse every accumulated argument buffer. The first malformed buffer fails the whole set. */
  parseToolCalls(): ParsedToolCalls {
    const toolUses: ToolUseBlock[] = [];
    for (const call of this.calls.values()) {
      const raw = call.fragments.join("");
      try {
        const input = raw.trim() === "" ? {} : parseJson(raw, JsonValueSchema);
        toolUses.push({ toolUseId: call.toolUseId, name: call.name, input });
      } catch (err) {
        return { ok: false, call, raw, error: errorMessage(err) };
      }
    }
    return { ok: true, toolUses };
  }

  /** An assistant-text chunk that no backend event produced. */
  synthetic(content: string, finishReason: FinishReason | null = "stop"): ChatCompletionChunk {
    return this.chunk({ role: "assistant", content }, finishReason);
  }

  private chunk(delta: ChunkDelta, finishReason: FinishReason | null = null): ChatCompletionChunk {
    return this.envelope([{ index: 0, delta, finish_reason: finishReason, logprobs: null }]);
  }

  private envelope(choices: ChatCompletionChunk["choices"]): ChatCompletionChunk {
    return {
      id: this.meta.id,
      object: "chat.completion.chunk",
      created: this.meta.created,
      model: this.meta.model,
      system_fingerprint: SYSTEM_FINGERPRINT,
      choices,
    };
  }
}
