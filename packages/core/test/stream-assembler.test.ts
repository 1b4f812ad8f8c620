import { describe, expect, it } from "vitest";
import type { CompletionMeta } from "../src/assemble/response";
import { StreamAssembler } from "../src/assemble/stream";
import type { ConverseStreamEvent } from "../src/converse/types";
import type { ChatCompletionChunk } from "../src/types";
import { toolStream } from "./helpers";

const META: CompletionMeta = { id: "chatcmpl-test", model: "test-model", created: 1_700_000_000 };

function feed(assembler: StreamAssembler, events: ConverseStreamEvent[]): ChatCompletionChunk[] {
  const chunks: ChatCompletionChunk[] = [];
  for (const event of events) {
    const chunk = assembler.consume(event);
    if (chunk) chunks.push(chunk);
  }
  return chunks;
}

describe("StreamAssembler", () => {
  it("opens a message with a role-only delta", () => {
    const assembler = new StreamAssembler(META, false);
    expect(assembler.consume({ type: "messageStart", role: "assistant" })).toEqual({
      id: "chatcmpl-test",
      object: "chat.completion.chunk",
      created: 1_700_000_000,
      model: "test-model",
      system_fingerprint: "fp",
      choices: [{ index: 0, delta: { role: "assistant" }, finish_reason: null, logprobs: null }],
    });
    expect(assembler.state).toBe("awaiting-message");
  });

  it("emits text fragments and keeps the assistant text", () => {
    const assembler = new StreamAssembler(META, false);
    const chunks = feed(assembler, [
      { type: "messageStart", role: "assistant" },
      { type: "contentBlockDelta", contentBlockIndex: 0, delta: { kind: "text", text: "Hel" } },
      { type: "contentBlockDelta", contentBlockIndex: 0, delta: { kind: "text", text: "lo" } },
    ]);
    expect(chunks.map((c) => c.choices[0].delta.content)).toEqual([undefined, "Hel", "lo"]);
    expect(assembler.state).toBe("in-text");
    expect(assembler.assistantText).toBe("Hello");
  });

  it("introduces a tool call and forwards raw argument fragments", () => {
    const assembler = new StreamAssembler(META, false);
    const chunks = feed(
      assembler,
      toolStream([{ id: "t1", name: "weather", fragments: ['{"ci', 'ty":"Oslo"}'] }], "Checking"),
    );
    const toolDeltas = chunks.flatMap((c) => c.choices[0]?.delta.tool_calls ?? []);
    expect(toolDeltas).toEqual([
      { index: 0, id: "t1", type: "function", function: { name: "weather", arguments: "" } },
      { index: 0, function: { arguments: '{"ci' } },
      { index: 0, function: { arguments: 'ty":"Oslo"}' } },
    ]);
    expect(assembler.parseToolCalls()).toEqual({
      ok: true,
      toolUses: [{ toolUseId: "t1", name: "weather", input: { city: "Oslo" } }],
    });
  });

  it("numbers parallel tool calls by their position in the message", () => {
    const assembler = new StreamAssembler(META, false);
    feed(
      assembler,
      toolStream([
        { id: "t1", name: "a", fragments: ["{}"] },
        { id: "t2", name: "b", fragments: ['{"x":', "2}"] },
      ]),
    );
    expect(assembler.toolCalls.map((c) => [c.toolUseId, c.ordinal])).toEqual([
      ["t1", 0],
      ["t2", 1],
    ]);
  });

  it("ends with the mapped finish reason", () => {
    const assembler = new StreamAssembler(META, false);
    const chunk = assembler.consume({ type: "messageStop", stopReason: "tool_use" });
    expect(chunk?.choices).toEqual([{ index: 0, delta: {}, finish_reason: "tool_calls", logprobs: null }]);
    expect(assembler.state).toBe("done");
    expect(assembler.finishReason).toBe("tool_calls");
  });

  it("emits a usage-only chunk only when usage was requested", () => {
    const event: ConverseStreamEvent = { type: "metadata", usage: { inputTokens: 30, outputTokens: 9, totalTokens: 39 } };
    const quiet = new StreamAssembler(META, false);
    expect(quiet.consume(event)).toBeUndefined();
    expect(quiet.usage).toEqual({ prompt_tokens: 30, completion_tokens: 9, total_tokens: 39 });

    const chunk = new StreamAssembler(META, true).consume(event);
    expect(chunk?.choices).toEqual([]);
    expect(chunk?.usage).toEqual({ prompt_tokens: 30, completion_tokens: 9, total_tokens: 39 });
  });

  it("drops reasoning and plain block boundaries", () => {
    const assembler = new StreamAssembler(META, false);
    expect(
      assembler.consume({ type: "contentBlockDelta", contentBlockIndex: 0, delta: { kind: "reasoning", text: "hmm" } }),
    ).toBeUndefined();
    expect(assembler.consume({ type: "contentBlockStart", contentBlockIndex: 0 })).toBeUndefined();
    expect(assembler.consume({ type: "contentBlockStop", contentBlockIndex: 0 })).toBeUndefined();
  });

  it("reports the first malformed argument buffer", () => {
    const assembler = new StreamAssembler(META, false);
    feed(assembler, toolStream([{ id: "t1", name: "weather", fragments: ['{"city":'] }]));
    const parsed = assembler.parseToolCalls();
    expect(parsed.ok).toBe(false);
    if (parsed.ok) return;
    expect(parsed.call.name).toBe("weather");
    expect(parsed.raw).toBe('{"city":');
  });

  it("reconstructs arguments from fragments split at any point", () => {
    const args = { city: "Zürich", days: [1, 2, 3], units: { temp: "C" } };
    const json = JSON.stringify(args);
    for (let cut = 0; cut <= json.length; cut += 5) {
      const fragments = [json.slice(0, cut), json.slice(cut, cut + 3), json.slice(cut + 3)].filter((f) => f !== "");
      const assembler = new StreamAssembler(META, false);
      const chunks = feed(assembler, toolStream([{ id: "t1", name: "f", fragments }]));
      const streamed = chunks
        .flatMap((c) => c.choices[0]?.delta.tool_calls ?? [])
        .map((d) => d.function.arguments)
        .join("");
      expect(JSON.parse(streamed)).toEqual(args);
    }
  });
});
