import { mapFinishReason } from "../assemble/finish-reason";
import { addUsage, assembleCompletion, newCompletionMeta, toUsage } from "../assemble/response";
import { StreamAssembler } from "../assemble/stream";
import type { ToolUseBlock } from "../converse/types";
import { GatewayError } from "../errors";
import type { RetrievalAugmenter } from "../knowledge/augmenter";
import { formatReferences } from "../knowledge/references";
import { type Logger, silentLogger } from "../logger";
import type { InferenceInvoker } from "../provider/invoker";
import { markdownFormat } from "../tool/envelope";
import type { ToolOrchestrator } from "../tool/orchestrator";
import type { ToolOutcome } from "../tool/types";
import type { RequestTranslator } from "../translate/request";
import type {
  ChatCompletion,
  ChatCompletionChunk,
  ChatMessage,
  ChatRequest,
  GatewayStreamEvent,
  Reference,
  ToolCallDescriptor,
  Usage,
} from "../types";

export interface ChatGatewayOptions {
  translator: RequestTranslator;
  invoker: InferenceInvoker;
  orchestrator: ToolOrchestrator;
  augmenter?: RetrievalAugmenter;
  /** Upper bound on backend round-trips per request */
  maxLegs?: number;
  /** JSON tool results at or above this serialized length are not echoed to streaming callers */
  toolResultPreviewLimit?: number;
  logger?: Logger;
}

const DEFAULT_MAX_LEGS = 25;
const DEFAULT_PREVIEW_LIMIT = 4000;

/**
 * Drives a chat request through translation, inference and tool execution.
 * Each leg is one backend round-trip; a leg that ends in calls to server
 * tools is followed by another leg carrying their results.
 */
export class ChatGateway {
  private readonly maxLegs: number;
  private readonly previewLimit: number;
  private readonly logger: Logger;

  constructor(private readonly options: ChatGatewayOptions) {
    this.maxLegs = options.maxLegs ?? DEFAULT_MAX_LEGS;
    this.previewLimit = options.toolResultPreviewLimit ?? DEFAULT_PREVIEW_LIMIT;
    this.logger = options.logger ?? silentLogger;
  }

  async complete(request: ChatRequest, signal?: AbortSignal): Promise<ChatCompletion> {
    this.logger.info("Chat request", { model: request.model, stream: false, messages: request.messages.length });
    const meta = newCompletionMeta(request.model);
    const { messages, references } = await this.augment(request, signal);
    let current: ChatRequest = { ...request, messages };
    let usage: Usage = toUsage(undefined);

    for (let leg = 1; leg <= this.maxLegs; leg++) {
      const payload = await this.options.translator.translate(current, signal);
      const response = await this.options.invoker.invoke(payload, { signal });
      usage = addUsage(usage, toUsage(response.usage));

      const toolUses = response.message.content.flatMap((block) => ("toolUse" in block ? [block.toolUse] : []));
      const serverTurn =
        mapFinishReason(response.stopReason) === "tool_calls" &&
        (await this.options.orchestrator.ownsAll(toolUses, request.tools));
      if (serverTurn) {
        this.logger.debug(`Leg ${leg} requested ${toolUses.length} server tools`);
        const outcomes = await this.options.orchestrator.runAll(toolUses, { signal });
        const text = response.message.content.flatMap((block) => ("text" in block ? [block.text] : [])).join("");
        current = { ...current, messages: [...current.messages, ...continuation(text, outcomes)] };
        continue;
      }

      const completion = assembleCompletion(response, meta);
      completion.usage = usage;
      if (references.length > 0) completion.references = references;
      return completion;
    }
    throw this.turnLimit();
  }

  /**
   * Outward event sequence for a streaming request: every leg's chunks, each
   * leg closed by a `done` marker. Stopping iteration aborts in-flight calls.
   */
  async *stream(request: ChatRequest, signal?: AbortSignal): AsyncGenerator<GatewayStreamEvent> {
    this.logger.info("Chat request", { model: request.model, stream: true, messages: request.messages.length });
    const controller = new AbortController();
    const forwardAbort = () => controller.abort();
    signal?.addEventListener("abort", forwardAbort, { once: true });
    let completed = false;
    try {
      yield* this.streamLegs(request, controller.signal);
      completed = true;
    } finally {
      signal?.removeEventListener("abort", forwardAbort);
      if (!completed) controller.abort();
    }
  }

  private async *streamLegs(request: ChatRequest, signal: AbortSignal): AsyncGenerator<GatewayStreamEvent> {
    const meta = newCompletionMeta(request.model);
    const { messages, references } = await this.augment(request, signal);
    let current: ChatRequest = { ...request, messages };

    for (let leg = 1; leg <= this.maxLegs; leg++) {
      const payload = await this.options.translator.translate(current, signal);
      const assembler = new StreamAssembler(meta, request.includeUsage);
      let serverToolTurn = false;

      for await (const event of this.options.invoker.invokeStreaming(payload, { signal })) {
        let chunk = assembler.consume(event);
        if (!chunk) continue;
        if (event.type === "messageStop") {
          // Server tool calls are resolved here; the caller never sees their terminal delta
          if (
            assembler.finishReason === "tool_calls" &&
            (await this.options.orchestrator.ownsAll(assembler.toolCalls, request.tools))
          ) {
            serverToolTurn = true;
            continue;
          }
          if (assembler.finishReason === "stop" && references.length > 0) {
            chunk = withContent(chunk, formatReferences(references));
          }
        }
        yield { type: "chunk", chunk };
      }

      if (!serverToolTurn) {
        yield { type: "done" };
        return;
      }

      const parsed = assembler.parseToolCalls();
      if (!parsed.ok) {
        this.logger.error(`Unable to parse arguments for tool ${parsed.call.name}`, { error: parsed.error });
        yield {
          type: "chunk",
          chunk: assembler.synthetic(
            `\n\`\`\`text\nUnable to parse the arguments for tool ${parsed.call.name}: ${parsed.raw}\n\`\`\`\n`,
          ),
        };
        yield { type: "done" };
        return;
      }

      this.logger.debug(`Leg ${leg} requested ${parsed.toolUses.length} server tools`);
      const outcomes = await this.options.orchestrator.runAll(parsed.toolUses, { signal });
      for (const outcome of outcomes) {
        const preview = this.preview(outcome);
        if (preview !== undefined) yield { type: "chunk", chunk: assembler.synthetic(preview) };
      }
      yield { type: "done" };

      current = { ...current, messages: [...current.messages, ...continuation(assembler.assistantText, outcomes)] };
    }
    throw this.turnLimit();
  }

  private async augment(
    request: ChatRequest,
    signal: AbortSignal | undefined,
  ): Promise<{ messages: ChatMessage[]; references: Reference[] }> {
    if (!this.options.augmenter) return { messages: request.messages, references: [] };
    return this.options.augmenter.augment(request.messages, signal);
  }

  // Successful results are echoed unless they are large JSON.
  private preview(outcome: ToolOutcome): string | undefined {
    const envelope = outcome.envelope;
    if (!envelope?.success) return undefined;
    const format = markdownFormat(envelope);
    const serialized = JSON.stringify(envelope.results ?? null);
    if (format === "json" && serialized.length >= this.previewLimit) return undefined;
    const body = typeof envelope.results === "string" ? envelope.results : serialized;
    return `\n\`\`\`${format}\n${body}\n\`\`\`\n`;
  }

  private turnLimit(): GatewayError {
    this.logger.error(`Tool loop did not finish within ${this.maxLegs} legs`);
    return new GatewayError(`Tool loop exceeded ${this.maxLegs} backend calls`, "turn_limit");
  }
}

/** Messages appended after a server tool turn: the assistant's text and calls, then the results. */
export function continuation(text: string, outcomes: ToolOutcome[]): ChatMessage[] {
  const messages: ChatMessage[] = [];
  if (text !== "") messages.push({ role: "assistant", content: text });
  for (const { toolUse } of outcomes) {
    messages.push({ role: "assistant", toolCall: toToolCall(toolUse) });
  }
  for (const { message } of outcomes) {
    messages.push(message);
  }
  return messages;
}

function toToolCall(toolUse: ToolUseBlock): ToolCallDescriptor {
  return { id: toolUse.toolUseId, name: toolUse.name, arguments: JSON.stringify(toolUse.input) };
}

function withContent(chunk: ChatCompletionChunk, content: string): ChatCompletionChunk {
  return {
    ...chunk,
    choices: chunk.choices.map((choice) => ({ ...choice, delta: { ...choice.delta, content } })),
  };
}
