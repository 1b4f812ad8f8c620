import type {
  ConverseRequest,
  ConverseResponse,
  ConverseStreamEvent,
  ToolUseBlock,
} from "../src/converse/types";
import type {
  CallOptions,
  FunctionService,
  InferenceService,
  ObjectStore,
  RetrievalResult,
  RetrievalService,
  RetrievalSource,
} from "../src/provider/types";
import { ToolCatalog } from "../src/tool/catalog";
import type { FetchLike } from "../src/translate/content";
import type { ChatRequest, UserMessage } from "../src/types";

export const TEXT_MODEL = "us.deepseek.r1-v1:0";
export const VISION_MODEL = "us.anthropic.claude-sonnet-4-20250514-v1:0";

/** Replays scripted responses and streams in order, recording every request. */
export class FakeInference implements InferenceService {
  readonly requests: ConverseRequest[] = [];
  readonly signals: Array<AbortSignal | undefined> = [];

  constructor(
    private readonly responses: ConverseResponse[] = [],
    private readonly streams: ConverseStreamEvent[][] = [],
  ) {}

  async converse(request: ConverseRequest, options: CallOptions = {}): Promise<ConverseResponse> {
    this.requests.push(request);
    this.signals.push(options.signal);
    const next = this.responses.shift();
    if (!next) throw new Error("No scripted response left");
    return next;
  }

  async converseStream(request: ConverseRequest, options: CallOptions = {}): Promise<AsyncIterable<ConverseStreamEvent>> {
    this.requests.push(request);
    this.signals.push(options.signal);
    const next = this.streams.shift();
    if (!next) throw new Error("No scripted stream left");
    return replay(next);
  }
}

export class FakeFunctions implements FunctionService {
  readonly calls: Array<{ functionRef: string; input: unknown }> = [];

  constructor(private readonly handler: (functionRef: string, input: unknown) => unknown) {}

  async invoke(functionRef: string, payload: Uint8Array): Promise<Uint8Array> {
    const input: unknown = JSON.parse(new TextDecoder().decode(payload));
    this.calls.push({ functionRef, input });
    return new TextEncoder().encode(JSON.stringify(this.handler(functionRef, input)));
  }
}

export class FakeRetrieval implements RetrievalService {
  readonly queries: Array<{ query: string; sourceRef: string; topK: number }> = [];
  listCalls = 0;

  constructor(
    private readonly sources: RetrievalSource[],
    private readonly results: Record<string, RetrievalResult[]> = {},
  ) {}

  async listSources(): Promise<RetrievalSource[]> {
    this.listCalls++;
    return this.sources;
  }

  async retrieve(query: string, sourceRef: string, topK: number): Promise<RetrievalResult[]> {
    this.queries.push({ query, sourceRef, topK });
    return this.results[sourceRef] ?? [];
  }
}

export class FakeObjectStore implements ObjectStore {
  gets = 0;

  constructor(private readonly objects: Record<string, string>) {}

  async get(bucket: string, key: string): Promise<Uint8Array> {
    this.gets++;
    const text = this.objects[`${bucket}/${key}`];
    if (text === undefined) throw new Error(`NoSuchKey: ${bucket}/${key}`);
    return new TextEncoder().encode(text);
  }
}

export const noFetch: FetchLike = async () => {
  throw new Error("network disabled in tests");
};

/** Catalog whose tools dispatch to `fn:<name>`. */
export function catalogOf(...names: string[]): ToolCatalog {
  return new ToolCatalog(async () =>
    names.map((name) => ({
      spec: { name, description: `${name} tool`, inputSchema: { json: { type: "object" } } },
      dispatchTarget: `fn:${name}`,
    })),
  );
}

export function user(text: string): UserMessage {
  return { role: "user", content: [{ type: "text", text }] };
}

export function chatRequest(overrides: Partial<ChatRequest> = {}): ChatRequest {
  return {
    model: TEXT_MODEL,
    messages: [user("Hello")],
    stream: false,
    includeUsage: false,
    ...overrides,
  };
}

export function textResponse(text: string, stopReason = "end_turn"): ConverseResponse {
  return {
    message: { role: "assistant", content: [{ text }] },
    stopReason,
    usage: { inputTokens: 10, outputTokens: 5, totalTokens: 15 },
  };
}

export function toolUseResponse(toolUses: ToolUseBlock[], text?: string): ConverseResponse {
  return {
    message: {
      role: "assistant",
      content: [...(text !== undefined ? [{ text }] : []), ...toolUses.map((toolUse) => ({ toolUse }))],
    },
    stopReason: "tool_use",
    usage: { inputTokens: 20, outputTokens: 8, totalTokens: 28 },
  };
}

export function textStream(fragments: string[], stopReason = "end_turn"): ConverseStreamEvent[] {
  return [
    { type: "messageStart", role: "assistant" },
    ...fragments.map(
      (text): ConverseStreamEvent => ({ type: "contentBlockDelta", contentBlockIndex: 0, delta: { kind: "text", text } }),
    ),
    { type: "contentBlockStop", contentBlockIndex: 0 },
    { type: "messageStop", stopReason },
    { type: "metadata", usage: { inputTokens: 12, outputTokens: 4, totalTokens: 16 } },
  ];
}

/** A streamed turn with optional leading text followed by one block per tool call. */
export function toolStream(
  calls: Array<{ id: string; name: string; fragments: string[] }>,
  leadingText?: string,
): ConverseStreamEvent[] {
  const events: ConverseStreamEvent[] = [{ type: "messageStart", role: "assistant" }];
  let index = 0;
  if (leadingText !== undefined) {
    events.push({ type: "contentBlockDelta", contentBlockIndex: 0, delta: { kind: "text", text: leadingText } });
    events.push({ type: "contentBlockStop", contentBlockIndex: 0 });
    index = 1;
  }
  for (const call of calls) {
    events.push({ type: "contentBlockStart", contentBlockIndex: index, toolUse: { toolUseId: call.id, name: call.name } });
    for (const input of call.fragments) {
      events.push({ type: "contentBlockDelta", contentBlockIndex: index, delta: { kind: "toolUse", input } });
    }
    events.push({ type: "contentBlockStop", contentBlockIndex: index });
    index++;
  }
  events.push({ type: "messageStop", stopReason: "tool_use" });
  events.push({ type: "metadata", usage: { inputTokens: 30, outputTokens: 9, totalTokens: 39 } });
  return events;
}

export async function collect<T>(items: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of items) out.push(item);
  return out;
}

async function* replay<T>(items: T[]): AsyncGenerator<T> {
  for (const item of items) yield item;
}
