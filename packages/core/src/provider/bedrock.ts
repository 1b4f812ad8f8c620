import {
  BedrockRuntimeClient,
  type ContentBlock as SdkContentBlock,
  ConverseCommand,
  ConverseStreamCommand,
  type ConverseStreamOutput,
  InvokeModelCommand,
  type TokenUsage as SdkTokenUsage,
} from "@aws-sdk/client-bedrock-runtime";
import type {
  ContentBlock,
  ConverseRequest,
  ConverseResponse,
  ConverseStreamEvent,
  TokenUsage,
} from "../converse/types";
import type { CallOptions, InferenceService, ModelInvoker } from "./types";

export interface BedrockOptions {
  region?: string;
  /** SDK-level attempts per call, including the first */
  maxAttempts?: number;
}

const DEFAULT_MAX_ATTEMPTS = 5;

export function createRuntimeClient(options: BedrockOptions = {}): BedrockRuntimeClient {
  return new BedrockRuntimeClient({
    region: options.region,
    maxAttempts: options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
  });
}

/** Converse and raw model invocation over the Bedrock runtime client. */
export class BedrockInference implements InferenceService, ModelInvoker {
  constructor(private readonly client: BedrockRuntimeClient) {}

  async converse(request: ConverseRequest, options: CallOptions = {}): Promise<ConverseResponse> {
    const response = await this.client.send(new ConverseCommand(request), { abortSignal: options.signal });
    const message = response.output?.message;
    return {
      message: {
        role: message?.role ?? "assistant",
        content: fromSdkContent(message?.content ?? []),
      },
      stopReason: response.stopReason ?? "end_turn",
      usage: fromSdkUsage(response.usage),
    };
  }

  async converseStream(request: ConverseRequest, options: CallOptions = {}): Promise<AsyncIterable<ConverseStreamEvent>> {
    const response = await this.client.send(new ConverseStreamCommand(request), { abortSignal: options.signal });
    if (!response.stream) {
      throw new Error("Converse stream returned no event stream");
    }
    return fromSdkStream(response.stream);
  }

  async invokeModel(modelId: string, body: string, options: CallOptions = {}): Promise<string> {
    const response = await this.client.send(
      new InvokeModelCommand({
        modelId,
        body: new TextEncoder().encode(body),
        contentType: "application/json",
        accept: "application/json",
      }),
      { abortSignal: options.signal },
    );
    return new TextDecoder().decode(response.body);
  }
}

export function fromSdkContent(blocks: SdkContentBlock[]): ContentBlock[] {
  const content: ContentBlock[] = [];
  for (const block of blocks) {
    if (block.text !== undefined) {
      content.push({ text: block.text });
    } else if (block.toolUse) {
      content.push({
        toolUse: {
          toolUseId: block.toolUse.toolUseId ?? "",
          name: block.toolUse.name ?? "",
          input: block.toolUse.input ?? {},
        },
      });
    }
    // Reasoning and other block kinds are not surfaced
  }
  return content;
}

function fromSdkUsage(usage: SdkTokenUsage | undefined): TokenUsage {
  const inputTokens = usage?.inputTokens ?? 0;
  const outputTokens = usage?.outputTokens ?? 0;
  return { inputTokens, outputTokens, totalTokens: usage?.totalTokens ?? inputTokens + outputTokens };
}

export async function* fromSdkStream(stream: AsyncIterable<ConverseStreamOutput>): AsyncGenerator<ConverseStreamEvent> {
  for await (const event of stream) {
    if (event.messageStart) {
      yield { type: "messageStart", role: event.messageStart.role ?? "assistant" };
    } else if (event.contentBlockStart) {
      const toolUse = event.contentBlockStart.start?.toolUse;
      yield {
        type: "contentBlockStart",
        contentBlockIndex: event.contentBlockStart.contentBlockIndex ?? 0,
        ...(toolUse && { toolUse: { toolUseId: toolUse.toolUseId ?? "", name: toolUse.name ?? "" } }),
      };
    } else if (event.contentBlockDelta) {
      const index = event.contentBlockDelta.contentBlockIndex ?? 0;
      const delta = event.contentBlockDelta.delta;
      if (delta?.text !== undefined) {
        yield { type: "contentBlockDelta", contentBlockIndex: index, delta: { kind: "text", text: delta.text } };
      } else if (delta?.toolUse) {
        yield {
          type: "contentBlockDelta",
          contentBlockIndex: index,
          delta: { kind: "toolUse", input: delta.toolUse.input ?? "" },
        };
      } else if (delta?.reasoningContent?.text !== undefined) {
        yield {
          type: "contentBlockDelta",
          contentBlockIndex: index,
          delta: { kind: "reasoning", text: delta.reasoningContent.text },
        };
      }
    } else if (event.contentBlockStop) {
      yield { type: "contentBlockStop", contentBlockIndex: event.contentBlockStop.contentBlockIndex ?? 0 };
    } else if (event.messageStop) {
      yield { type: "messageStop", stopReason: event.messageStop.stopReason ?? "end_turn" };
    } else if (event.metadata) {
      yield { type: "metadata", usage: fromSdkUsage(event.metadata.usage) };
    } else {
      const exception = streamException(event);
      if (exception) throw exception;
    }
  }
}

// In-stream exceptions arrive as events; raise them under the exception's own name.
function streamException(event: ConverseStreamOutput): Error | undefined {
  const exceptions: Array<[string, { message?: string } | undefined]> = [
    ["ValidationException", event.validationException],
    ["ThrottlingException", event.throttlingException],
    ["InternalServerException", event.internalServerException],
    ["ModelStreamErrorException", event.modelStreamErrorException],
    ["ServiceUnavailableException", event.serviceUnavailableException],
  ];
  for (const [name, exception] of exceptions) {
    if (exception) {
      const err = new Error(exception.message ?? name);
      err.name = name;
      return err;
    }
  }
  return undefined;
}
