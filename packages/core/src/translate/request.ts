import type { ContentBlock, ConverseMessage, ConverseRequest, ToolConfiguration } from "../converse/types";
import { GatewayError } from "../errors";
import { type Logger, silentLogger } from "../logger";
import { type OutputTokenLimits, resolveOutputCeiling } from "../provider/models";
import type { CapabilityRegistry } from "../provider/types";
import type { ToolCatalog } from "../tool/catalog";
import type { ChatMessage, ChatRequest, FunctionDefinition } from "../types";
import { type CodecContext, convertContentPart, convertToolCall, convertToolResult, type FetchLike } from "./content";
import { directiveTokens, latestUserMessage, THINKING_DIRECTIVE, TOOLS_DIRECTIVE, userText } from "./directives";
import { reframeMessages } from "./reframe";

export interface GuardrailOptions {
  identifier?: string;
  version?: string;
  blockedMessagePrefix?: string;
}

export interface TranslatorOptions {
  capabilities: CapabilityRegistry;
  catalog: ToolCatalog;
  fetch: FetchLike;
  outputTokens?: OutputTokenLimits;
  thinkingBudget?: number;
  guardrail?: GuardrailOptions;
  logger?: Logger;
}

const DEFAULT_THINKING_BUDGET = 10_000;

/** Converts a generic chat request into a Converse payload. */
export class RequestTranslator {
  private readonly logger: Logger;

  constructor(private readonly options: TranslatorOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  async translate(request: ChatRequest, signal?: AbortSignal): Promise<ConverseRequest> {
    // Reject before any network call
    if (!this.options.capabilities.get(request.model)) {
      throw new GatewayError(
        `Unsupported model ${request.model}, please use models API to get a list of supported models`,
        "unsupported_model",
      );
    }

    const history = this.dropBlockedExchanges(request.messages);
    const ctx: CodecContext = {
      model: request.model,
      capabilities: this.options.capabilities,
      fetch: this.options.fetch,
      signal,
    };

    const system = history.flatMap((m) => (m.role === "system" ? [{ text: m.content }] : []));
    const converted: ConverseMessage[] = [];
    for (const message of history) {
      const backend = await convertMessage(message, ctx);
      if (backend) converted.push(backend);
    }
    const messages = reframeMessages(converted);

    const ceiling = resolveOutputCeiling(request.model, this.options.outputTokens);
    const payload: ConverseRequest = {
      modelId: request.model,
      messages,
      system,
      inferenceConfig: {
        maxTokens: request.maxTokens !== undefined ? Math.min(request.maxTokens, ceiling) : ceiling,
        ...(request.temperature !== undefined && { temperature: request.temperature }),
        ...(request.topP !== undefined && { topP: request.topP }),
        ...(request.stop !== undefined && {
          stopSequences: typeof request.stop === "string" ? [request.stop] : request.stop,
        }),
      },
    };

    const latest = latestUserMessage(history);
    const directives = latest ? directiveTokens(userText(latest.message)) : new Set<string>();

    const clientTools = request.tools ?? [];
    const toolConfig = await this.buildToolConfig(
      directives.has(TOOLS_DIRECTIVE) || needsCatalog(messages, clientTools),
      clientTools,
    );
    if (toolConfig) payload.toolConfig = toolConfig;

    if (directives.has(THINKING_DIRECTIVE)) {
      payload.additionalModelRequestFields = {
        thinking: { type: "enabled", budget_tokens: this.options.thinkingBudget ?? DEFAULT_THINKING_BUDGET },
      };
      // Extended reasoning rejects a custom nucleus sampling value
      delete payload.inferenceConfig.topP;
    }

    const guardrail = this.options.guardrail;
    if (guardrail?.identifier && guardrail.version) {
      payload.guardrailConfig = {
        guardrailIdentifier: guardrail.identifier,
        guardrailVersion: guardrail.version,
        trace: "enabled",
      };
    }

    return payload;
  }

  private async buildToolConfig(
    includeCatalog: boolean,
    clientTools: FunctionDefinition[],
  ): Promise<ToolConfiguration | undefined> {
    const tools: ToolConfiguration["tools"] = includeCatalog ? (await this.options.catalog.toolConfig()).tools : [];
    for (const fn of clientTools) {
      tools.push({
        toolSpec: { name: fn.name, description: fn.description ?? fn.name, inputSchema: { json: fn.parameters } },
      });
    }
    return tools.length > 0 ? { tools } : undefined;
  }

  // A guardrail-blocked reply and the prompt that triggered it are removed so
  // the exchange does not poison later turns.
  private dropBlockedExchanges(messages: ChatMessage[]): ChatMessage[] {
    const prefix = this.options.guardrail?.blockedMessagePrefix;
    if (!prefix) return messages;

    const kept: ChatMessage[] = [];
    for (const message of messages) {
      if (message.role === "assistant" && message.content?.startsWith(prefix)) {
        this.logger.info("Dropping blocked exchange from history");
        const previous = kept.at(-1);
        if (previous && previous.role !== "system") kept.pop();
        continue;
      }
      kept.push(message);
    }
    return kept;
  }
}

async function convertMessage(message: ChatMessage, ctx: CodecContext): Promise<ConverseMessage | undefined> {
  switch (message.role) {
    case "system":
      return undefined;
    case "user": {
      const content: ContentBlock[] = [];
      for (const part of message.content) {
        content.push(await convertContentPart(part, ctx));
      }
      return { role: "user", content };
    }
    case "assistant":
      if (message.toolCall !== undefined) {
        return { role: "assistant", content: [{ toolUse: convertToolCall(message.toolCall) }] };
      }
      return { role: "assistant", content: message.content === "" ? [] : [{ text: message.content }] };
    case "tool":
      // The backend has no tool role: results travel in a user turn
      return { role: "user", content: [{ toolResult: convertToolResult(message) }] };
  }
}

// History that calls tools the caller did not declare needs the catalog's
// specs, as does tool history with no caller-declared tools at all.
function needsCatalog(messages: ConverseMessage[], clientTools: FunctionDefinition[]): boolean {
  const declared = new Set(clientTools.map((tool) => tool.name));
  let carriesTools = false;
  for (const block of messages.flatMap((m) => m.content)) {
    if ("toolUse" in block) {
      if (!declared.has(block.toolUse.name)) return true;
      carriesTools = true;
    } else if ("toolResult" in block) {
      carriesTools = true;
    }
  }
  return carriesTools && declared.size === 0;
}
