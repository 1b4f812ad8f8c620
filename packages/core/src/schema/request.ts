import { z } from "zod";
import { decodeTokens } from "../embeddings/tokens";
import { GatewayError } from "../errors";
import { JsonObjectSchema } from "../json";
import type { ChatMessage, ChatRequest, ContentPart, EmbeddingsRequest } from "../types";

// Inbound wire shapes. Unknown top-level fields are ignored; unknown roles and part types are rejected.

const TextPartSchema = z.object({ type: z.literal("text"), text: z.string() });
const ImagePartSchema = z.object({
  type: z.literal("image_url"),
  image_url: z.object({ url: z.string().min(1), detail: z.string().optional() }),
});

const TextContentSchema = z.union([z.string(), z.array(TextPartSchema)]);

const ToolCallSchema = z.object({
  id: z.string().min(1),
  type: z.literal("function"),
  function: z.object({ name: z.string().min(1), arguments: z.string() }),
});

const MessageSchema = z.discriminatedUnion("role", [
  z.object({ role: z.literal("system"), content: TextContentSchema }),
  z.object({ role: z.literal("developer"), content: TextContentSchema }),
  z.object({
    role: z.literal("user"),
    content: z.union([z.string(), z.array(z.discriminatedUnion("type", [TextPartSchema, ImagePartSchema]))]),
  }),
  z.object({
    role: z.literal("assistant"),
    content: TextContentSchema.nullish(),
    tool_calls: z.array(ToolCallSchema).optional(),
  }),
  z.object({ role: z.literal("tool"), tool_call_id: z.string().min(1), content: TextContentSchema }),
]);

type WireMessage = z.infer<typeof MessageSchema>;

const ChatRequestSchema = z.object({
  model: z.string().min(1),
  messages: z.array(MessageSchema).min(1),
  temperature: z.number().min(0).max(2).optional(),
  top_p: z.number().min(0).max(1).optional(),
  stop: z.union([z.string(), z.array(z.string())]).nullish(),
  max_tokens: z.number().int().positive().nullish(),
  max_completion_tokens: z.number().int().positive().nullish(),
  stream: z.boolean().default(false),
  stream_options: z.object({ include_usage: z.boolean().default(false) }).nullish(),
  tools: z
    .array(
      z.object({
        type: z.literal("function"),
        function: z.object({
          name: z.string().min(1),
          description: z.string().optional(),
          parameters: JsonObjectSchema.optional(),
        }),
      }),
    )
    .optional(),
});

const EmbeddingsRequestSchema = z.object({
  model: z.string().min(1),
  // Text, texts, one token-id sequence, or several
  input: z.union([
    z.string(),
    z.array(z.string()).min(1),
    z.array(z.number().int().nonnegative()).min(1),
    z.array(z.array(z.number().int().nonnegative()).min(1)).min(1),
  ]),
  encoding_format: z.enum(["float", "base64"]).default("float"),
});

/** Validate an inbound chat-completions body. Throws `invalid_request` on any mismatch. */
export function parseChatRequest(body: unknown): ChatRequest {
  const parsed = ChatRequestSchema.safeParse(body);
  if (!parsed.success) throw invalid(parsed.error);
  const data = parsed.data;

  const maxTokens = data.max_completion_tokens ?? data.max_tokens ?? undefined;
  return {
    model: data.model,
    messages: data.messages.flatMap(toChatMessages),
    ...(data.temperature !== undefined && { temperature: data.temperature }),
    ...(data.top_p !== undefined && { topP: data.top_p }),
    ...(data.stop != null && { stop: data.stop }),
    ...(maxTokens !== undefined && { maxTokens }),
    stream: data.stream,
    includeUsage: data.stream_options?.include_usage ?? false,
    ...(data.tools && {
      tools: data.tools.map(({ function: fn }) => ({
        name: fn.name,
        ...(fn.description !== undefined && { description: fn.description }),
        parameters: fn.parameters ?? { type: "object", properties: {} },
      })),
    }),
  };
}

export function parseEmbeddingsRequest(body: unknown): EmbeddingsRequest {
  const parsed = EmbeddingsRequestSchema.safeParse(body);
  if (!parsed.success) throw invalid(parsed.error);
  const { model, input, encoding_format } = parsed.data;
  return { model, input: toTexts(input), encodingFormat: encoding_format };
}

function toTexts(input: z.infer<typeof EmbeddingsRequestSchema>["input"]): string[] {
  if (typeof input === "string") return [input];
  if (isStringArray(input)) return input;
  if (isTokenArray(input)) return [decodeTokens(input)];
  return input.map(decodeTokens);
}

function isStringArray(input: unknown[]): input is string[] {
  return input.every((item) => typeof item === "string");
}

function isTokenArray(input: unknown[]): input is number[] {
  return input.every((item) => typeof item === "number");
}

function toChatMessages(message: WireMessage): ChatMessage[] {
  switch (message.role) {
    case "system":
    case "developer":
      return [{ role: "system", content: flattenText(message.content) }];
    case "user":
      return [{ role: "user", content: toContentParts(message.content) }];
    case "assistant": {
      // One assistant message per tool call; the reframer merges them back into one turn
      const messages: ChatMessage[] = [];
      const text = message.content == null ? "" : flattenText(message.content);
      const calls = message.tool_calls ?? [];
      if (text !== "" || calls.length === 0) messages.push({ role: "assistant", content: text });
      for (const call of calls) {
        messages.push({
          role: "assistant",
          toolCall: { id: call.id, name: call.function.name, arguments: call.function.arguments },
        });
      }
      return messages;
    }
    case "tool":
      return [{ role: "tool", toolCallId: message.tool_call_id, dataType: "text", content: flattenText(message.content) }];
  }
}

function toContentParts(content: Extract<WireMessage, { role: "user" }>["content"]): ContentPart[] {
  if (typeof content === "string") return [{ type: "text", text: content }];
  return content.map(
    (part): ContentPart =>
      part.type === "text" ? { type: "text", text: part.text } : { type: "image_url", url: part.image_url.url },
  );
}

function flattenText(content: string | Array<{ text: string }>): string {
  return typeof content === "string" ? content : content.map((part) => part.text).join("\n");
}

function invalid(error: z.ZodError): GatewayError {
  const detail = error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`).join("; ");
  return new GatewayError(`Invalid request: ${detail}`, "invalid_request", error);
}
