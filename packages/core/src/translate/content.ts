import type {
  ContentBlock,
  DocumentBlock,
  ImageBlock,
  ImageFormat,
  ToolResultBlock,
  ToolResultContentBlock,
  ToolUseBlock,
} from "../converse/types";
import { errorMessage, GatewayError, toError } from "../errors";
import { type JsonValue, JsonValueSchema, parseJson } from "../json";
import type { CapabilityRegistry } from "../provider/types";
import type { ContentPart, DocumentPart, ToolCallDescriptor, ToolMessage } from "../types";

/** The subset of `fetch` the codec needs; `globalThis.fetch` satisfies it. */
export type FetchLike = (
  url: string,
  init?: { signal?: AbortSignal },
) => Promise<{
  ok: boolean;
  status: number;
  headers: { get(name: string): string | null };
  arrayBuffer(): Promise<ArrayBuffer>;
}>;

export interface CodecContext {
  model: string;
  capabilities: CapabilityRegistry;
  fetch: FetchLike;
  signal?: AbortSignal;
}

const DATA_URI = /^data:(image\/[a-z0-9.+-]*);base64,\s*/i;
const IMAGE_FORMATS: ReadonlySet<string> = new Set<ImageFormat>(["png", "jpeg", "gif", "webp"]);
const DEFAULT_IMAGE_TYPE = "image/jpeg";

export async function convertContentPart(part: ContentPart, ctx: CodecContext): Promise<ContentBlock> {
  switch (part.type) {
    case "text":
      return { text: part.text };
    case "image_url":
      return { image: await convertImage(part.url, ctx) };
    case "document":
      return { document: convertDocument(part) };
  }
}

export async function convertImage(url: string, ctx: CodecContext): Promise<ImageBlock> {
  const modalities = ctx.capabilities.get(ctx.model)?.modalities ?? [];
  if (!modalities.includes("IMAGE")) {
    throw new GatewayError(`Multimodal message is currently not supported by ${ctx.model}`, "unsupported_modality");
  }
  const { bytes, contentType } = await loadImage(url, ctx);
  return { format: toImageFormat(contentType), source: { bytes } };
}

/** Resolve an image reference to raw bytes plus its declared content type. */
export async function loadImage(url: string, ctx: Pick<CodecContext, "fetch" | "signal">): Promise<{ bytes: Uint8Array; contentType: string }> {
  const match = DATA_URI.exec(url);
  if (match) {
    return { bytes: decodeBase64(url.slice(match[0].length)), contentType: match[1].toLowerCase() };
  }

  let response: Awaited<ReturnType<FetchLike>>;
  try {
    response = await ctx.fetch(url, { signal: ctx.signal });
  } catch (err) {
    throw new GatewayError(`Unable to access the image url: ${errorMessage(err)}`, "resource_fetch", toError(err));
  }
  if (!response.ok) {
    throw new GatewayError(`Unable to access the image url (HTTP ${response.status})`, "resource_fetch");
  }

  const declared = (response.headers.get("content-type") ?? "").split(";")[0].trim().toLowerCase();
  const contentType = declared.startsWith("image/") ? declared : DEFAULT_IMAGE_TYPE;
  return { bytes: new Uint8Array(await response.arrayBuffer()), contentType };
}

function toImageFormat(contentType: string): ImageFormat {
  const subtype = contentType.slice("image/".length);
  const normalized = subtype === "jpg" ? "jpeg" : subtype;
  if (!isImageFormat(normalized)) {
    throw new GatewayError(`Unsupported image format: ${contentType}`, "invalid_request");
  }
  return normalized;
}

function isImageFormat(value: string): value is ImageFormat {
  return IMAGE_FORMATS.has(value);
}

export function convertDocument(part: DocumentPart): DocumentBlock {
  return {
    format: "txt",
    name: sanitizeDocumentName(part.name),
    source: { bytes: new TextEncoder().encode(part.text) },
  };
}

/** Document names may only hold alphanumerics, single spaces, hyphens, parentheses and brackets. */
export function sanitizeDocumentName(name: string): string {
  const cleaned = name
    .replace(/[^A-Za-z0-9\s\-()[\]]/g, " ")
    .replace(/\s+/g, " ")
    .trim();
  return cleaned || "document";
}

export function convertToolCall(call: ToolCallDescriptor): ToolUseBlock {
  return { toolUseId: call.id, name: call.name, input: parseToolArguments(call) };
}

function parseToolArguments(call: ToolCallDescriptor): JsonValue {
  if (call.arguments.trim() === "") return {};
  try {
    return parseJson(call.arguments, JsonValueSchema);
  } catch (err) {
    throw new GatewayError(`Malformed arguments for tool call ${call.id}: ${errorMessage(err)}`, "invalid_request");
  }
}

export function convertToolResult(message: ToolMessage): ToolResultBlock {
  return {
    toolUseId: message.toolCallId,
    content: [frameToolResult(message)],
    ...(message.status === "error" && { status: "error" as const }),
  };
}

function frameToolResult(message: ToolMessage): ToolResultContentBlock {
  switch (message.dataType) {
    case "json":
      return { json: message.content };
    case "text":
      return { text: message.content };
    case "image":
      return { image: message.content };
  }
}

export function decodeBase64(data: string): Uint8Array {
  const buf = Buffer.from(data, "base64");
  return new Uint8Array(buf.buffer, buf.byteOffset, buf.byteLength);
}
