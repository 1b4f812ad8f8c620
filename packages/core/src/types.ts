import type { ImageBlock } from "./converse/types";
import type { JsonObject } from "./json";

// Inbound content parts. "document" is produced by retrieval only; callers cannot send it.
export type ContentPart = TextPart | ImagePart | DocumentPart;

export interface TextPart {
  type: "text";
  text: string;
}

export interface ImagePart {
  type: "image_url";
  url: string;
}

export interface DocumentPart {
  type: "document";
  name: string;
  text: string;
}

export interface SystemMessage {
  role: "system";
  content: string;
}

export interface UserMessage {
  role: "user";
  content: ContentPart[];
}

export interface ToolCallDescriptor {
  id: string;
  name: string;
  /** JSON-encoded arguments object */
  arguments: string;
}

// An assistant turn is either text or a pending tool call, never both.
export type AssistantMessage =
  | { role: "assistant"; content: string; toolCall?: undefined }
  | { role: "assistant"; toolCall: ToolCallDescriptor; content?: undefined };

export type ToolResultPayload =
  | { dataType: "json"; content: JsonObject }
  | { dataType: "text"; content: string }
  | { dataType: "image"; content: ImageBlock };

export type ToolMessage = {
  role: "tool";
  toolCallId: string;
  status?: "error";
} & ToolResultPayload;

export type ChatMessage = SystemMessage | UserMessage | AssistantMessage | ToolMessage;

export interface FunctionDefinition {
  name: string;
  description?: string;
  parameters: JsonObject;
}

export interface ChatRequest {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  topP?: number;
  stop?: string | string[];
  maxTokens?: number;
  stream: boolean;
  includeUsage: boolean;
  /** Caller-declared functions; calls to them are handed back instead of executed. */
  tools?: FunctionDefinition[];
}

// Finish reasons outside the known set pass through lower-cased.
export type FinishReason = "stop" | "length" | "tool_calls" | "content_filter" | (string & {});

export interface Usage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

export interface ToolCall {
  id: string;
  type: "function";
  function: { name: string; arguments: string };
}

export interface CompletionMessage {
  role: "assistant";
  content: string | null;
  tool_calls?: ToolCall[];
}

export interface Reference {
  title: string;
  url: string;
}

export interface ChatCompletion {
  id: string;
  object: "chat.completion";
  created: number;
  model: string;
  system_fingerprint: string;
  choices: Array<{
    index: number;
    message: CompletionMessage;
    finish_reason: FinishReason | null;
    logprobs: null;
  }>;
  usage: Usage;
  references?: Reference[];
}

export interface ToolCallDelta {
  index: number;
  id?: string;
  type?: "function";
  function: { name?: string; arguments: string };
}

export interface ChunkDelta {
  role?: "assistant";
  content?: string;
  tool_calls?: ToolCallDelta[];
}

export interface ChunkChoice {
  index: number;
  delta: ChunkDelta;
  finish_reason: FinishReason | null;
  logprobs: null;
}

export interface ChatCompletionChunk {
  id: string;
  object: "chat.completion.chunk";
  created: number;
  model: string;
  system_fingerprint: string;
  choices: ChunkChoice[];
  usage?: Usage;
}

// Outward stream: chunks, separated by explicit end-of-stream markers between legs.
export type GatewayStreamEvent = { type: "chunk"; chunk: ChatCompletionChunk } | { type: "done" };

// Embeddings
export type EmbeddingEncoding = "float" | "base64";

export interface EmbeddingsRequest {
  model: string;
  input: string[];
  encodingFormat: EmbeddingEncoding;
}

export interface Embedding {
  object: "embedding";
  index: number;
  embedding: number[] | string;
}

export interface EmbeddingsResponse {
  object: "list";
  model: string;
  data: Embedding[];
  usage: { prompt_tokens: number; total_tokens: number };
}
