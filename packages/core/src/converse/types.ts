import type { JsonObject, JsonValue } from "../json";

// Shapes of the Converse wire protocol. Kept structurally compatible with the
// Bedrock Runtime SDK so payloads pass to it without conversion.

export type ConversationRole = "user" | "assistant";

export type ImageFormat = "png" | "jpeg" | "gif" | "webp";
export type DocumentFormat = "txt" | "md" | "html" | "csv" | "pdf";

export interface ImageBlock {
  format: ImageFormat;
  source: { bytes: Uint8Array };
}

export interface DocumentBlock {
  format: DocumentFormat;
  name: string;
  source: { bytes: Uint8Array };
}

export interface ToolUseBlock {
  toolUseId: string;
  name: string;
  input: JsonValue;
}

export type ToolResultContentBlock = { json: JsonValue } | { text: string } | { image: ImageBlock };

export interface ToolResultBlock {
  toolUseId: string;
  content: ToolResultContentBlock[];
  status?: "success" | "error";
}

export type ContentBlock =
  | { text: string }
  | { image: ImageBlock }
  | { document: DocumentBlock }
  | { toolUse: ToolUseBlock }
  | { toolResult: ToolResultBlock };

export interface ConverseMessage {
  role: ConversationRole;
  content: ContentBlock[];
}

export interface InferenceConfiguration {
  maxTokens: number;
  temperature?: number;
  topP?: number;
  stopSequences?: string[];
}

export interface ToolSpecification {
  name: string;
  description: string;
  inputSchema: { json: JsonObject };
}

export interface ToolConfiguration {
  tools: Array<{ toolSpec: ToolSpecification }>;
}

export interface GuardrailConfiguration {
  guardrailIdentifier: string;
  guardrailVersion: string;
  trace: "enabled" | "disabled";
}

export interface ConverseRequest {
  modelId: string;
  messages: ConverseMessage[];
  system: Array<{ text: string }>;
  inferenceConfig: InferenceConfiguration;
  toolConfig?: ToolConfiguration;
  guardrailConfig?: GuardrailConfiguration;
  additionalModelRequestFields?: JsonObject;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface ConverseResponse {
  message: ConverseMessage;
  stopReason: string;
  usage: TokenUsage;
}

export type ConverseStreamEvent =
  | { type: "messageStart"; role: ConversationRole }
  | { type: "contentBlockStart"; contentBlockIndex: number; toolUse?: { toolUseId: string; name: string } }
  | { type: "contentBlockDelta"; contentBlockIndex: number; delta: ContentBlockDelta }
  | { type: "contentBlockStop"; contentBlockIndex: number }
  | { type: "messageStop"; stopReason: string }
  | { type: "metadata"; usage?: TokenUsage };

export type ContentBlockDelta =
  | { kind: "text"; text: string }
  | { kind: "toolUse"; input: string }
  | { kind: "reasoning"; text: string };
