// Types
export type {
  AssistantMessage,
  ChatCompletion,
  ChatCompletionChunk,
  ChatMessage,
  ChatRequest,
  ContentPart,
  EmbeddingsRequest,
  EmbeddingsResponse,
  FinishReason,
  GatewayStreamEvent,
  Reference,
  SystemMessage,
  ToolMessage,
  Usage,
  UserMessage,
} from "./types";
export type { ContentBlock, ConverseMessage, ConverseRequest, ConverseResponse, ConverseStreamEvent } from "./converse/types";
export type { JsonObject, JsonValue } from "./json";
// Assemble
export type { AssemblerState, CompletionMeta } from "./assemble/index";
export { assembleCompletion, mapFinishReason, StreamAssembler } from "./assemble/index";
// Config
export type { GatewayConfig } from "./config/index";
export { CONFIG_FILENAME, DEFAULT_CONFIG, GatewayConfigSchema, loadGatewayConfig, mergeConfig } from "./config/index";
// Embeddings
export { EMBEDDING_MODELS, EmbeddingsTranslator } from "./embeddings/translator";
// Errors
export type { GatewayErrorType } from "./errors";
export { GatewayError } from "./errors";
// Gateway
export type { ChatGatewayOptions, Gateway, GatewayServices } from "./gateway/index";
export { ChatGateway, createAwsServices, createGateway, loadGateway, toSseFrame, toSseStream } from "./gateway/index";
// Knowledge
export type { RetrievalOptions } from "./knowledge/index";
export { formatReferences, RetrievalAugmenter } from "./knowledge/index";
// Logging
export type { Logger, LogLevel, LogRecord, LogSink } from "./logger";
export { consoleSink, createLogger, silentLogger } from "./logger";
// Provider
export type {
  CapabilityRegistry,
  FunctionService,
  InferenceService,
  ModelInvoker,
  ObjectStore,
  RetrievalService,
} from "./provider/index";
export { InferenceInvoker, KNOWN_MODELS, ModelRegistry } from "./provider/index";
// Schema
export { parseChatRequest, parseEmbeddingsRequest } from "./schema/request";
// Tool
export type { CatalogTool, ToolEnvelope, ToolOutcome } from "./tool/index";
export { ToolCatalog, ToolOrchestrator } from "./tool/index";
// Translate
export type { FetchLike } from "./translate/index";
export { reframeMessages, RequestTranslator } from "./translate/index";
