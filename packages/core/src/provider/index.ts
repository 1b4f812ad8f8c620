export type {
  CallOptions,
  CapabilityRegistry,
  FunctionService,
  InferenceService,
  InputModality,
  ModelCapabilities,
  ModelInvoker,
  ObjectStore,
  RetrievalResult,
  RetrievalService,
  RetrievalSource,
} from "./types";

export { classifyInvocationError, InferenceInvoker } from "./invoker";
export { DEFAULT_OUTPUT_TOKENS, KNOWN_MODELS, ModelRegistry, resolveOutputCeiling } from "./models";
export type { ModelLoader, OutputTokenLimits } from "./models";
export { BedrockInference, createRuntimeClient } from "./bedrock";
export type { BedrockOptions } from "./bedrock";
export { createLambdaClient, LambdaFunctions } from "./lambda";
export { createS3Client, S3ObjectStore } from "./s3";
export { createKnowledgeBaseClients, KnowledgeBaseRetrieval } from "./knowledge-base";
