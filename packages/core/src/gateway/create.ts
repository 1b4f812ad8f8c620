import { type GatewayConfig, loadGatewayConfig } from "../config";
import { EmbeddingsTranslator } from "../embeddings/translator";
import { RetrievalAugmenter } from "../knowledge/augmenter";
import { createLogger, type Logger } from "../logger";
import { BedrockInference, createRuntimeClient } from "../provider/bedrock";
import { InferenceInvoker } from "../provider/invoker";
import { createKnowledgeBaseClients, KnowledgeBaseRetrieval } from "../provider/knowledge-base";
import { createLambdaClient, LambdaFunctions } from "../provider/lambda";
import { ModelRegistry } from "../provider/models";
import { createS3Client, S3ObjectStore } from "../provider/s3";
import type {
  CapabilityRegistry,
  FunctionService,
  InferenceService,
  ModelInvoker,
  ObjectStore,
  RetrievalService,
} from "../provider/types";
import { ToolCatalog } from "../tool/catalog";
import { ToolOrchestrator } from "../tool/orchestrator";
import type { FetchLike } from "../translate/content";
import { RequestTranslator } from "../translate/request";
import { ChatGateway } from "./chat";

export interface GatewayServices {
  inference: InferenceService;
  modelInvoker: ModelInvoker;
  functions: FunctionService;
  objects: ObjectStore;
  /** Without one, `@<source>` tokens stay plain text */
  retrieval?: RetrievalService;
  fetch?: FetchLike;
}

export interface Gateway {
  chat: ChatGateway;
  embeddings: EmbeddingsTranslator;
  models: CapabilityRegistry;
  tools: ToolCatalog;
  logger: Logger;
}

/** AWS-backed implementations of every collaborator. */
export function createAwsServices(config: GatewayConfig): GatewayServices {
  const region = config.region;
  const inference = new BedrockInference(createRuntimeClient({ region }));
  const kb = createKnowledgeBaseClients({ region });
  return {
    inference,
    modelInvoker: inference,
    functions: new LambdaFunctions(createLambdaClient({ region })),
    objects: new S3ObjectStore(createS3Client({ region })),
    retrieval: new KnowledgeBaseRetrieval(kb.agent, kb.runtime),
  };
}

export function createGateway(
  config: GatewayConfig,
  services: GatewayServices,
  logger: Logger = createLogger({ level: config.debug ? "debug" : "info" }),
): Gateway {
  const models = ModelRegistry.fromConfig(config.models);
  const tools = ToolCatalog.fromObjectStore(services.objects, config.tools ?? {}, logger.child("tools"));

  const translator = new RequestTranslator({
    capabilities: models,
    catalog: tools,
    fetch: services.fetch ?? globalThis.fetch,
    outputTokens: config.outputTokens,
    thinkingBudget: config.thinking?.budgetTokens,
    guardrail: config.guardrail,
    logger: logger.child("translate"),
  });

  const chat = new ChatGateway({
    translator,
    invoker: new InferenceInvoker(services.inference, logger.child("invoke")),
    orchestrator: new ToolOrchestrator(services.functions, tools, logger.child("tools")),
    augmenter: services.retrieval
      ? new RetrievalAugmenter(services.retrieval, config.retrieval, logger.child("retrieval"))
      : undefined,
    maxLegs: config.maxLegs,
    toolResultPreviewLimit: config.toolResultPreviewLimit,
    logger: logger.child("chat"),
  });

  return {
    chat,
    embeddings: new EmbeddingsTranslator(services.modelInvoker, logger.child("embeddings")),
    models,
    tools,
    logger,
  };
}

/** Load layered configuration from `cwd` and wire the gateway against AWS. */
export async function loadGateway(cwd: string, env: Record<string, string | undefined> = process.env): Promise<Gateway> {
  const bootstrap = createLogger({ level: "info" });
  const { config, sources } = await loadGatewayConfig(cwd, env, bootstrap);
  const logger = createLogger({ level: config.debug ? "debug" : "info" });
  logger.debug("Configuration loaded", { sources });
  return createGateway(config, createAwsServices(config), logger);
}
