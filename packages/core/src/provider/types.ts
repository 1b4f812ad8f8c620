import type { ConverseRequest, ConverseResponse, ConverseStreamEvent } from "../converse/types";

export interface CallOptions {
  signal?: AbortSignal;
}

// The multi-turn inference service. Adapters throw an error named
// "ValidationException" when the backend rejects the payload itself.
export interface InferenceService {
  converse(request: ConverseRequest, options?: CallOptions): Promise<ConverseResponse>;
  converseStream(request: ConverseRequest, options?: CallOptions): Promise<AsyncIterable<ConverseStreamEvent>>;
}

/** Synchronous request/response function execution (tool dispatch targets). */
export interface FunctionService {
  invoke(functionRef: string, payload: Uint8Array, options?: CallOptions): Promise<Uint8Array>;
}

export interface RetrievalSource {
  name: string;
  /** Service-side identifier passed back to `retrieve` */
  ref: string;
}

export interface RetrievalResult {
  text: string;
  score: number;
  title?: string;
  uri?: string;
}

export interface RetrievalService {
  listSources(): Promise<RetrievalSource[]>;
  retrieve(query: string, sourceRef: string, topK: number, options?: CallOptions): Promise<RetrievalResult[]>;
}

export interface ObjectStore {
  get(bucket: string, key: string): Promise<Uint8Array>;
}

/** Raw model invocation (embeddings). Body and result are JSON text. */
export interface ModelInvoker {
  invokeModel(modelId: string, body: string, options?: CallOptions): Promise<string>;
}

export type InputModality = "TEXT" | "IMAGE";

export interface ModelCapabilities {
  id: string;
  modalities: InputModality[];
}

export interface CapabilityRegistry {
  get(modelId: string): ModelCapabilities | undefined;
  list(): string[];
  refresh(): Promise<void>;
}
