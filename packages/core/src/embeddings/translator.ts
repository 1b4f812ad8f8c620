import { z } from "zod";
import { errorMessage, GatewayError } from "../errors";
import { parseJson } from "../json";
import { type Logger, silentLogger } from "../logger";
import { classifyInvocationError } from "../provider/invoker";
import type { ModelInvoker } from "../provider/types";
import type { Embedding, EmbeddingsRequest, EmbeddingsResponse } from "../types";

export const EMBEDDING_MODELS: readonly string[] = ["cohere.embed-english-v3", "cohere.embed-multilingual-v3"];

const EmbedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
});

/** Text in, vectors out, through the raw model-invocation entry point. */
export class EmbeddingsTranslator {
  constructor(
    private readonly invoker: ModelInvoker,
    private readonly logger: Logger = silentLogger,
    private readonly models: readonly string[] = EMBEDDING_MODELS,
  ) {}

  async embed(request: EmbeddingsRequest, signal?: AbortSignal): Promise<EmbeddingsResponse> {
    if (!this.models.includes(request.model)) {
      throw new GatewayError(
        `Unsupported embedding model ${request.model}, please use models API to get a list of supported models`,
        "unsupported_model",
      );
    }

    const body = JSON.stringify({ texts: request.input, input_type: "search_document", truncate: "END" });
    this.logger.info("Invoking embedding model", { model: request.model, inputs: request.input.length });

    let raw: string;
    try {
      raw = await this.invoker.invokeModel(request.model, body, { signal });
    } catch (err) {
      throw classifyInvocationError(err);
    }

    let vectors: number[][];
    try {
      vectors = parseJson(raw, EmbedResponseSchema).embeddings;
    } catch (err) {
      throw new GatewayError(`Unexpected embedding response: ${errorMessage(err)}`, "upstream");
    }

    const data: Embedding[] = vectors.map((vector, index) => ({
      object: "embedding",
      index,
      embedding: request.encodingFormat === "base64" ? encodeFloat32(vector) : vector,
    }));

    // The backend reports no token counts for embeddings
    return { object: "list", model: request.model, data, usage: { prompt_tokens: 0, total_tokens: 0 } };
  }
}

/** Little-endian float32 bytes, base64-encoded. */
export function encodeFloat32(vector: number[]): string {
  const buf = Buffer.alloc(vector.length * 4);
  vector.forEach((value, i) => buf.writeFloatLE(value, i * 4));
  return buf.toString("base64");
}
