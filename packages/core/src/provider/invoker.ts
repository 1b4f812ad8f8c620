import type { ConverseRequest, ConverseResponse, ConverseStreamEvent } from "../converse/types";
import { errorMessage, GatewayError, toError } from "../errors";
import { type Logger, silentLogger } from "../logger";
import type { CallOptions, InferenceService } from "./types";

/**
 * Calls the inference service in blocking or streaming mode. Backend validation
 * failures become `invalid_request`, anything else `upstream`. No retries here;
 * the service clients carry their own bounded retry policy.
 */
export class InferenceInvoker {
  constructor(
    private readonly service: InferenceService,
    private readonly logger: Logger = silentLogger,
  ) {}

  async invoke(request: ConverseRequest, options: CallOptions = {}): Promise<ConverseResponse> {
    this.logDispatch(request, false);
    try {
      return await this.service.converse(request, options);
    } catch (err) {
      throw this.classify(err);
    }
  }

  async *invokeStreaming(request: ConverseRequest, options: CallOptions = {}): AsyncGenerator<ConverseStreamEvent> {
    this.logDispatch(request, true);
    let events: AsyncIterable<ConverseStreamEvent>;
    try {
      events = await this.service.converseStream(request, options);
    } catch (err) {
      throw this.classify(err);
    }
    try {
      for await (const event of events) {
        yield event;
      }
    } catch (err) {
      throw this.classify(err);
    }
  }

  private classify(err: unknown): GatewayError {
    const classified = classifyInvocationError(err);
    if (classified.errorType === "invalid_request") {
      this.logger.error(`Validation Error: ${classified.message}`);
    } else {
      this.logger.error(`Upstream Error: ${classified.message}`);
    }
    return classified;
  }

  private logDispatch(request: ConverseRequest, streaming: boolean): void {
    this.logger.info("Invoking model", {
      model: request.modelId,
      streaming,
      messages: request.messages.length,
      tools: request.toolConfig?.tools.length ?? 0,
    });
    this.logger.debug("Backend request", { request: summarize(request) });
  }
}

export function classifyInvocationError(err: unknown): GatewayError {
  if (err instanceof GatewayError) return err;
  if (isValidationError(err)) {
    return new GatewayError(errorMessage(err), "invalid_request", toError(err));
  }
  return new GatewayError(errorMessage(err), "upstream", toError(err));
}

function isValidationError(err: unknown): boolean {
  return err instanceof Error && err.name === "ValidationException";
}

// Byte payloads are replaced by their length so debug logs stay readable.
function summarize(request: ConverseRequest): string {
  return JSON.stringify(request, (_key, value: unknown) =>
    value instanceof Uint8Array ? `<${value.byteLength} bytes>` : value,
  );
}
