import type { ToolUseBlock } from "../converse/types";
import { errorMessage } from "../errors";
import { parseJson } from "../json";
import { type Logger, silentLogger } from "../logger";
import type { CallOptions, FunctionService } from "../provider/types";
import type { ToolMessage } from "../types";
import type { ToolCatalog } from "./catalog";
import { envelopeToPayload, ToolEnvelopeSchema } from "./envelope";
import type { ToolEnvelope, ToolOutcome } from "./types";

/**
 * Dispatches catalog tool calls to their functions and frames the replies as
 * tool-result messages. Failures never escape: an unknown tool, a transport
 * error or a malformed reply each become an error result the model can read.
 */
export class ToolOrchestrator {
  constructor(
    private readonly functions: FunctionService,
    private readonly catalog: ToolCatalog,
    private readonly logger: Logger = silentLogger,
  ) {}

  /**
   * True when every call names a catalog tool; otherwise the caller owns the
   * calls. A call to a caller-declared function settles it without loading the
   * catalog, and a catalog that cannot be loaded owns nothing.
   */
  async ownsAll(
    calls: ReadonlyArray<{ name: string }>,
    clientTools: ReadonlyArray<{ name: string }> = [],
  ): Promise<boolean> {
    if (calls.length === 0) return false;
    const declared = new Set(clientTools.map((tool) => tool.name));
    if (calls.some((call) => declared.has(call.name))) return false;
    try {
      for (const call of calls) {
        if (!(await this.catalog.has(call.name))) return false;
      }
    } catch (err) {
      this.logger.warn("Tool catalog unavailable; handing tool calls back to the caller", { error: errorMessage(err) });
      return false;
    }
    return true;
  }

  /** Run calls in order; one outcome per call. */
  async runAll(toolUses: ToolUseBlock[], options: CallOptions = {}): Promise<ToolOutcome[]> {
    const outcomes: ToolOutcome[] = [];
    for (const toolUse of toolUses) {
      outcomes.push(await this.run(toolUse, options));
    }
    return outcomes;
  }

  async run(toolUse: ToolUseBlock, options: CallOptions = {}): Promise<ToolOutcome> {
    const started = Date.now();
    const target = await this.catalog.dispatchTarget(toolUse.name);
    if (!target) {
      return failure(toolUse, `Unknown tool "${toolUse.name}"`, started);
    }

    let envelope: ToolEnvelope;
    try {
      const payload = new TextEncoder().encode(JSON.stringify(toolUse.input));
      const reply = await this.functions.invoke(target, payload, options);
      envelope = parseJson(new TextDecoder().decode(reply), ToolEnvelopeSchema);
    } catch (err) {
      this.logger.error(`Tool ${toolUse.name} failed`, { toolUseId: toolUse.toolUseId, error: errorMessage(err) });
      return failure(toolUse, `Tool ${toolUse.name} failed: ${errorMessage(err)}`, started);
    }

    let message: ToolMessage;
    try {
      message = {
        role: "tool",
        toolCallId: toolUse.toolUseId,
        ...(!envelope.success && { status: "error" as const }),
        ...envelopeToPayload(envelope),
      };
    } catch (err) {
      return failure(toolUse, `Tool ${toolUse.name} returned an unreadable result: ${errorMessage(err)}`, started);
    }

    const durationMs = Date.now() - started;
    this.logger.info(`Finished tool ${toolUse.name} in ${durationMs}ms`, { success: envelope.success });
    return { toolUse, message, envelope, durationMs };
  }
}

function failure(toolUse: ToolUseBlock, text: string, started: number): ToolOutcome {
  return {
    toolUse,
    message: { role: "tool", toolCallId: toolUse.toolUseId, status: "error", dataType: "text", content: text },
    durationMs: Date.now() - started,
  };
}
