import type { ToolSpecification, ToolUseBlock } from "../converse/types";
import type { JsonValue } from "../json";
import type { ToolMessage } from "../types";

/** A catalog entry: the spec sent to the backend plus the function it dispatches to. */
export interface CatalogTool {
  spec: ToolSpecification;
  dispatchTarget: string;
}

export type ToolDataType = "json" | "text" | "image";

// Result envelope returned by every tool function. Field names are a fixed contract.
export interface ToolEnvelope {
  success: boolean;
  message?: string;
  data_type?: ToolDataType;
  /** How the result should be rendered when surfaced to the user; "json" unless stated */
  markdown_format?: string;
  results?: JsonValue;
}

export interface ToolOutcome {
  toolUse: ToolUseBlock;
  message: ToolMessage;
  /** Present when the function replied with a readable envelope */
  envelope?: ToolEnvelope;
  durationMs: number;
}
