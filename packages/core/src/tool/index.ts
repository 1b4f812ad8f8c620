export type { CatalogTool, ToolDataType, ToolEnvelope, ToolOutcome } from "./types";

export { parseToolDocument, ToolCatalog } from "./catalog";
export type { ToolLoader } from "./catalog";
export { envelopeToPayload, markdownFormat, ToolEnvelopeSchema } from "./envelope";
export { ToolOrchestrator } from "./orchestrator";
