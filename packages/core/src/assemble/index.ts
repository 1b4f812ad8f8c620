export { mapFinishReason } from "./finish-reason";
export { assembleCompletion, newCompletionMeta } from "./response";
export type { CompletionMeta } from "./response";
export { StreamAssembler } from "./stream";
export type { AssemblerState, ParsedToolCalls, PendingToolCall } from "./stream";
