export { convertContentPart, convertImage, loadImage, sanitizeDocumentName } from "./content";
export type { CodecContext, FetchLike } from "./content";
export { directiveTokens, stripDirective, THINKING_DIRECTIVE, TOOLS_DIRECTIVE } from "./directives";
export { reframeMessages } from "./reframe";
export { RequestTranslator } from "./request";
export type { GuardrailOptions, TranslatorOptions } from "./request";
