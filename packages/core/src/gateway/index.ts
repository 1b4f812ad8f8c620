export { ChatGateway, continuation } from "./chat";
export type { ChatGatewayOptions } from "./chat";
export { createAwsServices, createGateway, loadGateway } from "./create";
export type { Gateway, GatewayServices } from "./create";
export { toSseFrame, toSseStream } from "./sse";
