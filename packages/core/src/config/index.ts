export { CONFIG_FILENAME, loadGatewayConfig, mergeConfig } from "./loader";
export type { GatewayConfig } from "./schema";
export { DEFAULT_CONFIG, GatewayConfigSchema, Modality } from "./schema";
