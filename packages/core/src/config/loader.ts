import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import { parse as parseJsonc } from "jsonc-parser";
import { type Logger, silentLogger } from "../logger";
import { DEFAULT_CONFIG, type GatewayConfig, GatewayConfigSchema } from "./schema";

export const CONFIG_FILENAME = "chatbridge.jsonc";

/** Load and merge config from all sources (global < project < env) */
export async function loadGatewayConfig(
  cwd: string,
  env: Record<string, string | undefined> = process.env,
  logger: Logger = silentLogger,
): Promise<{ config: GatewayConfig; sources: string[] }> {
  const sources: string[] = [];

  // Layer 1: Global config
  const globalPath = join(homedir(), ".config", "chatbridge", CONFIG_FILENAME);
  const globalConfig = await loadConfigFile(globalPath, env, logger);
  if (globalConfig) sources.push(globalPath);

  // Layer 2: Project config
  const projectPath = join(cwd, CONFIG_FILENAME);
  const projectConfig = await loadConfigFile(projectPath, env, logger);
  if (projectConfig) sources.push(projectPath);

  let merged: GatewayConfig = { ...DEFAULT_CONFIG };
  if (globalConfig) merged = mergeConfig(merged, globalConfig);
  if (projectConfig) merged = mergeConfig(merged, projectConfig);

  // Layer 3: Environment variable overrides
  merged = applyEnvOverrides(merged, env);

  return { config: merged, sources };
}

/** Parse JSONC file, validate with Zod. A missing file is not an error; an invalid one is skipped with a warning. */
async function loadConfigFile(
  path: string,
  env: Record<string, string | undefined>,
  logger: Logger,
): Promise<GatewayConfig | null> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    if (isNotFound(err)) return null;
    logger.warn(`Config warning: cannot read ${path}`, { error: String(err) });
    return null;
  }

  const parsed: unknown = parseJsonc(text);
  const substituted = substituteTemplates(parsed, env);
  const result = GatewayConfigSchema.safeParse(substituted);
  if (!result.success) {
    logger.warn(`Config warning: ${path}\n${result.error.message}`);
    return null;
  }
  return result.data;
}

/** Deep merge: scalars replace, sections merge key-by-key, `outputTokens.families` merges too. */
export function mergeConfig(base: GatewayConfig, override: GatewayConfig): GatewayConfig {
  return {
    ...base,
    $schema: override.$schema ?? base.$schema,
    region: override.region ?? base.region,
    debug: override.debug ?? base.debug,
    maxLegs: override.maxLegs ?? base.maxLegs,
    toolResultPreviewLimit: override.toolResultPreviewLimit ?? base.toolResultPreviewLimit,
    tools: mergeSection(base.tools, override.tools),
    guardrail: mergeSection(base.guardrail, override.guardrail),
    thinking: mergeSection(base.thinking, override.thinking),
    retrieval: mergeSection(base.retrieval, override.retrieval),
    outputTokens: override.outputTokens
      ? {
          default: override.outputTokens.default ?? base.outputTokens?.default,
          families: mergeSection(base.outputTokens?.families, override.outputTokens.families),
        }
      : base.outputTokens,
    models: mergeSection(base.models, override.models),
  };
}

function mergeSection<T extends object>(base: T | undefined, override: T | undefined): T | undefined {
  if (!override) return base;
  if (!base) return override;
  return { ...base, ...override };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Environment variable overrides (Layer 3) */
function applyEnvOverrides(config: GatewayConfig, env: Record<string, string | undefined>): GatewayConfig {
  const result = { ...config };
  if (env.AWS_REGION) {
    result.region = env.AWS_REGION;
  }
  if (env.CHATBRIDGE_DEBUG) {
    result.debug = env.CHATBRIDGE_DEBUG !== "0" && env.CHATBRIDGE_DEBUG.toLowerCase() !== "false";
  }
  if (env.GUARDRAIL_IDENTIFIER) {
    result.guardrail = {
      ...result.guardrail,
      identifier: env.GUARDRAIL_IDENTIFIER,
      version: env.GUARDRAIL_VERSION ?? result.guardrail?.version,
    };
  }
  if (env.TOOLS_BUCKET || env.TOOLS_KEY) {
    result.tools = {
      ...result.tools,
      bucket: env.TOOLS_BUCKET ?? result.tools?.bucket,
      key: env.TOOLS_KEY ?? result.tools?.key,
    };
  }
  return result;
}

/** Template substitution: {env:VAR_NAME} → env[VAR_NAME] */
function substituteTemplates(obj: unknown, env: Record<string, string | undefined>): unknown {
  if (typeof obj === "string") {
    return obj.replace(/\{env:([^}]+)\}/g, (_, varName: string) => env[varName] ?? "");
  }
  if (Array.isArray(obj)) return obj.map((item) => substituteTemplates(item, env));
  if (isPlainObject(obj)) {
    const result: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(obj)) {
      result[k] = substituteTemplates(v, env);
    }
    return result;
  }
  return obj;
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}
