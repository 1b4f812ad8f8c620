import { z } from "zod";
import { SingleFlight } from "../cache";
import type { ToolConfiguration } from "../converse/types";
import { errorMessage, GatewayError, toError } from "../errors";
import { JsonObjectSchema, parseJson } from "../json";
import { type Logger, silentLogger } from "../logger";
import type { ObjectStore } from "../provider/types";
import type { CatalogTool } from "./types";

// Tool-schema document as stored: Converse tool specs plus the dispatch target of each.
const ToolDocumentSchema = z.array(
  z.object({
    toolSpec: z.object({
      name: z.string().min(1),
      description: z.string(),
      inputSchema: z.object({ json: JsonObjectSchema }),
      lambda_arn: z.string().min(1),
    }),
  }),
);

export type ToolLoader = () => Promise<CatalogTool[]>;

/**
 * Server-side tools, loaded once on first use and treated as immutable after.
 * Dispatch targets never leave the process: `toolConfig` strips them.
 */
export class ToolCatalog {
  private readonly tools: SingleFlight<Map<string, CatalogTool>>;

  constructor(load: ToolLoader) {
    this.tools = new SingleFlight(async () => indexTools(await load()));
  }

  static empty(): ToolCatalog {
    return new ToolCatalog(async () => []);
  }

  /** Read the tool document from object storage; an unset location yields an empty catalog. */
  static fromObjectStore(
    store: ObjectStore,
    location: { bucket?: string; key?: string },
    logger: Logger = silentLogger,
  ): ToolCatalog {
    const { bucket, key } = location;
    if (!bucket || !key) {
      logger.warn("Tool document location not configured; @tools requests will carry no tools");
      return ToolCatalog.empty();
    }
    return new ToolCatalog(async () => {
      let tools: CatalogTool[];
      try {
        tools = parseToolDocument(new TextDecoder().decode(await store.get(bucket, key)));
      } catch (err) {
        logger.error(`Unable to load tool document ${bucket}/${key}`, { error: errorMessage(err) });
        throw new GatewayError(`Unable to load tool document: ${errorMessage(err)}`, "upstream", toError(err));
      }
      logger.info(`Loaded ${tools.length} tools from ${bucket}/${key}`);
      return tools;
    });
  }

  async toolConfig(): Promise<ToolConfiguration> {
    const tools = await this.tools.get();
    return { tools: [...tools.values()].map((tool) => ({ toolSpec: tool.spec })) };
  }

  async dispatchTarget(name: string): Promise<string | undefined> {
    return (await this.tools.get()).get(name)?.dispatchTarget;
  }

  async has(name: string): Promise<boolean> {
    return (await this.tools.get()).has(name);
  }
}

export function parseToolDocument(text: string): CatalogTool[] {
  return parseJson(text, ToolDocumentSchema).map(({ toolSpec }) => {
    const { lambda_arn, ...spec } = toolSpec;
    return { spec, dispatchTarget: lambda_arn };
  });
}

function indexTools(tools: CatalogTool[]): Map<string, CatalogTool> {
  const index = new Map<string, CatalogTool>();
  for (const tool of tools) {
    if (index.has(tool.spec.name)) {
      throw new GatewayError(`Duplicate tool name: ${tool.spec.name}`, "upstream");
    }
    index.set(tool.spec.name, tool);
  }
  return index;
}
