import type { CapabilityRegistry, InputModality, ModelCapabilities } from "./types";

export const KNOWN_MODELS: ModelCapabilities[] = [
  // Anthropic (cross-region inference profiles)
  { id: "us.anthropic.claude-3-7-sonnet-20250219-v1:0", modalities: ["TEXT", "IMAGE"] },
  { id: "us.anthropic.claude-opus-4-20250514-v1:0", modalities: ["TEXT", "IMAGE"] },
  { id: "us.anthropic.claude-sonnet-4-20250514-v1:0", modalities: ["TEXT", "IMAGE"] },
  // Meta
  { id: "us.meta.llama4-maverick-17b-instruct-v1:0", modalities: ["TEXT", "IMAGE"] },
  // DeepSeek
  { id: "us.deepseek.r1-v1:0", modalities: ["TEXT"] },
];

export type ModelLoader = () => Promise<ModelCapabilities[]>;

/**
 * Capability registry backed by a snapshot that `refresh` replaces wholesale.
 * Lookups always read the current snapshot; there is no partial update.
 */
export class ModelRegistry implements CapabilityRegistry {
  private snapshot: Map<string, ModelCapabilities>;

  constructor(
    initial: ModelCapabilities[] = KNOWN_MODELS,
    private readonly loader?: ModelLoader,
  ) {
    this.snapshot = toMap(initial);
  }

  /** Build from the `models` config section, falling back to the known list when it is empty. */
  static fromConfig(models: Record<string, { modalities: InputModality[] }> | undefined): ModelRegistry {
    const entries = Object.entries(models ?? {}).map(([id, { modalities }]) => ({ id, modalities }));
    return new ModelRegistry(entries.length > 0 ? entries : KNOWN_MODELS);
  }

  get(modelId: string): ModelCapabilities | undefined {
    return this.snapshot.get(modelId);
  }

  list(): string[] {
    return [...this.snapshot.keys()];
  }

  supports(modelId: string, modality: InputModality): boolean {
    return this.snapshot.get(modelId)?.modalities.includes(modality) ?? false;
  }

  async refresh(): Promise<void> {
    if (!this.loader) return;
    const models = await this.loader();
    this.snapshot = toMap(models);
  }
}

function toMap(models: ModelCapabilities[]): Map<string, ModelCapabilities> {
  return new Map(models.map((m) => [m.id, m]));
}

export interface OutputTokenLimits {
  default?: number;
  families?: Record<string, number>;
}

// Built-in ceilings; configured limits layer over these.
export const DEFAULT_OUTPUT_TOKENS = {
  default: 32_768,
  families: { "claude-3-7": 131_072, llama4: 8_192 },
} satisfies Required<OutputTokenLimits>;

/** Output ceiling for a model: first family whose key is a substring of the id, else the default. */
export function resolveOutputCeiling(modelId: string, limits: OutputTokenLimits | undefined): number {
  const families = { ...DEFAULT_OUTPUT_TOKENS.families, ...limits?.families };
  for (const [family, ceiling] of Object.entries(families)) {
    if (modelId.includes(family)) return ceiling;
  }
  return limits?.default ?? DEFAULT_OUTPUT_TOKENS.default;
}
