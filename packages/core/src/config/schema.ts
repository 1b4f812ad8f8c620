import { z } from "zod";
import { DEFAULT_OUTPUT_TOKENS } from "../provider/models";

export const Modality = z.enum(["TEXT", "IMAGE"]);

export const GatewayConfigSchema = z
  .object({
    $schema: z.string().optional(),

    // AWS
    region: z.string().optional(),
    debug: z.boolean().optional(),

    // Tool loop
    maxLegs: z.number().int().positive().optional(),
    toolResultPreviewLimit: z.number().int().positive().optional(),

    // Tool-schema document in object storage
    tools: z
      .object({
        bucket: z.string().optional(),
        key: z.string().optional(),
      })
      .optional(),

    guardrail: z
      .object({
        identifier: z.string().optional(),
        version: z.string().optional(),
        // Assistant turns starting with this text are dropped from history along with their prompt
        blockedMessagePrefix: z.string().optional(),
      })
      .optional(),

    thinking: z
      .object({
        budgetTokens: z.number().int().positive().optional(),
      })
      .optional(),

    retrieval: z
      .object({
        minScore: z.number().min(0).max(1).optional(),
        maxSeparateDocuments: z.number().int().nonnegative().optional(),
        topK: z.number().int().positive().optional(),
        queryLimit: z.number().int().positive().optional(),
      })
      .optional(),

    outputTokens: z
      .object({
        default: z.number().int().positive().optional(),
        // model-name substring → ceiling; first match wins
        families: z.record(z.number().int().positive()).optional(),
      })
      .optional(),

    models: z
      .record(
        z.object({
          modalities: z.array(Modality),
        }),
      )
      .optional(),
  })
  .strict();

export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;

export const DEFAULT_CONFIG: GatewayConfig = {
  maxLegs: 25,
  toolResultPreviewLimit: 4000,
  thinking: { budgetTokens: 10_000 },
  retrieval: { minScore: 0.5, maxSeparateDocuments: 5, topK: 50, queryLimit: 998 },
  outputTokens: { default: DEFAULT_OUTPUT_TOKENS.default, families: { ...DEFAULT_OUTPUT_TOKENS.families } },
};
