import { z } from "zod";
import type { ImageBlock } from "../converse/types";
import { JsonValueSchema } from "../json";
import { decodeBase64 } from "../translate/content";
import type { ToolResultPayload } from "../types";
import type { ToolEnvelope } from "./types";

export const ToolEnvelopeSchema: z.ZodType<ToolEnvelope> = z.object({
  success: z.boolean(),
  message: z.string().optional(),
  data_type: z.enum(["json", "text", "image"]).optional(),
  markdown_format: z.string().optional(),
  results: JsonValueSchema.optional(),
});

// Image results carry their bytes base64-encoded.
const ImageResultSchema = z.object({
  format: z.enum(["png", "jpeg", "gif", "webp"]),
  source: z.object({ bytes: z.string() }),
});

/**
 * Frame an envelope as tool-result content. A failed envelope becomes its
 * message as text; the caller marks the result as an error.
 */
export function envelopeToPayload(envelope: ToolEnvelope): ToolResultPayload {
  if (!envelope.success) {
    return { dataType: "text", content: envelope.message ?? "Tool reported failure without a message" };
  }
  const results = envelope.results ?? null;
  switch (envelope.data_type ?? "json") {
    case "json":
      return { dataType: "json", content: { results } };
    case "text":
      return { dataType: "text", content: typeof results === "string" ? results : JSON.stringify(results) };
    case "image":
      return { dataType: "image", content: decodeImage(results) };
  }
}

function decodeImage(results: unknown): ImageBlock {
  const image = ImageResultSchema.parse(results);
  return { format: image.format, source: { bytes: decodeBase64(image.source.bytes) } };
}

/** How a successful result is rendered when echoed to a streaming caller. */
export function markdownFormat(envelope: ToolEnvelope): string {
  return envelope.markdown_format ?? "json";
}
