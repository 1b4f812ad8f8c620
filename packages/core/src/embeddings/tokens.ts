import { getEncoding } from "js-tiktoken";

// Token-id inputs are cl100k_base encodings; the backend only accepts text.
let encoder: ReturnType<typeof getEncoding> | undefined;

function getEncoder(): ReturnType<typeof getEncoding> {
  if (!encoder) {
    encoder = getEncoding("cl100k_base");
  }
  return encoder;
}

export function decodeTokens(tokens: number[]): string {
  return getEncoder().decode(tokens);
}
