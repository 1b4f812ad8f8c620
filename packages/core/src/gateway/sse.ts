import type { GatewayStreamEvent } from "../types";

/** Server-sent-event framing for one outward stream event. */
export function toSseFrame(event: GatewayStreamEvent): string {
  if (event.type === "done") return "data: [DONE]\n\n";
  return `data: ${JSON.stringify(event.chunk)}\n\n`;
}

export async function* toSseStream(events: AsyncIterable<GatewayStreamEvent>): AsyncGenerator<string> {
  for await (const event of events) {
    yield toSseFrame(event);
  }
}
