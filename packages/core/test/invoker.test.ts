import { describe, expect, it } from "vitest";
import type { ConverseRequest, ConverseStreamEvent } from "../src/converse/types";
import { GatewayError } from "../src/errors";
import { createLogger, type LogRecord } from "../src/logger";
import { classifyInvocationError, InferenceInvoker } from "../src/provider/invoker";
import type { InferenceService } from "../src/provider/types";
import { collect, TEXT_MODEL, textResponse } from "./helpers";

const REQUEST: ConverseRequest = {
  modelId: TEXT_MODEL,
  messages: [{ role: "user", content: [{ text: "hi" }] }],
  system: [],
  inferenceConfig: { maxTokens: 100 },
};

function named(name: string, message: string): Error {
  const err = new Error(message);
  err.name = name;
  return err;
}

async function* noEvents(): AsyncGenerator<ConverseStreamEvent> {}

function failingService(err: Error): InferenceService {
  return {
    converse: async () => {
      throw err;
    },
    converseStream: async () => {
      throw err;
    },
  };
}

describe("classifyInvocationError", () => {
  it("maps backend validation failures to invalid_request", () => {
    const classified = classifyInvocationError(named("ValidationException", "messages: roles must alternate"));
    expect(classified.errorType).toBe("invalid_request");
    expect(classified.statusCode).toBe(400);
    expect(classified.message).toBe("messages: roles must alternate");
  });

  it("maps everything else to upstream", () => {
    const classified = classifyInvocationError(named("ThrottlingException", "slow down"));
    expect(classified.errorType).toBe("upstream");
    expect(classified.statusCode).toBe(500);
    expect(classifyInvocationError("boom").message).toBe("boom");
  });

  it("passes gateway errors through", () => {
    const err = new GatewayError("bad model", "unsupported_model");
    expect(classifyInvocationError(err)).toBe(err);
  });
});

describe("InferenceInvoker", () => {
  it("returns the backend response", async () => {
    const response = textResponse("ok");
    const invoker = new InferenceInvoker({ converse: async () => response, converseStream: async () => noEvents() });
    expect(await invoker.invoke(REQUEST)).toBe(response);
  });

  it("classifies blocking failures and logs them", async () => {
    const records: LogRecord[] = [];
    const logger = createLogger({ level: "debug", sink: (r) => records.push(r) });
    const invoker = new InferenceInvoker(failingService(named("ValidationException", "too long")), logger);
    await expect(invoker.invoke(REQUEST)).rejects.toMatchObject({ errorType: "invalid_request", message: "too long" });
    expect(records.map((r) => `${r.level} ${r.message}`)).toEqual([
      "info Invoking model",
      "debug Backend request",
      "error Validation Error: too long",
    ]);
  });

  it("classifies failures to open a stream", async () => {
    const invoker = new InferenceInvoker(failingService(new Error("connection reset")));
    await expect(collect(invoker.invokeStreaming(REQUEST))).rejects.toMatchObject({
      errorType: "upstream",
      message: "connection reset",
    });
  });

  it("classifies failures raised mid-stream", async () => {
    async function* broken(): AsyncGenerator<ConverseStreamEvent> {
      yield { type: "messageStart", role: "assistant" };
      throw named("ModelStreamErrorException", "stream broke");
    }
    const invoker = new InferenceInvoker({ converse: async () => textResponse(""), converseStream: async () => broken() });
    const seen: ConverseStreamEvent[] = [];
    await expect(
      (async () => {
        for await (const event of invoker.invokeStreaming(REQUEST)) seen.push(event);
      })(),
    ).rejects.toMatchObject({ errorType: "upstream", message: "stream broke" });
    expect(seen).toEqual([{ type: "messageStart", role: "assistant" }]);
  });

  it("summarizes byte payloads in debug logs", async () => {
    const records: LogRecord[] = [];
    const logger = createLogger({ level: "debug", sink: (r) => records.push(r) });
    const invoker = new InferenceInvoker({ converse: async () => textResponse("ok"), converseStream: async () => noEvents() }, logger);
    await invoker.invoke({
      ...REQUEST,
      messages: [
        {
          role: "user",
          content: [{ document: { format: "txt", name: "d", source: { bytes: new Uint8Array(42) } } }],
        },
      ],
    });
    const debug = records.find((r) => r.level === "debug");
    expect(String(debug?.fields?.request)).toContain('"bytes":"<42 bytes>"');
  });
});
