import { describe, expect, it } from "vitest";
import { parseToolDocument, ToolCatalog } from "../src/tool/catalog";
import { FakeObjectStore } from "./helpers";

const DOCUMENT = JSON.stringify([
  {
    toolSpec: {
      name: "weather",
      description: "Current weather for a city",
      inputSchema: { json: { type: "object", properties: { city: { type: "string" } } } },
      lambda_arn: "arn:aws:lambda:us-east-1:000000000000:function:weather",
    },
  },
]);

describe("parseToolDocument", () => {
  it("splits each entry into a spec and its dispatch target", () => {
    expect(parseToolDocument(DOCUMENT)).toEqual([
      {
        spec: {
          name: "weather",
          description: "Current weather for a city",
          inputSchema: { json: { type: "object", properties: { city: { type: "string" } } } },
        },
        dispatchTarget: "arn:aws:lambda:us-east-1:000000000000:function:weather",
      },
    ]);
  });

  it("rejects entries without a dispatch target", () => {
    expect(() =>
      parseToolDocument(JSON.stringify([{ toolSpec: { name: "x", description: "", inputSchema: { json: {} } } }])),
    ).toThrow();
  });
});

describe("ToolCatalog", () => {
  it("loads the document once for concurrent callers", async () => {
    const store = new FakeObjectStore({ "tools-bucket/tools.json": DOCUMENT });
    const catalog = ToolCatalog.fromObjectStore(store, { bucket: "tools-bucket", key: "tools.json" });
    const [config, target, has] = await Promise.all([
      catalog.toolConfig(),
      catalog.dispatchTarget("weather"),
      catalog.has("weather"),
    ]);
    expect(store.gets).toBe(1);
    expect(config.tools.map((t) => t.toolSpec.name)).toEqual(["weather"]);
    expect(JSON.stringify(config)).not.toContain("lambda");
    expect(target).toBe("arn:aws:lambda:us-east-1:000000000000:function:weather");
    expect(has).toBe(true);
  });

  it("is empty when no location is configured", async () => {
    const store = new FakeObjectStore({});
    const catalog = ToolCatalog.fromObjectStore(store, {});
    expect(await catalog.toolConfig()).toEqual({ tools: [] });
    expect(store.gets).toBe(0);
  });

  it("reports a load failure as upstream and retries on the next call", async () => {
    const objects: Record<string, string> = {};
    const store = new FakeObjectStore(objects);
    const catalog = ToolCatalog.fromObjectStore(store, { bucket: "b", key: "k" });
    await expect(catalog.toolConfig()).rejects.toMatchObject({
      errorType: "upstream",
      message: "Unable to load tool document: NoSuchKey: b/k",
    });
    objects["b/k"] = DOCUMENT;
    expect(await catalog.has("weather")).toBe(true);
    expect(store.gets).toBe(2);
  });

  it("reports a stored document with duplicate names as upstream", async () => {
    const entry = DOCUMENT.slice(1, -1);
    const store = new FakeObjectStore({ "b/k": `[${entry},${entry}]` });
    const catalog = ToolCatalog.fromObjectStore(store, { bucket: "b", key: "k" });
    await expect(catalog.toolConfig()).rejects.toMatchObject({
      errorType: "upstream",
      message: "Duplicate tool name: weather",
    });
  });

  it("rejects duplicate tool names", async () => {
    const entry = { spec: { name: "dup", description: "", inputSchema: { json: {} } }, dispatchTarget: "fn" };
    const catalog = new ToolCatalog(async () => [entry, entry]);
    await expect(catalog.has("dup")).rejects.toMatchObject({
      errorType: "upstream",
      message: "Duplicate tool name: dup",
    });
  });
});
