import { describe, it, expect, afterEach } from "vitest";
import { Localizer, MEMORY_ONLY_CACHE_POLICY, StubTranslator } from "@repo/core";
import { createApp } from "../app";
import type { AppDependencies } from "../app";
import { listen } from "./testServer";
import type { TestServer } from "./testServer";

let server: TestServer | null = null;

async function start(deps: Partial<AppDependencies> = {}) {
  const localizer = new Localizer({
    sourceLanguage: "en",
    supportedLanguages: ["en", "es", "fr"],
    initialLanguage: "es",
    translator: new StubTranslator(),
    cachePolicy: MEMORY_ONLY_CACHE_POLICY,
  });
  const app = createApp(localizer, {
    corsOrigin: "http://localhost:5173",
    persistence: "none",
    checkPersistence: async () => true,
    ...deps,
  });
  server = await listen(app);
  return { localizer, baseUrl: server.baseUrl };
}

function send(url: string, method: string, body?: unknown, raw?: string): Promise<Response> {
  return fetch(url, {
    method,
    headers: { "Content-Type": "application/json" },
    body: raw ?? (body === undefined ? undefined : JSON.stringify(body)),
  });
}

describe("API", () => {
  afterEach(async () => {
    await server?.close();
    server = null;
  });

  it("GET /health", async () => {
    const { baseUrl } = await start();

    const res = await fetch(`${baseUrl}/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: "ok" });
  });

  it("POST /api/translate keeps placeholders intact", async () => {
    const { baseUrl } = await start();

    const res = await send(`${baseUrl}/api/translate`, "POST", { text: "Hello {name}" });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ text: "[es] Hello {name}", language: "es" });
  });

  it("POST /api/translate rejects a missing text", async () => {
    const { baseUrl } = await start();

    const res = await send(`${baseUrl}/api/translate`, "POST", { context: "UI" });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { message: "Invalid request" } });
  });

  it("POST /api/translate rejects malformed JSON", async () => {
    const { baseUrl } = await start();

    const res = await send(`${baseUrl}/api/translate`, "POST", undefined, "{not json");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: { message: "Invalid JSON body" } });
  });

  it("POST /api/translate/batch preserves order", async () => {
    const { baseUrl } = await start();

    const res = await send(`${baseUrl}/api/translate/batch`, "POST", {
      texts: ["One", "Two", "Three"],
      context: "BACKEND",
    });

    expect(await res.json()).toEqual({ texts: ["[es] One", "[es] Two", "[es] Three"], language: "es" });
  });

  it("PUT /api/locale resolves regional tags", async () => {
    const { baseUrl } = await start();

    const res = await send(`${baseUrl}/api/locale`, "PUT", { language: "fr-CA" });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      language: "fr",
      sourceLanguage: "en",
      supportedLanguages: ["en", "es", "fr"],
    });
    const current = await fetch(`${baseUrl}/api/locale`);
    expect(await current.json()).toMatchObject({ language: "fr" });
  });

  it("PUT /api/locale rejects unsupported languages", async () => {
    const { baseUrl } = await start();

    const res = await send(`${baseUrl}/api/locale`, "PUT", { language: "ja" });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { message: "Unsupported language: ja", kind: "unsupported_language", languageTag: "ja" },
    });
  });

  it("reports and clears cache statistics", async () => {
    const { baseUrl } = await start();
    await send(`${baseUrl}/api/translate`, "POST", { text: "Hello" });

    const stats = await fetch(`${baseUrl}/api/cache/stats`);
    expect(await stats.json()).toEqual({
      entries: 1,
      memoryEntries: 1,
      hits: 0,
      misses: 1,
      policy: { maxMemoryEntries: 1000, persist: false, ttlMs: null, cacheFailures: false },
      persistence: "none",
    });

    const cleared = await send(`${baseUrl}/api/cache`, "DELETE");
    expect(cleared.status).toBe(204);

    const after = await fetch(`${baseUrl}/api/cache/stats`);
    expect(await after.json()).toMatchObject({ entries: 0, memoryEntries: 0 });
  });

  it("GET /api/ready reports translator readiness", async () => {
    const { baseUrl } = await start();

    const res = await fetch(`${baseUrl}/api/ready`);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      ok: true,
      language: "es",
      translator: { configured: true, ready: true },
      persistence: { kind: "none", ok: true },
    });
  });

  it("GET /api/ready answers 503 when the persistent tier is down", async () => {
    const { baseUrl } = await start({ persistence: "redis", checkPersistence: async () => false });

    const res = await fetch(`${baseUrl}/api/ready`);

    expect(res.status).toBe(503);
    expect(await res.json()).toMatchObject({ ok: false, persistence: { kind: "redis", ok: false } });
  });

  it("POST /api/ready/prepare", async () => {
    const { baseUrl } = await start();

    const res = await send(`${baseUrl}/api/ready/prepare`, "POST");

    expect(await res.json()).toEqual({ status: "ready" });
  });

  it("answers 404 for unknown routes", async () => {
    const { baseUrl } = await start();

    const res = await fetch(`${baseUrl}/api/unknown`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: { message: "Not found: GET /api/unknown" } });
  });
});
