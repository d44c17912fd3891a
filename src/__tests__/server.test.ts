import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { Server } from "node:http";
import type { AddressInfo } from "node:net";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { createServer } from "../server.js";
import { runtimeState, setFeedStatus } from "../state.js";
import type { PersistedRecord } from "../types.js";

// Listens on an ephemeral loopback port inside the test process.

let dir: string;
let server: Server;
let base: string;

const records: PersistedRecord[] = [
  {
    title: "Lakehouse & more",
    link: "https://acme.example/lakehouse",
    summary: "Unified storage.",
    published: "Mon, 12 Oct 2026 09:00:00 GMT",
    source: "Acme",
    category: "vendor",
    drawbacks: "d",
    fetched: "2026-10-12",
  },
  {
    title: "Market report",
    link: "https://trade.example/report",
    summary: null,
    published: null,
    source: "Trade",
    category: "industry",
    drawbacks: "d",
    fetched: "2026-10-11",
  },
];

beforeAll(async () => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "digest-server-"));
  const htmlPath = path.join(dir, "index.html");
  const jsonPath = path.join(dir, "articles.json");
  fs.writeFileSync(htmlPath, "<h1>digest</h1>", "utf-8");
  fs.writeFileSync(jsonPath, JSON.stringify(records), "utf-8");
  runtimeState.feedStatus.clear();
  setFeedStatus({ name: "Acme", url: "https://acme.example/feed", lastCount: 1 });

  const app = createServer({ htmlPath, jsonPath, siteUrl: "http://digest.test" });
  server = await new Promise<Server>((resolve) => {
    const s = app.listen(0, "127.0.0.1", () => resolve(s));
  });
  const { port } = server.address() as AddressInfo;
  base = `http://127.0.0.1:${port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("archive server", () => {
  it("reports health", async () => {
    const res = await fetch(`${base}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ ok: true });
  });

  it("serves the generated page", async () => {
    const res = await fetch(`${base}/`);
    expect(res.headers.get("content-type")).toBe("text/html; charset=utf-8");
    expect(await res.text()).toBe("<h1>digest</h1>");
  });

  it("serves the raw archive", async () => {
    const res = await fetch(`${base}/articles.json`);
    expect(await res.json()).toEqual(records);
  });

  it("serves a view with a search query", async () => {
    const res = await fetch(`${base}/api/articles?view=industry&q=market`);
    const body = (await res.json()) as Array<{ title: string; articles: PersistedRecord[] }>;
    expect(body.map((s) => [s.title, s.articles.map((a) => a.link)])).toEqual([
      ["Industry", ["https://trade.example/report"]],
    ]);
  });

  it("rejects unknown views", async () => {
    const res = await fetch(`${base}/api/articles?view=admin`);
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'unknown view "admin"' });
  });

  it("republishes a source as RSS", async () => {
    const res = await fetch(`${base}/rss/Acme`);
    const xml = await res.text();
    expect(res.headers.get("content-type")).toBe("application/rss+xml; charset=utf-8");
    expect(xml).toContain("<title>Lakehouse &amp; more</title>");
    expect(xml).toContain("<link>http://digest.test</link>");
    expect(xml).toContain("<pubDate>Mon, 12 Oct 2026 09:00:00 GMT</pubDate>");
    expect(xml).not.toContain("Market report");
  });

  it("lists feed status", async () => {
    const res = await fetch(`${base}/sources`);
    expect(await res.json()).toEqual([{ name: "Acme", url: "https://acme.example/feed", lastCount: 1 }]);
  });
});

describe("archive server without a JSON path", () => {
  it("answers 404 for archive routes", async () => {
    const app = createServer({ htmlPath: path.join(os.tmpdir(), "no-such-digest.html") });
    const s = await new Promise<Server>((resolve) => {
      const srv = app.listen(0, "127.0.0.1", () => resolve(srv));
    });
    try {
      const { port } = s.address() as AddressInfo;
      const res = await fetch(`http://127.0.0.1:${port}/articles.json`);
      expect(res.status).toBe(404);
      const page = await fetch(`http://127.0.0.1:${port}/`);
      expect(page.status).toBe(404);
    } finally {
      await new Promise<void>((resolve) => s.close(() => resolve()));
    }
  });
});

describe("archive server over a hand-edited archive", () => {
  it("republishes entries whose fields have the wrong JSON types", async () => {
    const editedDir = fs.mkdtempSync(path.join(os.tmpdir(), "digest-server-edited-"));
    const jsonPath = path.join(editedDir, "articles.json");
    fs.writeFileSync(
      jsonPath,
      JSON.stringify([
        { link: "https://globex.example/7", title: 7, source: "Globex", fetched: 20261010 },
        { link: "https://globex.example/8", title: "Eight", source: "Globex", fetched: "2026-10-11" },
      ]),
      "utf-8",
    );
    const app = createServer({ htmlPath: path.join(editedDir, "index.html"), jsonPath });
    const s = await new Promise<Server>((resolve) => {
      const srv = app.listen(0, "127.0.0.1", () => resolve(srv));
    });
    try {
      const { port } = s.address() as AddressInfo;
      const res = await fetch(`http://127.0.0.1:${port}/rss/Globex`);
      expect(res.status).toBe(200);
      const xml = await res.text();
      expect(xml).toContain("<title>7</title>");
      expect(xml).toContain("<title>Eight</title>");
    } finally {
      await new Promise<void>((resolve) => s.close(() => resolve()));
      fs.rmSync(editedDir, { recursive: true, force: true });
    }
  });
});
