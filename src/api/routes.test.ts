import { describe, it, before, after } from "node:test";
import assert from "node:assert";
import http from "node:http";
import express from "express";
import { makeRoutes } from "./routes.js";
import { ReportingCache } from "../core/reporting.js";
import { MemoryStore, makeTicket } from "../testing/fakes.js";
import { listen } from "../testing/http.js";

describe("reporting routes", () => {
  let server: http.Server;
  let baseUrl = "";
  const store = new MemoryStore();

  before(async () => {
    await store.appendTicket(makeTicket({ ticketId: "TKT-1", description: "Deep pothole near the school." }));
    await store.appendTicket(makeTicket({ ticketId: "TKT-2", category: "Sanitation", assignedOfficer: "Sanitation Inspector", status: "Resolved", rating: 4 }));

    const app = express();
    app.use("/api", makeRoutes({
      reporting: new ReportingCache({ store, ttlSeconds: 60 }),
      reportKey: "test-secret",
      rateLimit: { windowMs: 60_000, max: 100 }
    }));
    ({ server, baseUrl } = await listen(app));
  });

  after(() => {
    server.close();
  });

  const get = (path: string, key: string | null = "test-secret") =>
    fetch(`${baseUrl}${path}`, { headers: key ? { "x-report-key": key } : {} });

  it("serves health without a key", async () => {
    const r = await get("/api/health", null);
    assert.strictEqual(r.status, 200);
    assert.deepStrictEqual(await r.json(), { ok: true });
  });

  it("requires the report key", async () => {
    const missing = await get("/api/stats", null);
    assert.strictEqual(missing.status, 401);
    assert.deepStrictEqual(await missing.json(), { ok: false, error: "missing_report_key" });

    const wrong = await get("/api/stats", "not-it");
    assert.strictEqual(wrong.status, 401);
    assert.deepStrictEqual(await wrong.json(), { ok: false, error: "invalid_report_key" });
  });

  it("accepts the key as a query parameter", async () => {
    const r = await get("/api/stats?k=test-secret", null);
    assert.strictEqual(r.status, 200);
  });

  it("returns stats", async () => {
    const r = await get("/api/stats");
    assert.deepStrictEqual(await r.json(), { total: 2, open: 1, resolved: 1, breakdown: { Open: 1, Resolved: 1 } });
  });

  it("returns filter values", async () => {
    const r = await get("/api/filters");
    assert.deepStrictEqual(await r.json(), {
      categories: ["RoadInfra", "Sanitation"],
      severities: ["High"],
      statuses: ["Open", "Resolved"],
      officers: ["Road Engineer", "Sanitation Inspector"]
    });
  });

  it("filters and searches works", async () => {
    const r = await get("/api/works?category=RoadInfra&search=SCHOOL");
    const body: unknown = await r.json();
    assert.ok(Array.isArray(body));
    assert.strictEqual(body.length, 1);
    assert.strictEqual(body[0].ticketId, "TKT-1");
    assert.strictEqual(body[0].officer, "Road Engineer");
  });

  it("rejects a malformed works query", async () => {
    const r = await get("/api/works?category=a&category=b");
    assert.strictEqual(r.status, 400);
    assert.deepStrictEqual(await r.json(), { ok: false, error: "invalid_request" });
  });

  it("returns map points", async () => {
    const r = await get("/api/locations");
    const body: unknown = await r.json();
    assert.ok(Array.isArray(body));
    assert.deepStrictEqual(body[0], {
      id: "TKT-1",
      lat: 12.9,
      lng: 77.6,
      category: "RoadInfra",
      severity: "High",
      status: "Open",
      desc: "Deep pothole near the school."
    });
  });
});

describe("reporting routes without a snapshot", () => {
  let server: http.Server;
  let baseUrl = "";

  before(async () => {
    const store = new MemoryStore();
    store.failTickets = true;
    const app = express();
    app.use("/api", makeRoutes({ reporting: new ReportingCache({ store }) }));
    ({ server, baseUrl } = await listen(app));
  });

  after(() => {
    server.close();
  });

  it("answers 503 and stays open when no key is configured", async () => {
    const r = await fetch(`${baseUrl}/api/stats`);
    assert.strictEqual(r.status, 503);
    assert.deepStrictEqual(await r.json(), { ok: false, error: "snapshot_unavailable" });
  });
});

describe("reporting routes rate limit", () => {
  let server: http.Server;
  let baseUrl = "";

  before(async () => {
    const app = express();
    app.use("/api", makeRoutes({
      reporting: new ReportingCache({ store: new MemoryStore(), ttlSeconds: 60 }),
      reportKey: "test-secret",
      rateLimit: { windowMs: 60_000, max: 2 }
    }));
    ({ server, baseUrl } = await listen(app));
  });

  after(() => {
    server.close();
  });

  it("answers 429 once the window budget is spent, health excepted", async () => {
    const get = (path: string) => fetch(`${baseUrl}${path}`, { headers: { "x-report-key": "test-secret" } });
    assert.strictEqual((await get("/api/stats")).status, 200);
    assert.strictEqual((await get("/api/stats")).status, 200);

    const limited = await get("/api/stats");
    assert.strictEqual(limited.status, 429);
    assert.deepStrictEqual(await limited.json(), { ok: false, error: "rate_limited" });

    assert.strictEqual((await get("/api/health")).status, 200);
  });
});
