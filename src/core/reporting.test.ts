import { describe, it } from "node:test";
import assert from "node:assert";
import {
  ReportingCache,
  SnapshotUnavailableError,
  filters,
  listTickets,
  locations,
  normalizeRow,
  stats,
  toNumberOrNull
} from "./reporting.js";
import { ReportRow } from "../types/contracts.js";
import { MemoryStore, makeTicket } from "../testing/fakes.js";

function row(over: Partial<ReportRow>): ReportRow {
  return {
    ticketId: "TKT-1",
    createdAt: "2024-05-01T10:00:00.000Z",
    category: "RoadInfra",
    severity: "High",
    status: "Open",
    officer: "Road Engineer",
    description: "Deep pothole.",
    lat: 12.9,
    lon: 77.6,
    mapLink: "",
    area: "",
    postalCode: "",
    rating: null,
    ...over
  };
}

const rows: ReportRow[] = [
  row({ ticketId: "TKT-1" }),
  row({ ticketId: "TKT-2", status: "Resolved", category: "Sanitation", officer: "Sanitation Inspector", description: "Overflowing bin.", rating: 4 }),
  row({ ticketId: "TKT-3", severity: "Low", description: "Small crack near the bus stop.", lat: null }),
  row({ ticketId: "TKT-4", status: "", officer: " " })
];

describe("toNumberOrNull", () => {
  it("accepts finite numbers and numeric strings", () => {
    assert.strictEqual(toNumberOrNull(12.5), 12.5);
    assert.strictEqual(toNumberOrNull(" 77.6 "), 77.6);
    assert.strictEqual(toNumberOrNull(""), null);
    assert.strictEqual(toNumberOrNull("n/a"), null);
    assert.strictEqual(toNumberOrNull(Number.NaN), null);
    assert.strictEqual(toNumberOrNull(undefined), null);
  });

  it("normalizes a raw row", () => {
    const out = normalizeRow({ ...row({}), lat: "12.9", lon: "bad", rating: "" });
    assert.strictEqual(out.lat, 12.9);
    assert.strictEqual(out.lon, null);
    assert.strictEqual(out.rating, null);
  });
});

describe("stats", () => {
  it("counts statuses, skipping empty ones in the breakdown", () => {
    assert.deepStrictEqual(stats(rows), {
      total: 4,
      open: 3,
      resolved: 1,
      breakdown: { Open: 2, Resolved: 1 }
    });
  });
});

describe("filters", () => {
  it("lists sorted distinct non-empty values", () => {
    assert.deepStrictEqual(filters(rows), {
      categories: ["RoadInfra", "Sanitation"],
      severities: ["High", "Low"],
      statuses: ["Open", "Resolved"],
      officers: ["Road Engineer", "Sanitation Inspector"]
    });
  });
});

describe("listTickets", () => {
  it("applies exact-match filters", () => {
    assert.deepStrictEqual(listTickets(rows, { category: "RoadInfra", severity: "Low" }).map((r) => r.ticketId), ["TKT-3"]);
    assert.deepStrictEqual(listTickets(rows, { status: "Resolved" }).map((r) => r.ticketId), ["TKT-2"]);
  });

  it("searches id and description case-insensitively", () => {
    assert.deepStrictEqual(listTickets(rows, { search: "BUS STOP" }).map((r) => r.ticketId), ["TKT-3"]);
    assert.deepStrictEqual(listTickets(rows, { search: "tkt-2" }).map((r) => r.ticketId), ["TKT-2"]);
  });

  it("returns everything without filters", () => {
    assert.strictEqual(listTickets(rows, {}).length, 4);
  });
});

describe("locations", () => {
  it("skips rows without coordinates", () => {
    assert.deepStrictEqual(locations(rows.slice(0, 3)), [
      { id: "TKT-1", lat: 12.9, lng: 77.6, category: "RoadInfra", severity: "High", status: "Open", desc: "Deep pothole." },
      { id: "TKT-2", lat: 12.9, lng: 77.6, category: "Sanitation", severity: "High", status: "Resolved", desc: "Overflowing bin." }
    ]);
  });
});

describe("ReportingCache", () => {
  it("serves the last snapshot when the store fails", async () => {
    let t = 0;
    const store = new MemoryStore();
    await store.appendTicket(makeTicket());
    const cache = new ReportingCache({ store, ttlSeconds: 60, now: () => t });

    assert.strictEqual((await cache.getSnapshot()).length, 1);
    store.failTickets = true;
    t += 120_000;
    const again = await cache.getSnapshot();
    assert.deepStrictEqual(again.map((r) => r.ticketId), ["TKT-1"]);
  });

  it("throws SnapshotUnavailableError with no snapshot to fall back on", async () => {
    const store = new MemoryStore();
    store.failTickets = true;
    const cache = new ReportingCache({ store });
    await assert.rejects(cache.getSnapshot(), SnapshotUnavailableError);
  });
});
