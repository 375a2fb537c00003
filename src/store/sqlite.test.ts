import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert";
import { SqliteStore, TicketRow, ticketFromRow } from "./sqlite.js";
import { makeTicket } from "../testing/fakes.js";

describe("SqliteStore", () => {
  let store: SqliteStore;

  beforeEach(async () => {
    store = new SqliteStore(":memory:");
    await store.init();
  });

  afterEach(async () => {
    await store.close();
  });

  it("round-trips a ticket and ignores a repeated append", async () => {
    await store.appendTicket(makeTicket());
    assert.strictEqual(await store.appendTicket(makeTicket({ description: "changed" })), true);
    assert.deepStrictEqual(await store.findTicket("TKT-1"), makeTicket());
  });

  it("refuses an id already held by another submitter", async () => {
    await store.appendTicket(makeTicket({ submitterRef: "1001" }));
    assert.strictEqual(await store.appendTicket(makeTicket({ submitterRef: "2002" })), false);
    assert.strictEqual((await store.findTicket("TKT-1"))?.submitterRef, "1001");
  });

  it("reads missing coordinates as NaN rather than 0", () => {
    const row: TicketRow = {
      ticketId: "TKT-1",
      createdAt: "2024-05-01T10:00:00.000Z",
      category: "RoadInfra",
      severity: "High",
      description: "Deep pothole.",
      status: "Open",
      assignedOfficer: "Road Engineer",
      escalationOfficer: "Ward Commissioner",
      slaHours: 48,
      latitude: null,
      longitude: "",
      mapLink: "",
      area: "",
      postalCode: "",
      submitterRef: "1001",
      beforeEvidenceRef: "file-before",
      afterEvidenceRef: null,
      rating: null,
      resolvedAt: null,
      ratedAt: null
    };
    const t = ticketFromRow(row);
    assert.ok(Number.isNaN(t.latitude));
    assert.ok(Number.isNaN(t.longitude));
    assert.strictEqual(ticketFromRow({ ...row, latitude: "12.9", longitude: 77.6 }).latitude, 12.9);
  });

  it("resolves with the after photo and keeps it when not given again", async () => {
    await store.appendTicket(makeTicket());
    assert.strictEqual(await store.updateStatus("TKT-1", "Resolved", "file-after"), true);
    const t = await store.findTicket("TKT-1");
    assert.strictEqual(t?.status, "Resolved");
    assert.strictEqual(t?.afterEvidenceRef, "file-after");
    assert.ok(t?.resolvedAt);
  });

  it("rates and reports unknown ids", async () => {
    await store.appendTicket(makeTicket());
    assert.strictEqual(await store.updateRating("TKT-1", 4), true);
    assert.strictEqual((await store.findTicket("TKT-1"))?.rating, 4);
    assert.strictEqual(await store.updateRating("TKT-9", 4), false);
    assert.strictEqual(await store.updateStatus("TKT-9", "Resolved"), false);
    assert.strictEqual(await store.getMeta("TKT-9"), null);
  });

  it("lists report rows newest first", async () => {
    await store.appendTicket(makeTicket({ ticketId: "TKT-1", createdAt: "2024-05-01T10:00:00.000Z" }));
    await store.appendTicket(makeTicket({ ticketId: "TKT-2", createdAt: "2024-05-02T10:00:00.000Z" }));
    const rows = await store.listTickets();
    assert.deepStrictEqual(rows.map((r) => r.ticketId), ["TKT-2", "TKT-1"]);
    assert.strictEqual(rows[0].lat, 12.9);
    assert.strictEqual(rows[0].rating, null);
  });

  it("upserts officers and lists them in insertion order", async () => {
    await store.upsertOfficer({ officerId: "OFF-100", name: "Ward Commissioner", reportsTo: "", level: "2", sector: "Administration" });
    await store.upsertOfficer({ officerId: "OFF-101", name: "Road Engineer", reportsTo: "OFF-100", level: "1", sector: "RoadInfra" });
    await store.upsertOfficer({ officerId: "OFF-101", name: "Road Engineer", reportsTo: "OFF-100", level: "1", sector: "RoadInfra", chatId: "2001" });

    assert.deepStrictEqual(await store.listRoster(), [
      { officerId: "OFF-100", name: "Ward Commissioner", reportsTo: "", level: "2", sector: "Administration" },
      { officerId: "OFF-101", name: "Road Engineer", reportsTo: "OFF-100", level: "1", sector: "RoadInfra", chatId: "2001" }
    ]);
  });
});
