import { describe, it } from "node:test";
import { strict as assert } from "node:assert";
import { canTransition } from "./transitions.js";
import { TICKET_STATUSES } from "../types/contracts.js";

describe("canTransition", () => {
  it("allows Open -> Resolved", () => {
    assert.equal(canTransition("Open", "Resolved"), true);
  });

  it("allows nothing out of Resolved", () => {
    for (const to of TICKET_STATUSES) {
      assert.equal(canTransition("Resolved", to), false, `Resolved -> ${to}`);
    }
  });

  it("does not allow self transitions", () => {
    assert.equal(canTransition("Open", "Open"), false);
  });
});
