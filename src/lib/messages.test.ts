import { describe, it } from "node:test";
import assert from "node:assert";
import * as msg from "./messages.js";
import { escapeHtml, html, link } from "./html.js";
import { makeTicket } from "../testing/fakes.js";

describe("escapeHtml", () => {
  it("escapes markup characters", () => {
    assert.strictEqual(escapeHtml(`<a href="x">&</a>`), "&lt;a href=&quot;x&quot;&gt;&amp;&lt;/a&gt;");
    assert.strictEqual(escapeHtml(undefined), "");
  });

  it("leaves links built with link() intact", () => {
    assert.strictEqual(
      html`see ${link("https://example.org/?a=1&b=2", "map <here>")} or ${"<b>"}`,
      "see <a href=\"https://example.org/?a=1&amp;b=2\">map &lt;here&gt;</a> or &lt;b&gt;"
    );
  });
});

describe("messages", () => {
  it("escapes user-provided names and reasons", () => {
    assert.ok(msg.welcome("<Asha>").startsWith("Hi &lt;Asha&gt;!\n"));
    assert.strictEqual(
      msg.notice({ kind: "rejected", reason: "Not <real>" }),
      "❌ <b>Report not accepted</b>\nNot &lt;real&gt;"
    );
  });

  it("puts the ticket reference where the resolution flow reads it", () => {
    const lines = msg.officerNotification(makeTicket({ ticketId: "TKT-42" })).split("\n");
    assert.strictEqual(lines[0], "🚨 New Grievance Assigned!");
    assert.strictEqual(lines[1], "Ticket: #TKT-42");
    assert.strictEqual(lines[5], "📍 Indiranagar - 560038");
    assert.strictEqual(lines[6], "🗺️ <a href=\"https://www.google.com/maps?q=12.9,77.6\">Open map</a>");
  });

  it("renders the rating thanks with one star per point", () => {
    assert.strictEqual(msg.ratingThanks(3), "Thank you! You rated the resolution ⭐⭐⭐");
  });

  it("rounds the reported accuracy", () => {
    assert.ok(msg.askResample(26.4, 25).startsWith("📡 Your location is accurate to about 26 m, but I need 25 m or better."));
  });

  it("names a missing accuracy instead of a number", () => {
    assert.strictEqual(
      msg.askResample(Number.POSITIVE_INFINITY, 25).split("\n")[0],
      "📡 That location came without an accuracy reading, but I need 25 m or better."
    );
  });
});
