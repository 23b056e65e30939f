/**
 * Tests for the CSV snapshot writer.
 */

import { describe, it, expect } from "vitest";
import { Amount } from "@tally/engine";
import type { AccountSnapshot } from "@tally/engine";
import { orderAccounts, renderSnapshot } from "../src/writer.js";

function snapshot(client: number, available: string, held: string, locked = false): AccountSnapshot {
  const a = Amount.fromDecimal(available);
  const h = Amount.fromDecimal(held);
  return { client, available: a, held: h, total: a.add(h), locked };
}

describe("renderSnapshot", () => {
  it("writes only the header when there are no accounts", () => {
    expect(renderSnapshot([])).toBe("client,available,held,total,locked\n");
  });

  it("writes four decimals and boolean words", () => {
    const csv = renderSnapshot([snapshot(1, "1.5", "0"), snapshot(2, "-0.25", "3", true)]);
    expect(csv).toBe(
      "client,available,held,total,locked\n" +
        "1,1.5000,0.0000,1.5000,false\n" +
        "2,-0.2500,3.0000,2.7500,true\n",
    );
  });

  it("keeps the given order", () => {
    const csv = renderSnapshot([snapshot(9, "1", "0"), snapshot(3, "1", "0")]);
    expect(csv.split("\n").slice(1, 3).map((line) => line.split(",")[0])).toEqual(["9", "3"]);
  });
});

describe("orderAccounts", () => {
  const accounts = [snapshot(3, "1", "0"), snapshot(1, "1", "0"), snapshot(2, "1", "0")];

  it("leaves first-seen order untouched", () => {
    expect(orderAccounts(accounts, "first-seen").map((a) => a.client)).toEqual([3, 1, 2]);
  });

  it("sorts by client id without mutating the input", () => {
    expect(orderAccounts(accounts, "client").map((a) => a.client)).toEqual([1, 2, 3]);
    expect(accounts.map((a) => a.client)).toEqual([3, 1, 2]);
  });
});
