/**
 * @tally/cli — CSV snapshot writer.
 *
 * Output format:
 *   client,available,held,total,locked
 *   1,1.5000,0.0000,1.5000,false
 */

import { stringify } from "csv-stringify/sync";
import type { AccountSnapshot } from "@tally/engine";
import type { OutputOrder } from "./config.js";

export const SNAPSHOT_HEADER = ["client", "available", "held", "total", "locked"] as const;

/**
 * Order accounts for output. "first-seen" keeps the engine's order;
 * "client" sorts by ascending client id.
 */
export function orderAccounts(
  accounts: readonly AccountSnapshot[],
  order: OutputOrder,
): readonly AccountSnapshot[] {
  if (order === "first-seen") {
    return accounts;
  }
  return [...accounts].sort((a, b) => a.client - b.client);
}

/**
 * Render accounts as CSV. The header is written even when there are no
 * accounts.
 */
export function renderSnapshot(accounts: readonly AccountSnapshot[]): string {
  const rows: string[][] = [[...SNAPSHOT_HEADER]];
  for (const account of accounts) {
    rows.push([
      String(account.client),
      account.available.toDecimal(),
      account.held.toDecimal(),
      account.total.toDecimal(),
      String(account.locked),
    ]);
  }
  return stringify(rows, { record_delimiter: "unix" });
}
