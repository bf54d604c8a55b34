/**
 * Ordering strategies
 * Decide which instant counts as a document's creation time
 */

import type { Stats } from "node:fs";
import type { OrderBy } from "../types/config";

export interface OrderingInput {
  path: string;
  fileName: string;
  stats: Pick<Stats, "birthtime" | "birthtimeMs" | "mtime">;
}

export type OrderingStrategy = (file: OrderingInput) => Date;

/**
 * Birth time, or modification time where the filesystem reports none
 */
export const byBirthtime: OrderingStrategy = ({ stats }) =>
  stats.birthtimeMs > 0 ? stats.birthtime : stats.mtime;

export const byMtime: OrderingStrategy = ({ stats }) => stats.mtime;

export function getOrderingStrategy(orderBy: OrderBy): OrderingStrategy {
  switch (orderBy) {
    case "birthtime":
      return byBirthtime;
    case "mtime":
      return byMtime;
  }
}

/**
 * Ascending by timestamp, ties broken by file name
 */
export function compareDocuments(
  a: { createdAt: Date; fileName: string },
  b: { createdAt: Date; fileName: string },
): number {
  const diff = a.createdAt.getTime() - b.createdAt.getTime();
  if (diff !== 0) return diff;
  if (a.fileName < b.fileName) return -1;
  if (a.fileName > b.fileName) return 1;
  return 0;
}
