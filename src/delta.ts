import type { CleanedRecord, DeltaRecord } from "./types.js";
import { toDurationMap } from "./cleaner.js";

// Both snapshots hold cumulative history, so the session is the difference.
// A page whose total went down (history rolled over) counts as zero.
export function computeDelta(
  initial: readonly CleanedRecord[],
  current: readonly CleanedRecord[]
): DeltaRecord[] {
  const baseline = toDurationMap(initial);

  return current
    .map((record) => ({
      page: record.page,
      deltaDuration: Math.max(0, record.totalDuration - (baseline.get(record.page) ?? 0)),
    }))
    .sort((a, b) => a.page - b.page);
}

export function totalDelta(deltas: readonly DeltaRecord[]): number {
  return deltas.reduce((sum, d) => sum + d.deltaDuration, 0);
}
