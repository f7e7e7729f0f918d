import type { CleanedRecord, PageEvent } from "./types.js";

function isEarlier(a: string, b: string): boolean {
  return new Date(a).getTime() < new Date(b).getTime();
}

/**
 * Collapses page events into one record per page. Revisits of a page add up,
 * so the total is the dwell time over the whole capture, not the last visit.
 */
export function cleanPageEvents(pageEvents: PageEvent[]): CleanedRecord[] {
  const byPage = new Map<number, CleanedRecord>();

  for (const event of pageEvents) {
    const existing = byPage.get(event.page);

    if (!existing) {
      byPage.set(event.page, {
        page: event.page,
        totalDuration: event.duration,
        firstSeen: event.timestamp,
        lastSeen: event.timestamp,
      });
      continue;
    }

    existing.totalDuration += event.duration;
    if (isEarlier(event.timestamp, existing.firstSeen)) {
      existing.firstSeen = event.timestamp;
    }
    if (isEarlier(existing.lastSeen, event.timestamp)) {
      existing.lastSeen = event.timestamp;
    }
  }

  return Array.from(byPage.values()).sort((a, b) => a.page - b.page);
}

export function toDurationMap(records: readonly CleanedRecord[]): Map<number, number> {
  return new Map(records.map((r) => [r.page, r.totalDuration]));
}
