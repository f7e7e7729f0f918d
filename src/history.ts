import { z } from "zod";
import type { Config, RawEvent, TimeRange } from "./types.js";
import { SourceUnavailableError } from "./errors.js";

export interface EventSource {
  fetchEvents(range: TimeRange): Promise<RawEvent[]>;
}

const timestamp = z
  .string()
  .refine((value) => !isNaN(new Date(value).getTime()), "invalid timestamp");

const bucketsSchema = z.record(z.unknown());

const windowEventsSchema = z.array(
  z.object({
    timestamp,
    duration: z.number().min(0),
    data: z.object({
      app: z.string().optional(),
      title: z.string().optional(),
    }),
  })
);

const afkEventsSchema = z.array(
  z.object({
    timestamp,
    duration: z.number().min(0),
    data: z.object({
      status: z.string().optional(),
    }),
  })
);

type Interval = [number, number];

function mergeIntervals(intervals: Interval[]): Interval[] {
  const sorted = [...intervals].sort((a, b) => a[0] - b[0]);
  const merged: Interval[] = [];

  for (const [start, end] of sorted) {
    const last = merged[merged.length - 1];
    if (last && start <= last[1]) {
      last[1] = Math.max(last[1], end);
    } else {
      merged.push([start, end]);
    }
  }

  return merged;
}

/**
 * Seconds of `[start, start + duration)` covered by the active intervals.
 * Anything outside a not-afk interval (afk, or unobserved) counts as idle.
 */
export function activeSeconds(start: number, duration: number, active: Interval[]): number {
  const end = start + duration * 1000;
  let total = 0;

  for (const [activeStart, activeEnd] of active) {
    const overlapStart = Math.max(start, activeStart);
    const overlapEnd = Math.min(end, activeEnd);
    if (overlapStart < overlapEnd) {
      total += overlapEnd - overlapStart;
    }
  }

  return total / 1000;
}

export function excludeAfkTime(
  windowEvents: z.infer<typeof windowEventsSchema>,
  afkEvents: z.infer<typeof afkEventsSchema>,
  viewerApp: string
): RawEvent[] {
  const active = mergeIntervals(
    afkEvents
      .filter((e) => e.data.status === "not-afk")
      .map((e): Interval => {
        const start = new Date(e.timestamp).getTime();
        return [start, start + e.duration * 1000];
      })
  );

  const events: RawEvent[] = [];

  for (const event of windowEvents) {
    if (event.data.app !== viewerApp || !event.data.title) {
      continue;
    }

    const start = new Date(event.timestamp).getTime();
    events.push({
      timestamp: new Date(start).toISOString(),
      duration: activeSeconds(start, event.duration, active),
      windowTitle: event.data.title,
    });
  }

  return events.sort((a, b) => new Date(a.timestamp).getTime() - new Date(b.timestamp).getTime());
}

export class ActivityWatchSource implements EventSource {
  constructor(private readonly config: Config) {}

  private async getJson(pathname: string, params: Record<string, string> = {}): Promise<unknown> {
    const url = new URL(`${this.config.apiUrl}${pathname}`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }

    let response: Response;
    try {
      response = await fetch(url);
    } catch (error) {
      throw new SourceUnavailableError(
        `Could not reach ActivityWatch at ${this.config.apiUrl}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    if (!response.ok) {
      throw new SourceUnavailableError(`GET ${url.pathname} failed with HTTP ${response.status}`);
    }

    try {
      return await response.json();
    } catch (error) {
      throw new SourceUnavailableError(
        `GET ${url.pathname} returned invalid JSON: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  private async findBuckets(): Promise<{ window: string; afk: string }> {
    const parsed = bucketsSchema.safeParse(await this.getJson("/api/0/buckets/"));
    if (!parsed.success) {
      throw new SourceUnavailableError("Unexpected bucket list from ActivityWatch");
    }

    const ids = Object.keys(parsed.data);
    const window = ids.find((id) => id.startsWith("aw-watcher-window_"));
    const afk = ids.find((id) => id.startsWith("aw-watcher-afk_"));

    if (!window || !afk) {
      throw new SourceUnavailableError(
        "Could not find the window and AFK watcher buckets. Make sure ActivityWatch is running."
      );
    }

    return { window, afk };
  }

  private async getEvents<T extends z.ZodTypeAny>(
    bucketId: string,
    range: TimeRange,
    schema: T
  ): Promise<z.output<T>> {
    const params: Record<string, string> = { limit: String(this.config.eventLimit) };
    if (range.start) params.start = range.start.toISOString();
    if (range.end) params.end = range.end.toISOString();

    const body = await this.getJson(`/api/0/buckets/${encodeURIComponent(bucketId)}/events`, params);
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new SourceUnavailableError(`Unexpected event data in bucket ${bucketId}`);
    }
    return parsed.data;
  }

  async fetchEvents(range: TimeRange): Promise<RawEvent[]> {
    const buckets = await this.findBuckets();

    const afkEvents = await this.getEvents(buckets.afk, range, afkEventsSchema);
    const windowEvents = await this.getEvents(buckets.window, range, windowEventsSchema);

    return excludeAfkTime(windowEvents, afkEvents, this.config.viewerApp);
  }
}
