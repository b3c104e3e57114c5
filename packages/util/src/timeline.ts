import { LAYER_NAMES } from "@adaptive-groove/core";
import type { EventsByLayer, SessionResult, TimedTimelineEvent, TimelineEvent } from "./types.js";

export function ticksToSeconds(ticks: number, bpm: number, ppq: number): number {
  return (ticks / ppq) * (60 / bpm);
}

/** Merges every layer into one list ordered by start tick, then by layer order. */
export function flattenEvents(events: EventsByLayer): TimelineEvent[] {
  const merged: Array<{ event: TimelineEvent; order: number }> = [];
  LAYER_NAMES.forEach((layer, order) => {
    for (const event of events[layer]) {
      merged.push({ event: { ...event, layer }, order });
    }
  });
  merged.sort((a, b) => a.event.startTick - b.event.startTick || a.order - b.order);
  return merged.map(({ event }) => event);
}

export function secondsTimeline(result: SessionResult): TimedTimelineEvent[] {
  const { bpm, ppq } = result.meta;
  return flattenEvents(result.events).map((event) => ({
    ...event,
    startSeconds: ticksToSeconds(event.startTick, bpm, ppq),
    durationSeconds: ticksToSeconds(event.durationTick, bpm, ppq)
  }));
}
