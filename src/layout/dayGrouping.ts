/**
 * Day grouping for timeline layout
 * Sorts events chronologically and buckets them by calendar date
 */

import { Temporal } from '@js-temporal/polyfill';
import type { TimelineEvent, DayGroup } from '../core/types';

/**
 * Sort events by date, keeping input order for events on the same date
 */
export function sortEventsByDate(events: readonly TimelineEvent[]): TimelineEvent[] {
  // Array.prototype.sort is stable
  return [...events].sort((a, b) => Temporal.PlainDate.compare(a.date, b.date));
}

/**
 * Group events into one bucket per distinct date, oldest first
 */
export function groupEventsByDay(events: readonly TimelineEvent[]): DayGroup[] {
  const groups: DayGroup[] = [];
  const byDate = new Map<string, DayGroup>();

  for (const event of sortEventsByDate(events)) {
    let group = byDate.get(event.dateText);
    if (!group) {
      group = { dateText: event.dateText, date: event.date, events: [] };
      byDate.set(event.dateText, group);
      groups.push(group);
    }
    group.events.push(event);
  }

  return groups;
}
