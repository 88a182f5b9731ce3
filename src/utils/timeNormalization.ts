/**
 * Date normalization utilities
 * Parses the fixed YYYY-MM-DD event date format into Temporal.PlainDate values
 */

import { Temporal } from '@js-temporal/polyfill';
import type { EventRecord, TimelineEvent } from '../core/types';
import type { ValidationError } from './validation';

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Records that survived date parsing, plus one error per dropped record
 */
export interface NormalizedEvents {
  events: TimelineEvent[];
  rejected: ValidationError[];
}

/**
 * Parse an event date
 * Only four-digit year, two-digit month and two-digit day separated by dashes
 * are accepted, and the result must be a real calendar date
 */
export function parseEventDate(input: unknown): Temporal.PlainDate {
  if (typeof input !== 'string') {
    throw new Error(`Date must be a string, got ${input === null ? 'null' : typeof input}`);
  }

  const match = DATE_PATTERN.exec(input);
  if (!match) {
    throw new Error(`Date "${input}" does not match YYYY-MM-DD`);
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (year < 1) {
    throw new Error(`Date "${input}" has year 0000`);
  }

  try {
    return Temporal.PlainDate.from({ year, month, day }, { overflow: 'reject' });
  } catch {
    throw new Error(`Date "${input}" is not a valid calendar date`);
  }
}

/**
 * Describe a record for diagnostics
 */
export function describeRecord(record: EventRecord, index: number): string {
  return `#${index} ${JSON.stringify(record)}`;
}

/**
 * Parse every record's date, keeping the ones that parse
 */
export function normalizeEvents(records: readonly EventRecord[]): NormalizedEvents {
  const events: TimelineEvent[] = [];
  const rejected: ValidationError[] = [];

  records.forEach((record, index) => {
    try {
      events.push({
        dateText: record.date,
        date: parseEventDate(record.date),
        time: record.time,
        text: record.text,
        index,
      });
    } catch (err) {
      rejected.push({
        type: 'error',
        message: `Ignoring event ${describeRecord(record, index)} with invalid date: ${err instanceof Error ? err.message : String(err)}`,
        index,
      });
    }
  });

  return { events, rejected };
}
