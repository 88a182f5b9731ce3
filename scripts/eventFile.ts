/**
 * Reading event records from JSON
 */

import type { EventRecord } from "../src/core/types";

function isRecordObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function textField(value: unknown): string {
  return typeof value === "string" ? value : value === undefined || value === null ? "" : String(value);
}

/**
 * Parse a JSON array of event records
 * Field values are turned into strings so that a bad date is reported by the
 * generator like any other malformed date
 */
export function parseEventRecords(json: string): EventRecord[] {
  const data: unknown = JSON.parse(json);
  if (!Array.isArray(data)) {
    throw new Error("Event file must contain a JSON array of {date, time, text} objects");
  }

  return data.map((entry: unknown, index) => {
    if (!isRecordObject(entry)) {
      throw new Error(`Event #${index} is not an object`);
    }
    return {
      date: textField(entry.date),
      time: textField(entry.time),
      text: textField(entry.text),
    };
  });
}
