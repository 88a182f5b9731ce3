/**
 * Validation utilities for event records
 */

import type { EventRecord } from '../core/types';
import { wrapText } from '../layout/textWrap';
import { DEFAULT_LAYOUT } from '../layout/timelineLayout';
import { normalizeEvents } from './timeNormalization';
import type { NormalizedEvents } from './timeNormalization';

export interface ValidationError {
  type: 'error' | 'warning';
  message: string;
  index?: number; // Position of the record in the input
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationError[];
}

/**
 * Build a validation result from already normalized events
 * Malformed dates are errors; events that share a date and time label and
 * both wrap to zero lines are reported as a warning since they draw on top
 * of each other
 */
export function buildValidationResult(
  normalized: NormalizedEvents,
  wrapWidth: number = DEFAULT_LAYOUT.wrapWidth
): ValidationResult {
  const errors = [...normalized.rejected];
  const warnings: ValidationError[] = [];

  const emptyBySlot = new Map<string, number[]>();
  for (const event of normalized.events) {
    if (wrapText(event.text, wrapWidth).length > 0) continue;
    const key = `${event.dateText}\u0000${event.time}`;
    const indices = emptyBySlot.get(key) ?? [];
    indices.push(event.index);
    emptyBySlot.set(key, indices);
  }

  for (const [key, indices] of emptyBySlot) {
    if (indices.length < 2) continue;
    const [dateText, time] = key.split('\u0000');
    warnings.push({
      type: 'warning',
      message: `Events ${indices.map((i) => `#${i}`).join(', ')} on ${dateText} at "${time}" have no text and overlap`,
      index: indices[0],
    });
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Validate event records
 */
export function validateEventRecords(
  records: readonly EventRecord[],
  wrapWidth: number = DEFAULT_LAYOUT.wrapWidth
): ValidationResult {
  return buildValidationResult(normalizeEvents(records), wrapWidth);
}

/**
 * Format validation result as a human-readable string
 */
export function formatValidationResult(result: ValidationResult): string {
  const lines: string[] = [];

  if (result.valid && result.warnings.length === 0) {
    lines.push('✓ Event data is valid');
    return lines.join('\n');
  }

  if (result.errors.length > 0) {
    lines.push('✗ Some events were skipped:');
    lines.push('');
    lines.push('Errors:');
    for (const error of result.errors) {
      lines.push(`  • ${error.message}`);
    }
  }

  if (result.warnings.length > 0) {
    if (lines.length > 0) lines.push('');
    lines.push('Warnings:');
    for (const warning of result.warnings) {
      lines.push(`  ⚠ ${warning.message}`);
    }
  }

  return lines.join('\n');
}
