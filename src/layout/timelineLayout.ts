/**
 * Timeline layout
 * Sizes each event from its wrapped line count, stacks events inside their
 * day group and places groups in fixed-width slots from left to right
 */

import type {
  DayGroup,
  DayGroupLayout,
  EventLayout,
  TimelineLayout,
  TimelineLayoutConfig,
} from '../core/types';
import { wrapText } from './textWrap';

export const DEFAULT_LAYOUT: Readonly<TimelineLayoutConfig> = Object.freeze({
  wrapWidth: 14,
  lineHeight: 15,
  eventPadding: 10,
  eventGap: 10,
  baselineY: 100,
  baselineInset: 50,
  leftMargin: 80,
  slotWidth: 160,
  slotGutter: 20,
  minWidth: 1100,
  minHeight: 100,
  bottomMargin: 50,
  dateLabelOffset: 20,
  groupOffset: 25,
  connectorOverlap: 15,
  textIndent: 15,
  timeLabelY: 5,
  firstLineY: 20,
});

/**
 * Merge overrides over the defaults and reject values no layout can use
 */
export function resolveLayoutConfig(overrides: Partial<TimelineLayoutConfig> = {}): TimelineLayoutConfig {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );
  const config: TimelineLayoutConfig = { ...DEFAULT_LAYOUT, ...defined };

  for (const [key, value] of Object.entries(config)) {
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
      throw new RangeError(`Layout option "${key}" must be a non-negative finite number, got ${value}`);
    }
  }

  if (!Number.isInteger(config.wrapWidth) || config.wrapWidth < 1) {
    throw new RangeError(`Layout option "wrapWidth" must be a positive integer, got ${config.wrapWidth}`);
  }

  return config;
}

/**
 * Height taken by an event's line block and padding
 */
export function eventHeight(lineCount: number, config: TimelineLayoutConfig): number {
  return lineCount * config.lineHeight + config.eventPadding;
}

/**
 * Horizontal position of a day group's slot
 */
export function slotX(slot: number, config: TimelineLayoutConfig): number {
  return config.leftMargin + slot * config.slotWidth;
}

/**
 * Canvas width for a number of day groups, never below the minimum
 */
export function canvasWidth(groupCount: number, config: TimelineLayoutConfig): number {
  return Math.max(config.minWidth, groupCount * (config.slotWidth + config.slotGutter));
}

/**
 * Lay out one day group: wrap each event and stack it below the previous one
 */
export function layoutDayGroup(group: DayGroup, slot: number, config: TimelineLayoutConfig): DayGroupLayout {
  const events: EventLayout[] = [];
  let offsetY = 0;

  for (const event of group.events) {
    const lines = wrapText(event.text, config.wrapWidth);
    const height = eventHeight(lines.length, config);
    events.push({ event, lines, offsetY, height });
    offsetY += height + config.eventGap;
  }

  return {
    dateText: group.dateText,
    slot,
    x: slotX(slot, config),
    // Sum of event heights plus one gap per event
    height: offsetY,
    events,
  };
}

/**
 * Compute the full timeline layout for chronologically ordered day groups
 */
export function computeTimelineLayout(
  groups: readonly DayGroup[],
  config: TimelineLayoutConfig = DEFAULT_LAYOUT
): TimelineLayout {
  const groupLayouts = groups.map((group, slot) => layoutDayGroup(group, slot, config));

  const tallest = groupLayouts.reduce(
    (max, group) => Math.max(max, config.baselineY + group.height + config.bottomMargin),
    config.minHeight
  );
  const width = canvasWidth(groups.length, config);

  return {
    width,
    height: tallest,
    baselineY: config.baselineY,
    baselineStartX: config.baselineInset,
    baselineEndX: width - config.baselineInset,
    groups: groupLayouts,
  };
}
