/**
 * Tests for timeline layout
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_LAYOUT,
  resolveLayoutConfig,
  canvasWidth,
  slotX,
  eventHeight,
  layoutDayGroup,
  computeTimelineLayout,
} from '../src/layout/timelineLayout';
import { groupEventsByDay } from '../src/layout/dayGrouping';
import { normalizeEvents } from '../src/utils/timeNormalization';
import type { EventRecord } from '../src/core/types';

function groupsFor(records: EventRecord[]) {
  return groupEventsByDay(normalizeEvents(records).events);
}

describe('resolveLayoutConfig', () => {
  it('should return the defaults without overrides', () => {
    expect(resolveLayoutConfig()).toEqual(DEFAULT_LAYOUT);
  });

  it('should apply overrides', () => {
    const config = resolveLayoutConfig({ wrapWidth: 20, slotWidth: 200 });
    expect(config.wrapWidth).toBe(20);
    expect(config.slotWidth).toBe(200);
    expect(config.lineHeight).toBe(15);
  });

  it('should reject unusable values', () => {
    expect(() => resolveLayoutConfig({ wrapWidth: 0 })).toThrow(RangeError);
    expect(() => resolveLayoutConfig({ wrapWidth: 2.5 })).toThrow(RangeError);
    expect(() => resolveLayoutConfig({ lineHeight: -1 })).toThrow(RangeError);
    expect(() => resolveLayoutConfig({ minWidth: Number.NaN })).toThrow(RangeError);
  });
});

describe('canvasWidth', () => {
  it('should never fall below the minimum width', () => {
    expect(canvasWidth(0, DEFAULT_LAYOUT)).toBe(1100);
    expect(canvasWidth(1, DEFAULT_LAYOUT)).toBe(1100);
    expect(canvasWidth(6, DEFAULT_LAYOUT)).toBe(1100);
  });

  it('should grow by one slot and gutter per day group', () => {
    expect(canvasWidth(7, DEFAULT_LAYOUT)).toBe(1260);
    expect(canvasWidth(8, DEFAULT_LAYOUT)).toBe(1440);
  });

  it('should be non-decreasing in the number of day groups', () => {
    let previous = 0;
    for (let count = 0; count <= 30; count++) {
      const width = canvasWidth(count, DEFAULT_LAYOUT);
      expect(width).toBeGreaterThanOrEqual(previous);
      previous = width;
    }
  });
});

describe('slotX', () => {
  it('should place slots from the left margin', () => {
    expect(slotX(0, DEFAULT_LAYOUT)).toBe(80);
    expect(slotX(1, DEFAULT_LAYOUT)).toBe(240);
    expect(slotX(3, DEFAULT_LAYOUT)).toBe(560);
  });
});

describe('layoutDayGroup', () => {
  it('should stack events by their wrapped line counts', () => {
    const [group] = groupsFor([
      { date: '2023-05-10', time: '08:30', text: 'Alpha beta\nGamma delta epsilon' },
      { date: '2023-05-10', time: '14:15', text: 'Short' },
    ]);
    expect(group).toBeDefined();
    if (!group) return;

    const layout = layoutDayGroup(group, 0, DEFAULT_LAYOUT);

    expect(layout.events.map((e) => e.lines)).toEqual([
      ['Alpha beta', 'Gamma delta', 'epsilon'],
      ['Short'],
    ]);
    expect(layout.events.map((e) => e.height)).toEqual([55, 25]);
    expect(layout.events.map((e) => e.offsetY)).toEqual([0, 65]);
    expect(layout.height).toBe(100);
    expect(layout.x).toBe(80);
  });

  it('should give events without text only padding and gap', () => {
    const [group] = groupsFor([
      { date: '2023-05-10', time: '09:00', text: '' },
      { date: '2023-05-10', time: '09:00', text: '' },
    ]);
    if (!group) throw new Error('expected a group');

    const layout = layoutDayGroup(group, 0, DEFAULT_LAYOUT);
    expect(layout.events.map((e) => e.height)).toEqual([eventHeight(0, DEFAULT_LAYOUT), 10]);
    expect(layout.height).toBe(40);
  });
});

describe('computeTimelineLayout', () => {
  it('should size the canvas for the tallest day group', () => {
    const layout = computeTimelineLayout(
      groupsFor([
        { date: '2023-01-15', time: '09:00', text: 'Kickoff' },
        { date: '2023-05-10', time: '08:30', text: 'Alpha beta\nGamma delta epsilon' },
        { date: '2023-05-10', time: '14:15', text: 'Short' },
      ])
    );

    expect(layout.groups.map((g) => g.height)).toEqual([35, 100]);
    expect(layout.height).toBe(250);
    expect(layout.width).toBe(1100);
    expect(layout.baselineY).toBe(100);
    expect(layout.baselineStartX).toBe(50);
    expect(layout.baselineEndX).toBe(1050);
  });

  it('should place day groups left to right in date order', () => {
    const layout = computeTimelineLayout(
      groupsFor([
        { date: '2023-03-10', time: '11:15', text: 'Review' },
        { date: '2023-01-15', time: '09:00', text: 'Kickoff' },
      ])
    );

    expect(layout.groups.map((g) => g.dateText)).toEqual(['2023-01-15', '2023-03-10']);
    expect(layout.groups.map((g) => g.x)).toEqual([80, 240]);
  });

  it('should produce the minimum canvas for no groups', () => {
    const layout = computeTimelineLayout([]);
    expect(layout).toEqual({
      width: 1100,
      height: 100,
      baselineY: 100,
      baselineStartX: 50,
      baselineEndX: 1050,
      groups: [],
    });
  });

  it('should widen the canvas and baseline past six day groups', () => {
    const records = Array.from({ length: 8 }, (_, i) => ({
      date: `2023-01-${String(i + 1).padStart(2, '0')}`,
      time: '12:00',
      text: 'Day',
    }));
    const layout = computeTimelineLayout(groupsFor(records));
    expect(layout.width).toBe(1440);
    expect(layout.baselineEndX).toBe(1390);
  });
});
