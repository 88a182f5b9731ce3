/**
 * Core type definitions for Dayline
 */

import type { Temporal } from '@js-temporal/polyfill';

/**
 * Raw event record as supplied by the caller
 * `date` is expected in YYYY-MM-DD form
 */
export interface EventRecord {
  date: string;
  time: string;
  text: string;
}

/**
 * Event record whose date parsed successfully
 */
export interface TimelineEvent {
  dateText: string;
  date: Temporal.PlainDate;
  time: string;
  text: string;
  index: number; // Position in the caller's input
}

/**
 * Events sharing one calendar date, in input order
 */
export interface DayGroup {
  dateText: string;
  date: Temporal.PlainDate;
  events: TimelineEvent[];
}

/**
 * Layout constants, all in pixels except wrapWidth (characters)
 */
export interface TimelineLayoutConfig {
  wrapWidth: number;
  lineHeight: number;
  eventPadding: number; // Added to every event's line block
  eventGap: number; // Space between stacked events
  baselineY: number;
  baselineInset: number; // Distance of the baseline ends from the canvas edges
  leftMargin: number;
  slotWidth: number;
  slotGutter: number;
  minWidth: number;
  minHeight: number;
  bottomMargin: number;
  dateLabelOffset: number; // Date label distance above the baseline
  groupOffset: number; // Event stack distance below the baseline
  connectorOverlap: number; // Connector start above the event stack
  textIndent: number;
  timeLabelY: number;
  firstLineY: number;
}

/**
 * The five semantic colors swapped by the theme
 */
export interface ThemePalette {
  background: string;
  primaryText: string;
  secondaryText: string;
  baseline: string;
  connector: string;
}

export type ThemeName = 'light' | 'dark';

/**
 * Anything with console-style info/warn methods
 */
export interface TimelineLogger {
  info(message: string): void;
  warn(message: string): void;
}

/**
 * Renderer options
 */
export interface RendererOptions {
  darkMode?: boolean; // Default: false
  palette?: Partial<ThemePalette>;
  layout?: Partial<TimelineLayoutConfig>;
  fontFamily?: string; // Default: 'Arial'
  logger?: TimelineLogger; // Default: console
}

/**
 * Options for generating and writing a timeline file
 */
export interface GeneratorOptions extends RendererOptions {
  outputFile?: string; // Default: 'timeline.svg'
}

/**
 * Computed placement of one event inside its day group
 */
export interface EventLayout {
  event: TimelineEvent;
  lines: string[];
  offsetY: number;
  height: number;
}

/**
 * Computed placement of one day group
 */
export interface DayGroupLayout {
  dateText: string;
  slot: number;
  x: number;
  height: number;
  events: EventLayout[];
}

/**
 * Complete layout of a timeline
 */
export interface TimelineLayout {
  width: number;
  height: number;
  baselineY: number;
  baselineStartX: number;
  baselineEndX: number;
  groups: DayGroupLayout[];
}
