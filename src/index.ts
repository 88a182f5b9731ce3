/**
 * Dayline - SVG day-grouped timeline generator
 * Main entry point
 */

export { TimelineRenderer } from './renderer/TimelineRenderer';
export type { RenderResult } from './renderer/TimelineRenderer';
export { generateTimelineSvg, DEFAULT_OUTPUT_FILE } from './generateTimeline';
export type { GenerationResult } from './generateTimeline';
export { TimelineWriteError } from './core/errors';

export type {
  EventRecord,
  TimelineEvent,
  DayGroup,
  TimelineLayoutConfig,
  ThemePalette,
  ThemeName,
  TimelineLogger,
  RendererOptions,
  GeneratorOptions,
  EventLayout,
  DayGroupLayout,
  TimelineLayout,
} from './core/types';

export { parseEventDate, normalizeEvents } from './utils/timeNormalization';
export type { NormalizedEvents } from './utils/timeNormalization';
export { validateEventRecords, formatValidationResult } from './utils/validation';
export type { ValidationResult, ValidationError } from './utils/validation';
export { wrapText, wrapParagraph } from './layout/textWrap';
export { groupEventsByDay, sortEventsByDate } from './layout/dayGrouping';
export { computeTimelineLayout, resolveLayoutConfig, DEFAULT_LAYOUT } from './layout/timelineLayout';
export { THEMES, resolvePalette } from './renderer/themes';

// Default export
export { generateTimelineSvg as default } from './generateTimeline';
