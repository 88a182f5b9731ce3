/**
 * Main TimelineRenderer class
 */

import type {
  EventRecord,
  RendererOptions,
  ThemePalette,
  TimelineLayout,
  TimelineLayoutConfig,
  TimelineLogger,
  DayGroupLayout,
  EventLayout,
} from "../core/types";
import { normalizeEvents } from "../utils/timeNormalization";
import { buildValidationResult } from "../utils/validation";
import type { ValidationResult } from "../utils/validation";
import { groupEventsByDay } from "../layout/dayGrouping";
import { computeTimelineLayout, resolveLayoutConfig } from "../layout/timelineLayout";
import { resolvePalette, MARKER_COLOR, ANCHOR_COLOR } from "./themes";
import {
  createSvgElement,
  createTextElement,
  createTextNode,
  createLineElement,
  createRectElement,
  createCircleElement,
  createGroupElement,
  createComment,
  serializeSvg,
} from "./svgFactory";
import type { SvgElementNode, SvgNode } from "./svgFactory";

const SVG_NAMESPACE = "http://www.w3.org/2000/svg";
const ANCHOR_RADIUS = 6;
const MARKER_RADIUS = 5;

export interface RenderResult {
  svg: string;
  layout: TimelineLayout;
  validation: ValidationResult;
}

interface ResolvedRendererOptions {
  layout: TimelineLayoutConfig;
  palette: ThemePalette;
  fontFamily: string;
  logger: TimelineLogger;
}

export class TimelineRenderer {
  private options: ResolvedRendererOptions;

  constructor(options: RendererOptions = {}) {
    this.options = {
      layout: resolveLayoutConfig(options.layout),
      palette: resolvePalette(options.darkMode ?? false, options.palette),
      fontFamily: options.fontFamily ?? "Arial",
      logger: options.logger ?? console,
    };
  }

  /**
   * Render event records into an SVG document
   * Records with malformed dates are reported and left out
   */
  render(records: readonly EventRecord[]): RenderResult {
    const normalized = normalizeEvents(records);
    const validation = buildValidationResult(normalized, this.options.layout.wrapWidth);

    for (const error of validation.errors) {
      this.options.logger.warn(error.message);
    }
    for (const warning of validation.warnings) {
      this.options.logger.warn(warning.message);
    }

    const groups = groupEventsByDay(normalized.events);
    const layout = computeTimelineLayout(groups, this.options.layout);

    return {
      svg: serializeSvg(this.buildDocument(layout)),
      layout,
      validation,
    };
  }

  /**
   * Build the document tree for a computed layout
   */
  buildDocument(layout: TimelineLayout): SvgElementNode {
    const children: SvgNode[] = [
      this.renderStyle(),
      createRectElement({ width: "100%", height: "100%", class: "background" }),
      createLineElement(
        layout.baselineStartX,
        layout.baselineY,
        layout.baselineEndX,
        layout.baselineY,
        { class: "timeline-line" }
      ),
    ];

    for (const group of layout.groups) {
      children.push(createComment(group.dateText));
      children.push(this.renderDayGroup(group, layout.baselineY));
    }

    return createSvgElement(
      "svg",
      {
        width: layout.width,
        height: layout.height,
        viewBox: `0 0 ${layout.width} ${layout.height}`,
        xmlns: SVG_NAMESPACE,
        "font-family": this.options.fontFamily,
      },
      children
    );
  }

  /**
   * Stylesheet with the theme's colors
   */
  private renderStyle(): SvgElementNode {
    const { palette } = this.options;
    const rules = [
      `.background { fill: ${palette.background}; }`,
      `.timeline-line { stroke: ${palette.baseline}; stroke-width: 2; }`,
      `.day-connector { stroke: ${palette.connector}; stroke-dasharray: 3,2; stroke-width: 1; }`,
      `.event-circle { fill: ${MARKER_COLOR}; stroke: ${palette.background}; stroke-width: 1; }`,
      `.event-circle.main-anchor { fill: ${ANCHOR_COLOR}; }`,
      `.date-label { font-size: 11px; fill: ${palette.primaryText}; text-anchor: middle; }`,
      `.time-label { font-size: 10px; fill: ${palette.secondaryText}; text-anchor: start; }`,
      `.event-label { font-size: 10px; fill: ${palette.primaryText}; text-anchor: start; }`,
      `.day-group { stroke: none; fill: none; }`,
    ];
    return createSvgElement("style", {}, [createTextNode(rules.join("\n"))]);
  }

  /**
   * Render one day group: anchor and date label on the baseline, with the
   * connector and events stacked below
   */
  private renderDayGroup(group: DayGroupLayout, baselineY: number): SvgElementNode {
    const { layout } = this.options;

    const stack: SvgNode[] = [
      createLineElement(0, -layout.connectorOverlap, 0, group.height, { class: "day-connector" }),
      ...group.events.map((event) => this.renderEvent(event)),
    ];

    return createGroupElement(group.x, baselineY, [
      createCircleElement(0, 0, ANCHOR_RADIUS, { class: "event-circle main-anchor" }),
      createTextElement(group.dateText, { x: 0, y: -layout.dateLabelOffset, class: "date-label" }),
      createGroupElement(0, layout.groupOffset, stack, { class: "day-group" }),
    ]);
  }

  /**
   * Render a single event: marker, time label and wrapped text lines
   */
  private renderEvent(event: EventLayout): SvgElementNode {
    const { layout } = this.options;

    return createGroupElement(0, event.offsetY, [
      createCircleElement(0, 0, MARKER_RADIUS, { class: "event-circle" }),
      createTextElement(event.event.time, {
        x: layout.textIndent,
        y: layout.timeLabelY,
        class: "time-label",
      }),
      ...event.lines.map((line, j) =>
        createTextElement(line, {
          x: layout.textIndent,
          y: layout.firstLineY + j * layout.lineHeight,
          class: "event-label",
        })
      ),
    ]);
  }
}
