/**
 * Render event records and write the SVG document to a file
 */

import { writeFileSync } from "fs";
import type { EventRecord, GeneratorOptions, TimelineLayout } from "./core/types";
import { TimelineWriteError } from "./core/errors";
import { TimelineRenderer } from "./renderer/TimelineRenderer";
import type { ValidationResult } from "./utils/validation";

export const DEFAULT_OUTPUT_FILE = "timeline.svg";

export interface GenerationResult {
  svg: string;
  outputFile: string;
  layout: TimelineLayout;
  validation: ValidationResult;
}

/**
 * Generate a timeline SVG from event records and write it to `options.outputFile`
 *
 * Malformed records are skipped and the document is still written. A write
 * failure is thrown as a TimelineWriteError.
 */
export function generateTimelineSvg(
  records: readonly EventRecord[],
  options: GeneratorOptions = {}
): GenerationResult {
  const { outputFile = DEFAULT_OUTPUT_FILE, ...rendererOptions } = options;
  const logger = options.logger ?? console;

  const { svg, layout, validation } = new TimelineRenderer(rendererOptions).render(records);

  try {
    writeFileSync(outputFile, svg, "utf-8");
  } catch (err) {
    throw new TimelineWriteError(outputFile, err);
  }

  logger.info(`Timeline written to ${outputFile}: ${layout.groups.length} day group(s), ${layout.width}x${layout.height}`);

  return { svg, outputFile, layout, validation };
}
