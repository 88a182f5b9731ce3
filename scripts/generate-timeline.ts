#!/usr/bin/env npx tsx

/**
 * Generate a timeline SVG from a JSON file of event records
 *
 * Usage: npx tsx scripts/generate-timeline.ts <events.json> [output.svg] [--dark]
 *
 * Examples:
 *   npx tsx scripts/generate-timeline.ts examples/sample-events.json
 *   npx tsx scripts/generate-timeline.ts examples/sample-events.json timeline-dark.svg --dark
 */

import { readFileSync } from "fs";
import { resolve } from "path";
import { generateTimelineSvg } from "../src/generateTimeline.ts";
import { formatValidationResult } from "../src/utils/validation.ts";
import { parseEventRecords } from "./eventFile.ts";

const args = process.argv.slice(2);
const darkMode = args.includes("--dark");
const [inputArg, outputArg] = args.filter((arg) => arg !== "--dark");

if (inputArg === undefined) {
  console.error("Usage: npx tsx scripts/generate-timeline.ts <events.json> [output.svg] [--dark]");
  console.error("");
  console.error("Examples:");
  console.error("  npx tsx scripts/generate-timeline.ts examples/sample-events.json");
  console.error(
    "  npx tsx scripts/generate-timeline.ts examples/sample-events.json timeline-dark.svg --dark"
  );
  process.exit(1);
}

const filePath = resolve(process.cwd(), inputArg);

try {
  const records = parseEventRecords(readFileSync(filePath, "utf-8"));

  const result = generateTimelineSvg(records, {
    outputFile: outputArg,
    darkMode,
    // Problems are printed once below
    logger: { info: (message) => console.log(message), warn: () => {} },
  });
  console.log(formatValidationResult(result.validation));
} catch (err: unknown) {
  if (err instanceof Error && "code" in err && err.code === "ENOENT") {
    console.error(`Error: File not found: ${filePath}`);
  } else if (err instanceof SyntaxError) {
    console.error(`Error: Invalid JSON in ${filePath}`);
    console.error(`  ${err.message}`);
  } else if (err instanceof Error) {
    console.error(`Error: ${err.message}`);
  } else {
    console.error(`Error: ${String(err)}`);
  }
  process.exit(1);
}
