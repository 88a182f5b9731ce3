/**
 * Simple example: light and dark timelines from the bundled sample events
 *
 * Usage: npx tsx examples/simple.ts
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { generateTimelineSvg } from '../src/index';
import type { EventRecord } from '../src/index';
import { parseEventRecords } from '../scripts/eventFile';

const samplePath = fileURLToPath(new URL('./sample-events.json', import.meta.url));
const events: EventRecord[] = parseEventRecords(readFileSync(samplePath, 'utf-8'));

generateTimelineSvg(events, { outputFile: 'timeline_light.svg', darkMode: false });
generateTimelineSvg(events, { outputFile: 'timeline_dark.svg', darkMode: true });
