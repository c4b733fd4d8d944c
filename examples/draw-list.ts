/**
 * Draw-list dump example.
 * Interprets a decoded content stream and prints one line per draw command,
 * followed by the warnings collected along the way.
 *
 * Usage:
 *   npx tsx examples/draw-list.ts path/to/content.txt
 */

import { readFileSync } from 'node:fs';
import { DrawlistSession, type DrawCommand } from '../src/index.js';

const filePath = process.argv[2];

if (!filePath) {
  console.error('Usage: npx tsx examples/draw-list.ts <path-to-content-stream>');
  process.exit(1);
}

function describe(command: DrawCommand): string {
  switch (command.op) {
    case 'DrawText':
      return `DrawText ${JSON.stringify(command.text)} at (${command.x.toFixed(1)}, ${command.y.toFixed(1)})`;
    case 'DrawBitmap':
      return `DrawBitmap ${command.bitmap.format} ${command.bitmap.width}x${command.bitmap.height}`;
    case 'SetFont':
      return `SetFont ${command.font.face} ${command.font.size}`;
    case 'ConcatTransform':
      return `ConcatTransform [${command.matrix.join(' ')}]`;
    default:
      return command.op;
  }
}

const session = new DrawlistSession();
const page = session.page({ contents: new Uint8Array(readFileSync(filePath)) });

for (const command of page.commands) {
  console.log(describe(command));
}

if (page.error) console.error(`Stopped early: ${page.error.message}`);

console.log('='.repeat(60));
for (const warning of session.warnings) {
  console.log(`[${warning.kind}] ${warning.message}`);
}
if (session.missingFonts.size > 0) {
  console.log(`Missing fonts: ${[...session.missingFonts].join(', ')}`);
}
