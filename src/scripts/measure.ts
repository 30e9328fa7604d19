import { parseArgs } from 'util';
import { type ComparatorConfig, resolveConfig } from '../lib/config';
import { PlateSession } from '../lib/plate/session';
import { formatPosition } from '../lib/plate/viewport';
import type { RowRange } from '../lib/types';

// Usage: npm run measure -- plate.tif --dpi 2400 --rows 10:60 --at 512.4 --comment "512.4=Fe I" --out lines.dat

function parseRows(arg: string): RowRange {
  const [start, end] = arg.split(':').map(Number);
  return { start, end };
}

function parseComment(arg: string): [number, string] {
  const eq = arg.indexOf('=');
  return [Number(arg.slice(0, eq)), arg.slice(eq + 1)];
}

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      dpi: { type: 'string' },
      offset: { type: 'string' },
      rows: { type: 'string' },
      at: { type: 'string', multiple: true },
      comment: { type: 'string', multiple: true },
      out: { type: 'string' },
    },
  });

  const platePath = positionals[0];
  if (platePath === undefined) {
    throw new Error('Usage: measure <plate.tif> [--dpi N] [--offset mm] [--rows a:b] --at PIXEL ... [--out file]');
  }

  const overrides: Partial<ComparatorConfig> = {};
  if (values.dpi !== undefined) overrides.dpi = Number(values.dpi);
  if (values.offset !== undefined) overrides.offset = Number(values.offset);
  const session = new PlateSession(resolveConfig(overrides));
  await session.openPlate(platePath);
  if (values.rows !== undefined) session.setRowRange(parseRows(values.rows));

  for (const at of values.at ?? []) {
    session.moveCursor(Number(at));
    session.addLine();
  }
  for (const arg of values.comment ?? []) {
    const [pixel, text] = parseComment(arg);
    session.moveCursor(pixel);
    session.commentLine(text);
  }

  console.log(`\n========== LINES ==========`);
  for (const line of session.lines) {
    console.log(`${formatPosition(line.position).padStart(14)}  ${line.intensity.toFixed(3).padStart(9)}  ${line.comment}`);
  }
  console.log(`===========================\n`);

  await session.saveLines(values.out);
}

main().catch(e => {
  console.error('Measurement failed:', e);
  process.exitCode = 1;
});
