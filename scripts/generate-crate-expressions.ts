import fs from 'fs';
import path from 'path';
import * as dotenv from 'dotenv';

import { calculateCrateLayout } from '../lib/crate/crateCalculator';
import { loadCrateConfig } from '../lib/crate/config';
import { isCrateLayoutError } from '../lib/crate/errors';
import { renderCrateExpressions } from '../lib/crate/expressions';
import type { GrowthStep } from '../lib/crate/types';

dotenv.config({ path: '.env.local' });

const [inputPath, outputArg] = process.argv.slice(2);

if (!inputPath) {
  console.error('Usage: tsx scripts/generate-crate-expressions.ts <params.json> [output.exp]');
  process.exit(1);
}

function logGrowth(step: GrowthStep): void {
  console.log(
    `  pass ${step.pass} ${step.check}: +${step.amount_in} in ${step.axis} (splice at ${step.splice_x_in}) → ` +
      `${step.envelope.overall_width_in} x ${step.envelope.overall_length_in}`
  );
}

function run(inputPath: string, outputPath: string): void {
  const params: unknown = JSON.parse(fs.readFileSync(inputPath, 'utf8'));
  const config = loadCrateConfig();

  console.log(`\nCrate layout for ${inputPath}`);
  const layout = calculateCrateLayout(params, config, { onGrowth: logGrowth });
  const expressions = renderCrateExpressions(layout, { config });
  fs.writeFileSync(outputPath, expressions, 'utf8');

  const { envelope, skids, floorboards, reconciliation } = layout;
  console.log('\nResults:');
  console.log(
    `  Envelope: ${envelope.overall_width_in} W x ${envelope.overall_length_in} L x ${envelope.overall_height_in} H`
  );
  console.log(`  Reconciliation: ${reconciliation.passes} pass(es), ${reconciliation.growth.length} growth step(s)`);
  console.log(`  Skids: ${skids.count} x ${skids.lumber.callout} at ${skids.pitch_in.toFixed(3)} in pitch`);
  console.log(
    `  Floorboards: ${floorboards.boards.length} (gap ${floorboards.middle_gap_in.toFixed(3)}, custom ${floorboards.custom_width_in.toFixed(3)})`
  );
  for (const panel of Object.values(layout.panels)) {
    console.log(
      `  ${panel.panel}: ${panel.sheets.length} sheet(s), ${panel.vertical_cleats.length} vertical / ` +
        `${panel.horizontal_cleats.length} horizontal intermediate cleat(s)`
    );
  }
  console.log(`  Front panel klimps: ${layout.klimps.klimps.length}`);
  for (const warning of layout.warnings) {
    console.log(`  Warning: ${warning}`);
  }
  console.log(`\nWrote ${outputPath}`);
}

try {
  run(inputPath, outputArg ?? path.join(path.dirname(inputPath), `${path.basename(inputPath, '.json')}.exp`));
} catch (error) {
  if (isCrateLayoutError(error)) {
    console.error(`Crate layout failed (${error.code}): ${error.message}`);
    if (error.details) {
      console.error(JSON.stringify(error.details, null, 2));
    }
  } else {
    console.error('Crate layout failed', error);
  }
  process.exit(1);
}
