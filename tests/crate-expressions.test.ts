import assert from 'node:assert/strict';
import test from 'node:test';

import { calculateCrateLayout } from '@/lib/crate/crateCalculator';
import { isCrateLayoutError } from '@/lib/crate/errors';
import { renderCrateExpressions } from '@/lib/crate/expressions';

const PARAMS = {
  product_length_in: 40,
  product_width_in: 90,
  product_height_in: 30,
  product_weight_lbs: 1000,
  side_clearance_in: 2,
  clearance_above_in: 2.5,
  ground_clearance_in: 1,
};

const GENERATED_AT = new Date(2024, 0, 2, 3, 4, 5);

function render(params: Record<string, unknown>): string[] {
  return renderCrateExpressions(calculateCrateLayout(params), { generatedAt: GENERATED_AT }).split('\n');
}

function assertLines(lines: string[], expected: string[]) {
  for (const line of expected) {
    assert.ok(lines.includes(line), `missing line: ${line}`);
  }
}

test('writes a timestamped header and ends with a newline', () => {
  const text = renderCrateExpressions(calculateCrateLayout(PARAMS), { generatedAt: GENERATED_AT });
  const lines = text.split('\n');

  assert.equal(lines[0], '// Crate Expressions - Skids, Floorboards & Panels');
  assert.equal(lines[1], '// Generated: 2024-01-02 03:04:05');
  assert.ok(text.endsWith('\n'));
});

test('writes inputs, envelope and skid parameters', () => {
  assertLines(render(PARAMS), [
    '[lbm]product_weight = 1000.000',
    '[Inch]product_width_input = 90.000',
    'BOOL_Allow_3x4_Skids_Input = 0',
    '[Inch]crate_overall_width_OD = 98.500',
    '[Inch]crate_overall_length_OD = 44.000',
    '[Inch]crate_overall_height_OD = 39.000',
    '// Skid Lumber Callout: 4x4',
    'CALC_Skid_Count = 5',
    '[Inch]CALC_Skid_Pitch = 23.7500',
    '[Inch]X_Master_Skid_Origin_Offset = -49.2500',
  ]);
});

test('writes all floorboard slots with sentinels for the unused ones', () => {
  const lines = render(PARAMS);

  assertLines(lines, [
    'CALC_FB_Count = 4',
    'FB_Inst_1_Suppress_Flag = 1',
    '[Inch]FB_Inst_4_Actual_Width = 7.2500',
    '[Inch]FB_Inst_4_Y_Pos_Abs = 35.2500',
    'FB_Inst_5_Suppress_Flag = 0',
    '[Inch]FB_Inst_5_Actual_Width = 0.0001',
    '[Inch]FB_Inst_20_Y_Pos_Abs = 0.0000',
  ]);
  assert.equal(lines.filter((line) => /^FB_Inst_\d+_Suppress_Flag = /.test(line)).length, 20);
});

test('writes plywood and vertical cleat instances per panel', () => {
  const lines = render(PARAMS);

  assertLines(lines, [
    '[Inch]FP_Panel_Width = 101.500',
    '// Plywood orientation: standard, cleat placement: splice-driven',
    'FP_Plywood_2_Active = 1',
    '[Inch]FP_Plywood_2_X_Position = 96.0000',
    '[Inch]FP_Plywood_2_Width = 5.5000',
    'FP_Plywood_3_Active = 0',
    '[Inch]FP_Plywood_3_Width = 0.0001',
    'FP_Inter_VC_Count = 4',
    '[Inch]FP_Inter_VC_Inst_1_X_Pos_Centerline = 25.7500',
    '[Inch]FP_Inter_VC_Inst_4_X_Pos_From_Left_Edge = 94.2500',
    'FP_Inter_VC_Inst_5_Suppress_Flag = 0',
    '[Inch]LP_Inter_VC_Inst_1_X_Pos_Centerline = 20.5000',
    'TP_Inter_HC_Count = 0',
    '[Inch]TP_Inter_HC_Inst_6_Width = 0.0001',
  ]);

  for (const prefix of ['FP_', 'BP_', 'LP_', 'RP_', 'TP_']) {
    assert.equal(lines.filter((line) => line.startsWith(`${prefix}Plywood_`)).length, 10, prefix);
    assert.equal(
      lines.filter((line) => line.startsWith(`${prefix}Inter_VC_Inst_`) && line.includes('_Suppress_Flag')).length,
      7,
      prefix
    );
    assert.equal(
      lines.filter((line) => line.startsWith(`${prefix}Inter_HC_Inst_`) && line.includes('_Suppress_Flag')).length,
      6,
      prefix
    );
  }
  assert.ok(lines.indexOf('// --- FRONT PANEL ---') < lines.indexOf('// --- TOP PANEL ---'));
});

test('writes front panel klimps after the front panel cleats', () => {
  const lines = render(PARAMS);

  assertLines(lines, [
    'FP_Klimp_Count = 8',
    '[Inch]FP_Klimp_Diameter = 1.000',
    'FP_Klimp_Inst_1_Suppress_Flag = 1',
    '[Inch]FP_Klimp_Inst_1_X_Pos = 13.7500',
    '[Inch]FP_Klimp_Inst_1_Y_Pos = 34.0000',
    '[Inch]FP_Klimp_Inst_8_X_Pos = 101.5000',
    '[Inch]FP_Klimp_Inst_8_Y_Pos = 28.5000',
    'FP_Klimp_Inst_9_Suppress_Flag = 0',
    '[Inch]FP_Klimp_Inst_12_Y_Pos = 0.0000',
  ]);
  assert.equal(lines.filter((line) => /^FP_Klimp_Inst_\d+_Suppress_Flag = /.test(line)).length, 12);
  assert.ok(lines.indexOf('FP_Klimp_Count = 8') < lines.indexOf('// --- BACK PANEL ---'));
  assert.ok(lines.indexOf('FP_Klimp_Count = 8') > lines.indexOf('FP_Inter_HC_Count = 0'));
});

test('writes horizontal cleat sections for a two-row panel', () => {
  const lines = render({ ...PARAMS, product_width_in: 40, product_height_in: 100 });

  assertLines(lines, [
    '// Plywood orientation: rotated, cleat placement: symmetric',
    'FP_Inter_HC_Count = 2',
    'FP_Inter_HC_Inst_1_Suppress_Flag = 1',
    '[Inch]FP_Inter_HC_Inst_1_Width = 18.2500',
    '[Inch]FP_Inter_HC_Inst_1_Y_Pos = 6.2500',
    '[Inch]FP_Inter_HC_Inst_1_Y_Pos_Centerline = 8.0000',
    '[Inch]FP_Inter_HC_Inst_2_X_Pos = 25.2500',
    'FP_Inter_HC_Inst_3_Suppress_Flag = 0',
    'LP_Inter_HC_Count = 2',
    'FP_Klimp_Count = 12',
  ]);
});

test('writes layout warnings as comments under the header', () => {
  const lines = render({ ...PARAMS, product_length_in: 22 });

  assert.equal(lines[2], '// WARNING: Floorboard middle gap of 0.500 in exceeds the allowed 0.25 in');
});

test('fails rather than drop cleats that do not fit the slots', () => {
  const layout = calculateCrateLayout({ ...PARAMS, product_width_in: 300 });

  assert.equal(layout.panels.front.vertical_cleats.length, 12);
  assert.throws(
    () => renderCrateExpressions(layout),
    (error: unknown) => isCrateLayoutError(error) && error.code === 'capacity_exceeded'
  );
});
