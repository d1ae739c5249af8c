import assert from 'node:assert/strict';
import test from 'node:test';

import { calculateCrateLayout } from '@/lib/crate/crateCalculator';
import { isCrateLayoutError } from '@/lib/crate/errors';
import { PANEL_NAMES } from '@/lib/crate/types';

const PARAMS = {
  product_length_in: 40,
  product_width_in: 90,
  product_height_in: 30,
  product_weight_lbs: 1000,
  side_clearance_in: 2,
  clearance_above_in: 2.5,
  ground_clearance_in: 1,
};

function assertInvalid(input: unknown, field?: string) {
  assert.throws(
    () => calculateCrateLayout(input),
    (error: unknown) => {
      if (!isCrateLayoutError(error) || error.code !== 'invalid_input') return false;
      if (!field) return true;
      return JSON.stringify(error.details).includes(`"${field}"`);
    }
  );
}

test('computes the envelope, skids and floorboards for a grown crate', () => {
  const layout = calculateCrateLayout(PARAMS);

  assert.deepEqual(layout.envelope, { overall_width_in: 98.5, overall_length_in: 44, overall_height_in: 39 });
  assert.equal(layout.reconciliation.growth.length, 1);

  assert.equal(layout.skids.lumber.callout, '4x4');
  assert.equal(layout.skids.count, 5);
  assert.equal(layout.skids.pitch_in, 23.75);
  assert.equal(layout.skids.origin_offset_in, -49.25);
  assert.equal(layout.skids.first_position_in, -47.5);
  assert.equal(layout.skids.length_in, 44);

  assert.equal(layout.floorboards.usable_span_in, 41);
  assert.equal(layout.floorboards.start_offset_in, 1.5);
  assert.equal(layout.floorboards.board_length_in, 98.5);
  assert.deepEqual(
    layout.floorboards.boards.map((b) => [b.width_in, b.y_position_in]),
    [
      [11.25, 1.5],
      [11.25, 12.75],
      [11.25, 24],
      [7.25, 35.25],
    ]
  );
  assert.deepEqual(layout.warnings, []);
});

test('builds the front panel around its splice cleat', () => {
  const { front, back } = calculateCrateLayout(PARAMS).panels;

  assert.equal(front.spec.width_in, 101.5);
  assert.equal(front.spec.height_in, 34);
  assert.deepEqual(front.sheets, [
    { x: 0, y: 0, width: 96, height: 34 },
    { x: 96, y: 0, width: 5.5, height: 34 },
  ]);
  assert.equal(front.strategy, 'splice-driven');
  assert.deepEqual(front.edge_cleats, {
    horizontal: { count: 2, length_in: 101.5 },
    vertical: { count: 2, length_in: 27 },
  });
  assert.deepEqual(
    front.vertical_cleats.map((c) => [c.x_centerline_in, c.x_left_edge_in, c.origin]),
    [
      [25.75, 24, 'spacing'],
      [49.75, 48, 'spacing'],
      [73.75, 72, 'spacing'],
      [96, 94.25, 'splice'],
    ]
  );
  assert.ok(front.vertical_cleats.every((c) => c.length_in === 27));
  assert.deepEqual(front.horizontal_cleats, []);

  assert.equal(back.panel, 'back');
  assert.deepEqual({ ...back, panel: 'front' }, front);
});

test('builds the end and top panels', () => {
  const { left, right, top } = calculateCrateLayout(PARAMS).panels;

  assert.equal(left.spec.width_in, 41);
  assert.equal(left.spec.height_in, 36.5);
  assert.equal(left.strategy, 'symmetric');
  assert.deepEqual(
    left.vertical_cleats.map((c) => [c.x_centerline_in, c.length_in]),
    [[20.5, 29.5]]
  );
  assert.deepEqual({ ...right, panel: 'left' }, left);

  assert.equal(top.spec.width_in, 101.5);
  assert.equal(top.spec.height_in, 44);
  assert.deepEqual(
    top.vertical_cleats.map((c) => c.x_centerline_in),
    [25.75, 49.75, 73.75, 96]
  );
  assert.equal(top.edge_cleats.vertical.length_in, 37);
});

test('keeps every panel within the cleat spacing rule', () => {
  const layout = calculateCrateLayout({ ...PARAMS, product_width_in: 130, product_length_in: 100 });

  for (const name of PANEL_NAMES) {
    const panel = layout.panels[name];
    const m = panel.spec.cleat_member_width_in;
    const xs = [m / 2, ...panel.vertical_cleats.map((c) => c.x_centerline_in), panel.spec.width_in - m / 2];
    for (let i = 1; i < xs.length; i++) {
      assert.ok(xs[i] - xs[i - 1] <= 24 + 1e-6, `${name} gap ${xs[i - 1]} → ${xs[i]}`);
      assert.ok(xs[i] - xs[i - 1] >= m + 0.25 - 1e-6, `${name} cleats ${xs[i - 1]} and ${xs[i]} crowd each other`);
    }
  }
});

test('returns the same layout for the same input', () => {
  assert.deepEqual(calculateCrateLayout(PARAMS), calculateCrateLayout(PARAMS));
});

test('warns when the floorboard gap exceeds the allowed maximum', () => {
  const layout = calculateCrateLayout({ ...PARAMS, product_length_in: 22 });

  assert.equal(layout.floorboards.middle_gap_in, 0.5);
  assert.deepEqual(layout.warnings, ['Floorboard middle gap of 0.500 in exceeds the allowed 0.25 in']);
});

test('rejects invalid parameters before any layout work', () => {
  const { product_length_in: _omitted, ...missingLength } = PARAMS;

  assertInvalid(missingLength, 'product_length_in');
  assertInvalid({ ...PARAMS, product_weight_lbs: -1 }, 'product_weight_lbs');
  assertInvalid({ ...PARAMS, product_height_in: 0 }, 'product_height_in');
  assertInvalid({ ...PARAMS, side_clearance_in: -0.5 }, 'side_clearance_in');
  assertInvalid({ ...PARAMS, lumber_widths_in: [] }, 'lumber_widths_in');
  assertInvalid({ ...PARAMS, force_small_custom_board: true, min_custom_width_in: 0.1 }, 'min_custom_width_in');
  assertInvalid({ ...PARAMS, cleat_member_width_in: 13 }, 'cleat_member_width_in');
  assertInvalid('not an object');
});

test('rejects panel faces the edge cleats or the sheet tiling cannot take', () => {
  const assertPanelErrors = (input: unknown, messages: string[]) =>
    assert.throws(
      () => calculateCrateLayout(input),
      (error: unknown) =>
        isCrateLayoutError(error) &&
        error.code === 'invalid_input' &&
        JSON.stringify(error.details).includes(JSON.stringify(messages))
    );

  assertPanelErrors({ ...PARAMS, product_length_in: 1, side_clearance_in: 0 }, [
    'The left panel (-2 x 36.5) is narrower than its two 3.5 edge cleats',
    'The top panel (93 x 1) is narrower than its two 3.5 edge cleats',
  ]);
  assertPanelErrors({ ...PARAMS, product_width_in: 500 }, [
    'The front panel (507 x 34) exceeds the 480 in maximum panel dimension',
    'The top panel (507 x 44) exceeds the 480 in maximum panel dimension',
  ]);
});
