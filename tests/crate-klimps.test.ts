import assert from 'node:assert/strict';
import test from 'node:test';

import { buildPanelLayout, calculateCrateLayout } from '@/lib/crate/crateCalculator';
import { distributeAlongSpan, klimpRulesFrom, placeFrontPanelKlimps } from '@/lib/crate/klimpPlacement';

const MATERIALS = { sheathing_thickness_in: 0.75, cleat_thickness_in: 0.75, cleat_member_width_in: 3.5 };

test('spreads klimps along a span within the spacing band', () => {
  const rules = klimpRulesFrom();

  assert.deepEqual(distributeAlongSpan({ start: 10, end: 20 }, rules), [15]);
  assert.deepEqual(distributeAlongSpan({ start: 0, end: 16 }, rules), [0, 16]);
  assert.deepEqual(distributeAlongSpan({ start: 0, end: 48 }, rules), [0, 24, 48]);
  assert.deepEqual(distributeAlongSpan({ start: 10, end: 5 }, rules), []);
});

test('places one top klimp per cleat bay and clears the edge cleats on the sides', () => {
  const front = buildPanelLayout('front', { ...MATERIALS, width_in: 101.5, height_in: 34 });
  const { diameter_in, klimps } = placeFrontPanelKlimps(front);

  assert.equal(diameter_in, 1);
  assert.deepEqual(klimps, [
    { edge: 'top', x_in: 13.75, y_in: 34 },
    { edge: 'top', x_in: 37.75, y_in: 34 },
    { edge: 'top', x_in: 61.75, y_in: 34 },
    { edge: 'top', x_in: 84.875, y_in: 34 },
    { edge: 'left', x_in: 0, y_in: 5.5 },
    { edge: 'left', x_in: 0, y_in: 28.5 },
    { edge: 'right', x_in: 101.5, y_in: 5.5 },
    { edge: 'right', x_in: 101.5, y_in: 28.5 },
  ]);
});

test('keeps side klimps clear of horizontal cleats that meet the edge', () => {
  const front = buildPanelLayout('front', { ...MATERIALS, width_in: 47, height_in: 104 });
  const { klimps } = placeFrontPanelKlimps(front);

  assert.deepEqual(
    front.horizontal_cleats.map((c) => c.y_centerline_in),
    [8, 8]
  );
  assert.deepEqual(
    klimps.filter((k) => k.edge === 'top').map((k) => k.x_in),
    [12.625, 34.375]
  );
  assert.deepEqual(
    klimps.filter((k) => k.edge === 'left').map((k) => k.y_in),
    [11.75, 33.4375, 55.125, 76.8125, 98.5]
  );
  assert.deepEqual(
    klimps.filter((k) => k.edge === 'right').map((k) => k.y_in),
    [11.75, 33.4375, 55.125, 76.8125, 98.5]
  );
});

test('keeps top klimps at least the cleat clearance from every vertical cleat', () => {
  const layout = calculateCrateLayout({
    product_length_in: 100,
    product_width_in: 130,
    product_height_in: 30,
    product_weight_lbs: 1000,
  });
  const front = layout.panels.front;
  const m = front.spec.cleat_member_width_in;
  const centerlines = [m / 2, ...front.vertical_cleats.map((c) => c.x_centerline_in), front.spec.width_in - m / 2];

  const top = layout.klimps.klimps.filter((k) => k.edge === 'top');
  assert.ok(top.length > 0);
  for (const klimp of top) {
    for (const x of centerlines) {
      assert.ok(Math.abs(klimp.x_in - x) >= m / 2 + 2 - 1e-9, `klimp at ${klimp.x_in} crowds cleat at ${x}`);
    }
  }
});
