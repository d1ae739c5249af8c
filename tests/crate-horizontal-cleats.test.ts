import assert from 'node:assert/strict';
import test from 'node:test';

import { isCrateLayoutError } from '@/lib/crate/errors';
import {
  isSpliceCoveredByEdgeCleats,
  sectionHorizontalCleats,
  sectionPanelSplices,
} from '@/lib/crate/horizontalCleats';

const MEMBER = 3.5;

test('fits one section into each gap between vertical cleats', () => {
  const sections = sectionHorizontalCleats(50, [25], 30, MEMBER);

  assert.deepEqual(sections, [
    { orientation: 'horizontal', x_left_edge_in: 3.5, width_in: 19.75, y_centerline_in: 30, y_bottom_edge_in: 28.25 },
    { orientation: 'horizontal', x_left_edge_in: 26.75, width_in: 19.75, y_centerline_in: 30, y_bottom_edge_in: 28.25 },
  ]);
});

test('spans edge cleat to edge cleat when there are no intermediates', () => {
  const sections = sectionHorizontalCleats(20, [], 10, MEMBER);

  assert.equal(sections.length, 1);
  assert.equal(sections[0].x_left_edge_in, 3.5);
  assert.equal(sections[0].width_in, 13);
});

test('drops sections narrower than the minimum width', () => {
  const sections = sectionHorizontalCleats(50, [5.4], 30, MEMBER);

  assert.equal(sections.length, 1);
  assert.ok(Math.abs(sections[0].x_left_edge_in - 7.15) < 1e-9);
  assert.ok(Math.abs(sections[0].width_in - 39.35) < 1e-9);
});

test('drops the gap between overlapping cleats', () => {
  const sections = sectionHorizontalCleats(20, [2], 10, MEMBER);

  assert.equal(sections.length, 1);
  assert.equal(sections[0].x_left_edge_in, 3.75);
  assert.equal(sections[0].width_in, 12.75);
});

test('sorts intermediate centerlines before sectioning', () => {
  const sections = sectionHorizontalCleats(100, [75, 25, 50], 40, MEMBER);

  assert.deepEqual(
    sections.map((s) => s.x_left_edge_in),
    [3.5, 26.75, 51.75, 76.75]
  );
});

test('fails when a seam needs more sections than there are slots', () => {
  assert.throws(
    () => sectionHorizontalCleats(200, [25, 50, 75, 100, 125, 150, 175], 40, MEMBER),
    (error: unknown) => isCrateLayoutError(error) && error.code === 'capacity_exceeded'
  );

  const sections = sectionHorizontalCleats(200, [25, 50, 75, 100, 125, 150, 175], 40, MEMBER, {
    minSectionWidth_in: 0.25,
    maxSections: 10,
  });
  assert.equal(sections.length, 8);
});

test('treats seams inside the edge-cleat bands as covered', () => {
  assert.equal(isSpliceCoveredByEdgeCleats(3.5, 50, MEMBER), true);
  assert.equal(isSpliceCoveredByEdgeCleats(46.5, 50, MEMBER), true);
  assert.equal(isSpliceCoveredByEdgeCleats(4, 50, MEMBER), false);
});

test('sections only the uncovered seams of a panel', () => {
  const sections = sectionPanelSplices(50, 100, [25], [2, 48, 98], MEMBER);

  assert.equal(sections.length, 2);
  assert.deepEqual(
    sections.map((s) => s.y_centerline_in),
    [48, 48]
  );
});
