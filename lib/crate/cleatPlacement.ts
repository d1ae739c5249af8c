/**
 * Vertical Cleat Placement
 *
 * Places intermediate vertical cleats between the two edge cleats of a panel.
 * Edge cleats are implicit: centerlines at m/2 and W - m/2 for member width m.
 *
 * Strategy decision table:
 * - no vertical splices  → 'symmetric': fewest cleats with uniform spacing
 *   no wider than the rule, spread evenly for bilateral symmetry
 * - one or more splices  → 'splice-driven': a cleat on every splice, then
 *   every gap wider than the rule is filled left to right at exactly the
 *   rule's interval; a step landing too close to the next cleat is pulled
 *   back to the minimum clearance from it
 *
 * A splice that sits too close to the right edge cleat cannot be fixed by
 * moving cleats. Placement then reports how much wider the panel must be and
 * leaves the growing to the reconciliation engine.
 */

import { DEFAULT_CRATE_CONFIG, type CrateLayoutConfig } from './config';
import { CrateLayoutError } from './errors';
import { ceilDivide, roundUpToIncrement } from './rounding';
import type { CleatOrigin, CleatPlacementStrategy, MaterialNeeded } from './types';

// =============================================================================
// Types
// =============================================================================

export interface CleatSpacingRules {
  maxSpacing_in: number;
  minClearance_in: number;
  growthIncrement_in: number;
  tolerance_in: number;
}

export interface PlacedCleat {
  x_centerline_in: number;
  origin: CleatOrigin;
}

export type VerticalCleatPlacement =
  | { status: 'placed'; strategy: CleatPlacementStrategy; cleats: PlacedCleat[] }
  | { status: 'needs_material'; material: MaterialNeeded };

export function spacingRulesFrom(config: CrateLayoutConfig = DEFAULT_CRATE_CONFIG): CleatSpacingRules {
  return {
    maxSpacing_in: config.maxCleatSpacing_in,
    minClearance_in: config.minCleatClearance_in,
    growthIncrement_in: config.growthIncrement_in,
    tolerance_in: config.spacingTolerance_in,
  };
}

// =============================================================================
// Helpers
// =============================================================================

export function edgeCleatCenterlines(
  panelWidth: number,
  memberWidth: number
): { left: number; right: number } {
  return { left: memberWidth / 2, right: panelWidth - memberWidth / 2 };
}

export function selectPlacementStrategy(spliceXs: readonly number[]): CleatPlacementStrategy {
  return spliceXs.length === 0 ? 'symmetric' : 'splice-driven';
}

/**
 * Interior points splitting [start, end] into the fewest equal segments no
 * longer than `maxSpacing`.
 */
function divideGap(start: number, end: number, rules: CleatSpacingRules): number[] {
  const gap = end - start;
  if (gap <= rules.maxSpacing_in + rules.tolerance_in) {
    return [];
  }
  const segments = ceilDivide(gap, rules.maxSpacing_in);
  const step = gap / segments;
  return Array.from({ length: segments - 1 }, (_, i) => start + (i + 1) * step);
}

/**
 * Interior points stepping from `start` toward `end` at exactly `maxSpacing`.
 */
function stepGap(start: number, end: number, memberWidth: number, rules: CleatSpacingRules): number[] {
  const minCenterDistance = memberWidth + rules.minClearance_in;
  const points: number[] = [];
  let last = start;
  while (end - last > rules.maxSpacing_in + rules.tolerance_in) {
    let next = last + rules.maxSpacing_in;
    if (end - next < minCenterDistance - rules.tolerance_in) {
      next = end - minCenterDistance;
    }
    points.push(next);
    last = next;
  }
  return points;
}

function assertNeighbourClearance(
  centerlines: number[],
  memberWidth: number,
  rules: CleatSpacingRules
): void {
  const minCenterDistance = memberWidth + rules.minClearance_in;
  for (let i = 1; i < centerlines.length; i++) {
    if (centerlines[i] - centerlines[i - 1] < minCenterDistance - rules.tolerance_in) {
      throw new CrateLayoutError(
        'invalid_input',
        `Cleat spacing rule of ${rules.maxSpacing_in} is too tight for a ${memberWidth} cleat member`
      );
    }
  }
}

// =============================================================================
// Placement
// =============================================================================

/**
 * Place intermediate vertical cleats across a panel of the given width.
 *
 * @param spliceXs - vertical splice positions from the plywood tiling
 * @returns the intermediate cleats (edge cleats excluded), or the extra width
 *          the panel needs before every splice can carry a cleat
 */
export function placeVerticalCleats(
  panelWidth: number,
  spliceXs: readonly number[],
  memberWidth: number,
  rules: CleatSpacingRules = spacingRulesFrom()
): VerticalCleatPlacement {
  if (!(memberWidth > 0) || panelWidth < 2 * memberWidth) {
    throw new CrateLayoutError(
      'invalid_input',
      `Panel width ${panelWidth} cannot hold two ${memberWidth} edge cleats`
    );
  }

  const { left, right } = edgeCleatCenterlines(panelWidth, memberWidth);
  const strategy = selectPlacementStrategy(spliceXs);

  if (strategy === 'symmetric') {
    const cleats = divideGap(left, right, rules).map<PlacedCleat>((x) => ({
      x_centerline_in: x,
      origin: 'symmetric',
    }));
    assertNeighbourClearance([left, ...cleats.map((c) => c.x_centerline_in), right], memberWidth, rules);
    return { status: 'placed', strategy, cleats };
  }

  const splices = Array.from(new Set(spliceXs)).sort((a, b) => a - b);
  const minCenterDistance = memberWidth + rules.minClearance_in;
  let material: MaterialNeeded | null = null;

  for (const splice of splices) {
    if (splice - left < minCenterDistance - rules.tolerance_in) {
      // Splices are measured from the left edge; growing the panel never moves them.
      throw new CrateLayoutError(
        'invalid_input',
        `Splice at ${splice} leaves no clearance from the left edge cleat`
      );
    }
    const deficit = minCenterDistance - (right - splice);
    if (deficit > rules.tolerance_in) {
      const amount = roundUpToIncrement(deficit, rules.growthIncrement_in);
      if (material === null || amount > material.amount_in) {
        material = { amount_in: amount, splice_x_in: splice };
      }
    }
  }

  if (material !== null) {
    return { status: 'needs_material', material };
  }

  const cleats: PlacedCleat[] = [];
  let previous = left;
  for (const splice of splices) {
    for (const x of stepGap(previous, splice, memberWidth, rules)) {
      cleats.push({ x_centerline_in: x, origin: 'spacing' });
    }
    cleats.push({ x_centerline_in: splice, origin: 'splice' });
    previous = splice;
  }
  for (const x of stepGap(previous, right, memberWidth, rules)) {
    cleats.push({ x_centerline_in: x, origin: 'spacing' });
  }

  assertNeighbourClearance([left, ...cleats.map((c) => c.x_centerline_in), right], memberWidth, rules);
  return { status: 'placed', strategy, cleats };
}
