/**
 * Skid Layout Calculator
 *
 * Picks skid lumber by product weight and spreads the skids across the crate
 * width so no two neighbours are further apart than the lumber allows.
 */

import { ceilDivide } from './rounding';
import type { SkidCallout, SkidLumber, SkidPlacement } from './types';

// =============================================================================
// Weight Bands
// =============================================================================

interface SkidBand {
  callout: SkidCallout;
  height_in: number;
  width_in: number;
  matches: (weight: number, allow3x4: boolean) => boolean;
  maxSpacing: (weight: number) => number;
}

/** Checked in order; the first matching band wins. */
const SKID_BANDS: SkidBand[] = [
  {
    callout: '3x4',
    height_in: 3.5,
    width_in: 2.5,
    matches: (weight, allow3x4) => allow3x4 && weight <= 500,
    maxSpacing: () => 30,
  },
  {
    callout: '4x4',
    height_in: 3.5,
    width_in: 3.5,
    matches: (weight) => weight <= 4500,
    maxSpacing: () => 30,
  },
  {
    callout: '4x6',
    height_in: 3.5,
    width_in: 5.5,
    matches: (weight) => weight <= 20000,
    maxSpacing: (weight) => (weight < 6000 ? 41 : weight <= 12000 ? 28 : 24),
  },
  {
    callout: '6x6',
    height_in: 5.5,
    width_in: 5.5,
    matches: (weight) => weight <= 40000,
    maxSpacing: (weight) => (weight <= 30000 ? 24 : 20),
  },
];

const HEAVIEST_BAND: SkidBand = {
  callout: '8x8',
  height_in: 7.5,
  width_in: 7.5,
  matches: () => true,
  maxSpacing: () => 24,
};

export function selectSkidLumber(weight_lbs: number, allow3x4: boolean): SkidLumber {
  const band = SKID_BANDS.find((candidate) => candidate.matches(weight_lbs, allow3x4)) ?? HEAVIEST_BAND;
  return {
    callout: band.callout,
    height_in: band.height_in,
    width_in: band.width_in,
    max_spacing_in: band.maxSpacing(weight_lbs),
  };
}

// =============================================================================
// Placement
// =============================================================================

/**
 * Count and pitch of skids across a crate, positions relative to the crate's
 * centred origin.
 */
export function calculateSkidPlacement(
  crateWidth: number,
  skidWidth: number,
  maxSpacing: number
): SkidPlacement {
  const span = crateWidth - skidWidth;
  const count = span <= 0 ? 2 : Math.max(2, ceilDivide(span, maxSpacing) + 1);
  const pitch = Math.max(0, span) / (count - 1);
  const originOffset = -crateWidth / 2;

  return {
    count,
    pitch_in: pitch,
    origin_offset_in: originOffset,
    first_position_in: originOffset + skidWidth / 2,
  };
}

/** Centerline of every skid, left to right. */
export function skidCenterlines(placement: SkidPlacement): number[] {
  return Array.from(
    { length: placement.count },
    (_, i) => placement.first_position_in + i * placement.pitch_in
  );
}
