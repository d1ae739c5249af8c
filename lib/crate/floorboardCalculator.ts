/**
 * Floorboard Layout Calculator
 *
 * Greedy fill of the crate floor with standard lumber, widest first. Whatever
 * is left becomes either one custom-ripped board or a gap, both centred among
 * the standard boards.
 */

import type { Floorboard, FloorboardLayout } from './types';

export interface FloorboardOptions {
  minCustomWidth_in: number;
  forceCustom: boolean;
  /** Remainders at or below this count as zero. Default: 0.001 */
  tolerance_in?: number;
}

export function calculateFloorboardLayout(
  usableSpan: number,
  startOffset: number,
  availableWidths: readonly number[],
  options: FloorboardOptions
): FloorboardLayout {
  const tolerance = options.tolerance_in ?? 0.001;
  const widths = availableWidths.filter((w) => w > 0).sort((a, b) => b - a);

  const standard: number[] = [];
  let remaining = usableSpan;
  for (const width of widths) {
    while (remaining - width >= -tolerance) {
      standard.push(width);
      remaining -= width;
    }
  }
  if (remaining <= tolerance) {
    remaining = 0;
  }

  const midpoint = Math.ceil(standard.length / 2);
  let customWidth = 0;
  let middleGap = 0;
  if (remaining > 0) {
    if (options.forceCustom || remaining >= options.minCustomWidth_in) {
      customWidth = remaining;
    } else {
      middleGap = remaining;
    }
  }

  const sequence: Floorboard['kind'][] = standard.map(() => 'standard');
  const boardWidths = [...standard];
  if (customWidth > 0) {
    sequence.splice(midpoint, 0, 'custom');
    boardWidths.splice(midpoint, 0, customWidth);
  }

  const boards: Floorboard[] = [];
  let position = startOffset;
  for (let i = 0; i < boardWidths.length; i++) {
    boards.push({ width_in: boardWidths[i], y_position_in: position, kind: sequence[i] });
    position += boardWidths[i];
    if (middleGap > 0 && i === midpoint - 1) {
      position += middleGap;
    }
  }

  return { boards, middle_gap_in: middleGap, custom_width_in: customWidth };
}
