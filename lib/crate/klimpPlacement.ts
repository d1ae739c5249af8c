/**
 * Klimp Placement
 *
 * Klimps clamp the front panel to the top panel and to the two end panels, so
 * they sit on the front panel's top, left and right edges. Positions are
 * derived from the final cleat layout:
 *
 * - top edge: one klimp centred in every bay between adjacent vertical cleats
 *   (edge cleats included) that still has room once the cleat clearance is
 *   taken off both sides
 * - left / right edges: the run between the top and bottom edge cleats, minus
 *   the bands around horizontal cleat sections that meet that edge, is split
 *   into spans; each span gets klimps at both ends and the fewest extra klimps
 *   keeping every run within the maximum spacing. Spans shorter than the
 *   minimum spacing get a single centred klimp.
 *
 * Every klimp keeps the cleat clearance from cleat faces and the edge
 * clearance from the panel corners.
 */

import { DEFAULT_CRATE_CONFIG, type CrateLayoutConfig } from './config';
import { ceilDivide } from './rounding';
import type { Klimp, KlimpLayout, PanelLayout } from './types';

export interface KlimpRules {
  minSpacing_in: number;
  maxSpacing_in: number;
  cleatClearance_in: number;
  edgeClearance_in: number;
  diameter_in: number;
  tolerance_in: number;
}

export function klimpRulesFrom(config: CrateLayoutConfig = DEFAULT_CRATE_CONFIG): KlimpRules {
  return {
    minSpacing_in: config.klimpMinSpacing_in,
    maxSpacing_in: config.klimpMaxSpacing_in,
    cleatClearance_in: config.klimpCleatClearance_in,
    edgeClearance_in: config.klimpEdgeClearance_in,
    diameter_in: config.klimpDiameter_in,
    tolerance_in: config.spacingTolerance_in,
  };
}

export interface Span {
  start: number;
  end: number;
}

// =============================================================================
// Spans
// =============================================================================

/**
 * Klimp positions along one span, both ends included.
 */
export function distributeAlongSpan(span: Span, rules: KlimpRules): number[] {
  const extent = span.end - span.start;
  if (extent < -rules.tolerance_in) {
    return [];
  }
  if (extent < rules.minSpacing_in) {
    return [(span.start + span.end) / 2];
  }
  const segments = ceilDivide(extent, rules.maxSpacing_in);
  const step = extent / segments;
  return Array.from({ length: segments + 1 }, (_, i) => span.start + i * step);
}

/** Remove each band from the span, keeping the pieces in order. */
function subtractBands(span: Span, bands: Span[], tolerance: number): Span[] {
  let pieces: Span[] = [span];
  for (const band of [...bands].sort((a, b) => a.start - b.start)) {
    pieces = pieces.flatMap((piece) => {
      if (band.end <= piece.start || band.start >= piece.end) {
        return [piece];
      }
      return [
        { start: piece.start, end: band.start },
        { start: band.end, end: piece.end },
      ].filter((part) => part.end - part.start >= -tolerance);
    });
  }
  return pieces;
}

// =============================================================================
// Edges
// =============================================================================

function topEdgeKlimps(panel: PanelLayout, rules: KlimpRules): Klimp[] {
  const { width_in: width, height_in: height, cleat_member_width_in: m } = panel.spec;
  const centerlines = [m / 2, ...panel.vertical_cleats.map((c) => c.x_centerline_in), width - m / 2];
  const reach = m / 2 + rules.cleatClearance_in;
  const klimps: Klimp[] = [];

  for (let i = 1; i < centerlines.length; i++) {
    const lower = Math.max(centerlines[i - 1] + reach, rules.edgeClearance_in);
    const upper = Math.min(centerlines[i] - reach, width - rules.edgeClearance_in);
    if (upper - lower >= -rules.tolerance_in) {
      klimps.push({ edge: 'top', x_in: (lower + upper) / 2, y_in: height });
    }
  }
  return klimps;
}

function sideEdgeKlimps(panel: PanelLayout, edge: 'left' | 'right', rules: KlimpRules): Klimp[] {
  const { width_in: width, height_in: height, cleat_member_width_in: m } = panel.spec;
  const reach = m / 2 + rules.cleatClearance_in;

  const meetsEdge = panel.horizontal_cleats.filter((section) =>
    edge === 'left'
      ? section.x_left_edge_in <= m + rules.tolerance_in
      : section.x_left_edge_in + section.width_in >= width - m - rules.tolerance_in
  );
  const bands = meetsEdge.map((section) => ({
    start: section.y_centerline_in - reach,
    end: section.y_centerline_in + reach,
  }));

  const run: Span = {
    start: Math.max(m + rules.cleatClearance_in, rules.edgeClearance_in),
    end: Math.min(height - m - rules.cleatClearance_in, height - rules.edgeClearance_in),
  };
  const x = edge === 'left' ? 0 : width;

  return subtractBands(run, bands, rules.tolerance_in)
    .flatMap((span) => distributeAlongSpan(span, rules))
    .map((y) => ({ edge, x_in: x, y_in: y }));
}

// =============================================================================
// Entry Point
// =============================================================================

/**
 * Place klimps on the front panel: top edge left to right, then the left and
 * right edges bottom to top.
 */
export function placeFrontPanelKlimps(
  front: PanelLayout,
  rules: KlimpRules = klimpRulesFrom()
): KlimpLayout {
  return {
    diameter_in: rules.diameter_in,
    klimps: [
      ...topEdgeKlimps(front, rules),
      ...sideEdgeKlimps(front, 'left', rules),
      ...sideEdgeKlimps(front, 'right', rules),
    ],
  };
}
