/**
 * Crate Calculator
 *
 * Single entry point: validated parameters in, complete crate layout out.
 */

import { placeVerticalCleats, spacingRulesFrom } from './cleatPlacement';
import { DEFAULT_CRATE_CONFIG, type CrateLayoutConfig } from './config';
import { CrateLayoutError } from './errors';
import { calculateFloorboardLayout } from './floorboardCalculator';
import { sectionPanelSplices, sectionRulesFrom } from './horizontalCleats';
import { klimpRulesFrom, placeFrontPanelKlimps } from './klimpPlacement';
import { extractHorizontalSplices, extractVerticalSplices, tilePanel } from './plywoodLayout';
import {
  derivePanelSpecs,
  panelAssemblyThickness,
  reconcileEnvelope,
  type ReconcileOptions,
} from './reconciliation';
import { calculateSkidPlacement, selectSkidLumber } from './skidCalculator';
import type {
  CrateEnvelope,
  CrateFloorboards,
  CrateLayout,
  CrateParams,
  PanelLayout,
  PanelName,
  PanelSpec,
  SkidLayout,
  SkidLumber,
  VerticalCleat,
} from './types';
import { validateCrateParams } from './validation';

// =============================================================================
// Panels
// =============================================================================

export function buildPanelLayout(
  panel: PanelName,
  spec: PanelSpec,
  config: CrateLayoutConfig = DEFAULT_CRATE_CONFIG
): PanelLayout {
  const member = spec.cleat_member_width_in;
  const tiling = tilePanel(spec.width_in, spec.height_in, config);
  const placement = placeVerticalCleats(
    spec.width_in,
    extractVerticalSplices(tiling.sheets),
    member,
    spacingRulesFrom(config)
  );

  if (placement.status === 'needs_material') {
    throw new CrateLayoutError(
      'non_convergence',
      `The ${panel} panel still needs ${placement.material.amount_in} more width after reconciliation`,
      { panel, material: placement.material }
    );
  }

  const cleatLength = Math.max(0, spec.height_in - 2 * member);
  const verticalCleats = placement.cleats.map<VerticalCleat>((cleat) => ({
    orientation: 'vertical',
    x_centerline_in: cleat.x_centerline_in,
    x_left_edge_in: cleat.x_centerline_in - member / 2,
    length_in: cleatLength,
    origin: cleat.origin,
  }));

  const horizontalCleats = sectionPanelSplices(
    spec.width_in,
    spec.height_in,
    verticalCleats.map((cleat) => cleat.x_centerline_in),
    extractHorizontalSplices(tiling.sheets),
    member,
    sectionRulesFrom(config)
  );

  return {
    panel,
    spec,
    orientation: tiling.orientation,
    sheets: tiling.sheets,
    strategy: placement.strategy,
    edge_cleats: {
      horizontal: { count: 2, length_in: spec.width_in },
      vertical: { count: 2, length_in: cleatLength },
    },
    vertical_cleats: verticalCleats,
    horizontal_cleats: horizontalCleats,
  };
}

// =============================================================================
// Skids & Floor
// =============================================================================

function buildSkidLayout(lumber: SkidLumber, envelope: CrateEnvelope): SkidLayout {
  return {
    ...calculateSkidPlacement(envelope.overall_width_in, lumber.width_in, lumber.max_spacing_in),
    lumber,
    length_in: envelope.overall_length_in,
  };
}

function buildFloorboards(
  params: CrateParams,
  envelope: CrateEnvelope,
  config: CrateLayoutConfig
): CrateFloorboards {
  const t = panelAssemblyThickness(params);
  const usableSpan = envelope.overall_length_in - 2 * t;
  const layout = calculateFloorboardLayout(usableSpan, t, params.lumber_widths_in, {
    minCustomWidth_in: params.min_custom_width_in,
    forceCustom: params.force_small_custom_board,
    tolerance_in: config.floorboardTolerance_in,
  });

  return {
    ...layout,
    board_length_in: envelope.overall_width_in,
    thickness_in: params.floorboard_thickness_in,
    start_offset_in: t,
    usable_span_in: usableSpan,
  };
}

// =============================================================================
// Entry Point
// =============================================================================

/**
 * Validate `input` and compute the full crate layout.
 *
 * @throws CrateLayoutError with code 'invalid_input', 'capacity_exceeded' or
 *         'non_convergence'
 */
export function calculateCrateLayout(
  input: unknown,
  config: CrateLayoutConfig = DEFAULT_CRATE_CONFIG,
  options: ReconcileOptions = {}
): CrateLayout {
  const params = validateCrateParams(input, config);
  const lumber = selectSkidLumber(params.product_weight_lbs, params.allow_3x4_skids);
  const reconciliation = reconcileEnvelope(params, lumber, config, options);
  const { envelope } = reconciliation;

  const specs = derivePanelSpecs(params, lumber, envelope);
  const panels: Record<PanelName, PanelLayout> = {
    front: buildPanelLayout('front', specs.front, config),
    back: buildPanelLayout('back', specs.back, config),
    left: buildPanelLayout('left', specs.left, config),
    right: buildPanelLayout('right', specs.right, config),
    top: buildPanelLayout('top', specs.top, config),
  };

  const floorboards = buildFloorboards(params, envelope, config);
  const warnings: string[] = [];
  if (floorboards.middle_gap_in > params.max_middle_gap_in + config.floorboardTolerance_in) {
    warnings.push(
      `Floorboard middle gap of ${floorboards.middle_gap_in.toFixed(3)} in exceeds the allowed ${params.max_middle_gap_in} in`
    );
  }

  return {
    params,
    envelope,
    reconciliation,
    skids: buildSkidLayout(lumber, envelope),
    floorboards,
    panels,
    klimps: placeFrontPanelKlimps(panels.front, klimpRulesFrom(config)),
    warnings,
  };
}
