/**
 * Dimension Reconciliation Engine
 *
 * Grows the crate envelope until every panel's plywood splices can carry a
 * cleat with the required edge clearance.
 *
 * ## Algorithm
 *
 * 1. Start from the minimal envelope: product + clearances + panel assembly.
 * 2. Run one pass of four checks in a fixed order:
 *    front/back width → left/right length → top width → top length.
 *    Each check tiles its panel and places vertical cleats. A placement that
 *    needs more material grows the matching envelope axis immediately, so the
 *    remaining checks of the pass already see the new dimensions.
 * 3. Stop after a pass with no growth. Running out of passes is fatal.
 *
 * The envelope is never mutated; every growth returns a new one.
 */

import { placeVerticalCleats, spacingRulesFrom } from './cleatPlacement';
import { DEFAULT_CRATE_CONFIG, type CrateLayoutConfig } from './config';
import { CrateLayoutError } from './errors';
import { extractVerticalSplices, tilePanel } from './plywoodLayout';
import type {
  CrateEnvelope,
  CrateParams,
  EnvelopeAxis,
  GrowthStep,
  PanelName,
  PanelSpec,
  ReconciliationCheck,
  ReconciliationResult,
  SkidLumber,
} from './types';

// =============================================================================
// Envelope & Panel Geometry
// =============================================================================

/** Depth of one panel assembly: sheathing plus cleat. */
export function panelAssemblyThickness(params: CrateParams): number {
  return params.panel_thickness_in + params.cleat_thickness_in;
}

export function initialEnvelope(params: CrateParams, skid: SkidLumber): CrateEnvelope {
  const t = panelAssemblyThickness(params);
  return {
    overall_width_in: params.product_width_in + 2 * params.side_clearance_in,
    overall_length_in: params.product_length_in + 2 * params.side_clearance_in,
    overall_height_in:
      skid.height_in +
      params.floorboard_thickness_in +
      params.product_height_in +
      params.clearance_above_in +
      t,
  };
}

export function derivePanelSpecs(
  params: CrateParams,
  skid: SkidLumber,
  envelope: CrateEnvelope
): Record<PanelName, PanelSpec> {
  const t = panelAssemblyThickness(params);
  const materials = {
    sheathing_thickness_in: params.panel_thickness_in,
    cleat_thickness_in: params.cleat_thickness_in,
    cleat_member_width_in: params.cleat_member_width_in,
  };

  const front: PanelSpec = {
    ...materials,
    width_in: envelope.overall_width_in + 2 * t,
    height_in: params.floorboard_thickness_in + params.product_height_in + params.clearance_above_in,
  };
  const left: PanelSpec = {
    ...materials,
    width_in: envelope.overall_length_in - 2 * t,
    height_in:
      skid.height_in +
      params.floorboard_thickness_in +
      params.product_height_in +
      params.clearance_above_in -
      params.ground_clearance_in,
  };
  const top: PanelSpec = {
    ...materials,
    width_in: envelope.overall_width_in + 2 * t,
    height_in: envelope.overall_length_in,
  };

  return { front, back: { ...front }, left, right: { ...left }, top };
}

export function growEnvelope(envelope: CrateEnvelope, axis: EnvelopeAxis, amount: number): CrateEnvelope {
  if (axis === 'width') {
    return { ...envelope, overall_width_in: envelope.overall_width_in + amount };
  }
  return { ...envelope, overall_length_in: envelope.overall_length_in + amount };
}

// =============================================================================
// Checks
// =============================================================================

interface PanelCheck {
  check: ReconciliationCheck;
  axis: EnvelopeAxis;
  /** Face to tile, with `width` running along `axis`. */
  face: (specs: Record<PanelName, PanelSpec>) => { width: number; height: number };
}

export const RECONCILIATION_CHECKS: readonly PanelCheck[] = [
  {
    check: 'front-back-width',
    axis: 'width',
    face: (specs) => ({ width: specs.front.width_in, height: specs.front.height_in }),
  },
  {
    check: 'left-right-length',
    axis: 'length',
    face: (specs) => ({ width: specs.left.width_in, height: specs.left.height_in }),
  },
  {
    check: 'top-width',
    axis: 'width',
    face: (specs) => ({ width: specs.top.width_in, height: specs.top.height_in }),
  },
  {
    check: 'top-length',
    axis: 'length',
    face: (specs) => ({ width: specs.top.height_in, height: specs.top.width_in }),
  },
];

// =============================================================================
// Fixed-Point Loop
// =============================================================================

export interface ReconcileOptions {
  /** Called after every growth step, in order. */
  onGrowth?: (step: GrowthStep) => void;
}

export function reconcileEnvelope(
  params: CrateParams,
  skid: SkidLumber,
  config: CrateLayoutConfig = DEFAULT_CRATE_CONFIG,
  options: ReconcileOptions = {}
): ReconciliationResult {
  const rules = spacingRulesFrom(config);
  const member = params.cleat_member_width_in;
  const start = initialEnvelope(params, skid);
  const growth: GrowthStep[] = [];
  let envelope = start;

  for (let pass = 1; pass <= config.maxReconciliationPasses; pass++) {
    let grewThisPass = false;

    for (const { check, axis, face } of RECONCILIATION_CHECKS) {
      const { width, height } = face(derivePanelSpecs(params, skid, envelope));
      const tiling = tilePanel(width, height, config);
      const placement = placeVerticalCleats(width, extractVerticalSplices(tiling.sheets), member, rules);
      if (placement.status === 'placed') {
        continue;
      }

      envelope = growEnvelope(envelope, axis, placement.material.amount_in);
      grewThisPass = true;
      const step: GrowthStep = {
        pass,
        check,
        axis,
        amount_in: placement.material.amount_in,
        splice_x_in: placement.material.splice_x_in,
        envelope,
      };
      growth.push(step);
      options.onGrowth?.(step);
    }

    if (!grewThisPass) {
      return { initial_envelope: start, envelope, passes: pass, growth };
    }
  }

  throw new CrateLayoutError(
    'non_convergence',
    `Crate dimensions did not settle within ${config.maxReconciliationPasses} passes`,
    { envelope, growth }
  );
}
