import { z } from 'zod';

import { CrateLayoutError } from './errors';

// =============================================================================
// Configuration
// =============================================================================

/**
 * Fixed instance counts of the external expression format.
 * These are ceilings: exceeding one is a hard failure.
 */
export interface CrateSlotCapacity {
  sheets: number;
  verticalCleats: number;
  horizontalCleats: number;
  floorboards: number;
  klimps: number;
}

export interface CrateLayoutConfig {
  /** Long side of a stock plywood sheet. Default: 96 */
  sheetLength_in: number;
  /** Short side of a stock plywood sheet. Default: 48 */
  sheetWidth_in: number;
  /** Largest panel face dimension accepted by the tiler. Default: 480 */
  maxPanelDimension_in: number;
  /** Maximum centre-to-centre distance between adjacent cleats. Default: 24 */
  maxCleatSpacing_in: number;
  /** Minimum clear gap between a splice cleat and an edge cleat. Default: 0.25 */
  minCleatClearance_in: number;
  /** Panels grow in multiples of this. Default: 0.25 */
  growthIncrement_in: number;
  /** Horizontal cleat sections narrower than this are dropped. Default: 0.25 */
  minCleatSectionWidth_in: number;
  /** Smallest custom floorboard that may be forced. Default: 0.25 */
  minForceableCustomWidth_in: number;
  /** Floorboard remainders at or below this count as zero. Default: 0.001 */
  floorboardTolerance_in: number;
  /** Slack allowed on the spacing rule for floating-point error. Default: 1e-6 */
  spacingTolerance_in: number;
  /** Reconciliation passes before giving up. Default: 20 */
  maxReconciliationPasses: number;
  /** Side-edge spans shorter than this get one centred klimp. Default: 16 */
  klimpMinSpacing_in: number;
  /** Maximum centre-to-centre distance between klimps on a side edge. Default: 24 */
  klimpMaxSpacing_in: number;
  /** Clear distance from a klimp to the nearest cleat face. Default: 2 */
  klimpCleatClearance_in: number;
  /** Distance from a klimp to the panel corners. Default: 3 */
  klimpEdgeClearance_in: number;
  /** Default: 1 */
  klimpDiameter_in: number;
  slots: CrateSlotCapacity;
}

export const DEFAULT_CRATE_CONFIG: CrateLayoutConfig = {
  sheetLength_in: 96,
  sheetWidth_in: 48,
  maxPanelDimension_in: 480,
  maxCleatSpacing_in: 24,
  minCleatClearance_in: 0.25,
  growthIncrement_in: 0.25,
  minCleatSectionWidth_in: 0.25,
  minForceableCustomWidth_in: 0.25,
  floorboardTolerance_in: 0.001,
  spacingTolerance_in: 1e-6,
  maxReconciliationPasses: 20,
  klimpMinSpacing_in: 16,
  klimpMaxSpacing_in: 24,
  klimpCleatClearance_in: 2,
  klimpEdgeClearance_in: 3,
  klimpDiameter_in: 1,
  slots: {
    sheets: 10,
    verticalCleats: 7,
    horizontalCleats: 6,
    floorboards: 20,
    klimps: 12,
  },
};

// =============================================================================
// Environment Overrides
// =============================================================================

const positiveNumber = z.coerce.number().finite().positive();
const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  CRATE_SHEET_LENGTH_IN: positiveNumber.optional(),
  CRATE_SHEET_WIDTH_IN: positiveNumber.optional(),
  CRATE_MAX_PANEL_DIMENSION_IN: positiveNumber.optional(),
  CRATE_MAX_CLEAT_SPACING_IN: positiveNumber.optional(),
  CRATE_MIN_CLEAT_CLEARANCE_IN: positiveNumber.optional(),
  CRATE_GROWTH_INCREMENT_IN: positiveNumber.optional(),
  CRATE_MAX_RECONCILIATION_PASSES: positiveInt.optional(),
  CRATE_MAX_SHEET_SLOTS: positiveInt.optional(),
  CRATE_MAX_VERTICAL_CLEAT_SLOTS: positiveInt.optional(),
  CRATE_MAX_HORIZONTAL_CLEAT_SLOTS: positiveInt.optional(),
  CRATE_MAX_FLOORBOARD_SLOTS: positiveInt.optional(),
  CRATE_MAX_KLIMP_SLOTS: positiveInt.optional(),
});

export type CrateEnv = Record<string, string | undefined>;

/**
 * Build a config from `CRATE_*` environment variables layered over `base`.
 * Blank values are ignored.
 */
export function loadCrateConfig(
  env: CrateEnv = process.env,
  base: CrateLayoutConfig = DEFAULT_CRATE_CONFIG
): CrateLayoutConfig {
  const present = Object.entries(env).filter(
    ([key, value]) => key.startsWith('CRATE_') && value !== undefined && value.trim() !== ''
  );

  const parsed = envSchema.safeParse(Object.fromEntries(present));
  if (!parsed.success) {
    throw new CrateLayoutError(
      'invalid_input',
      'Invalid crate configuration in environment',
      parsed.error.flatten()
    );
  }

  const overrides = parsed.data;
  const config: CrateLayoutConfig = {
    ...base,
    sheetLength_in: overrides.CRATE_SHEET_LENGTH_IN ?? base.sheetLength_in,
    sheetWidth_in: overrides.CRATE_SHEET_WIDTH_IN ?? base.sheetWidth_in,
    maxPanelDimension_in: overrides.CRATE_MAX_PANEL_DIMENSION_IN ?? base.maxPanelDimension_in,
    maxCleatSpacing_in: overrides.CRATE_MAX_CLEAT_SPACING_IN ?? base.maxCleatSpacing_in,
    minCleatClearance_in: overrides.CRATE_MIN_CLEAT_CLEARANCE_IN ?? base.minCleatClearance_in,
    growthIncrement_in: overrides.CRATE_GROWTH_INCREMENT_IN ?? base.growthIncrement_in,
    maxReconciliationPasses:
      overrides.CRATE_MAX_RECONCILIATION_PASSES ?? base.maxReconciliationPasses,
    slots: {
      sheets: overrides.CRATE_MAX_SHEET_SLOTS ?? base.slots.sheets,
      verticalCleats: overrides.CRATE_MAX_VERTICAL_CLEAT_SLOTS ?? base.slots.verticalCleats,
      horizontalCleats: overrides.CRATE_MAX_HORIZONTAL_CLEAT_SLOTS ?? base.slots.horizontalCleats,
      floorboards: overrides.CRATE_MAX_FLOORBOARD_SLOTS ?? base.slots.floorboards,
      klimps: overrides.CRATE_MAX_KLIMP_SLOTS ?? base.slots.klimps,
    },
  };

  if (config.sheetWidth_in > config.sheetLength_in) {
    throw new CrateLayoutError(
      'invalid_input',
      `Sheet width (${config.sheetWidth_in}) cannot exceed sheet length (${config.sheetLength_in})`
    );
  }

  return config;
}
