import { z } from 'zod';

import { DEFAULT_CRATE_CONFIG, type CrateLayoutConfig } from './config';
import { CrateLayoutError } from './errors';
import { derivePanelSpecs, initialEnvelope } from './reconciliation';
import { selectSkidLumber } from './skidCalculator';
import type { CrateParams } from './types';

// =============================================================================
// Parameter Schema
// =============================================================================

const positiveLength = (label: string) =>
  z.number({ invalid_type_error: `${label} must be a number` }).finite().positive(`${label} must be positive`);

const nonNegativeLength = (label: string) =>
  z.number({ invalid_type_error: `${label} must be a number` }).finite().nonnegative(`${label} cannot be negative`);

export const DEFAULT_LUMBER_WIDTHS_IN = [5.5, 7.25, 9.25, 11.25];

const baseParamsSchema = z.object({
  product_length_in: positiveLength('Product length'),
  product_width_in: positiveLength('Product width'),
  product_height_in: positiveLength('Product height'),
  product_weight_lbs: nonNegativeLength('Product weight'),
  side_clearance_in: nonNegativeLength('Side clearance').default(2),
  clearance_above_in: nonNegativeLength('Clearance above').default(2),
  ground_clearance_in: nonNegativeLength('Ground clearance').default(1),
  panel_thickness_in: positiveLength('Panel thickness').default(0.75),
  cleat_thickness_in: nonNegativeLength('Cleat thickness').default(0.75),
  cleat_member_width_in: positiveLength('Cleat member width').default(3.5),
  floorboard_thickness_in: positiveLength('Floorboard thickness').default(1.5),
  lumber_widths_in: z
    .array(positiveLength('Lumber width'))
    .min(1, 'At least one floorboard lumber width is required')
    .default(() => [...DEFAULT_LUMBER_WIDTHS_IN]),
  min_custom_width_in: positiveLength('Minimum custom width').default(2.5),
  force_small_custom_board: z.boolean().default(false),
  max_middle_gap_in: nonNegativeLength('Maximum middle gap').default(0.25),
  allow_3x4_skids: z.boolean().default(false),
});

export type CrateParamsInput = z.input<typeof baseParamsSchema>;

/**
 * Parameter schema with the geometry checks that depend on the layout rules.
 */
export function buildCrateParamsSchema(config: CrateLayoutConfig = DEFAULT_CRATE_CONFIG) {
  return baseParamsSchema.superRefine((params, ctx) => {
    if (params.force_small_custom_board && params.min_custom_width_in < config.minForceableCustomWidth_in) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['min_custom_width_in'],
        message: `Minimum custom width must be at least ${config.minForceableCustomWidth_in} when forcing a custom board`,
      });
    }

    const member = params.cleat_member_width_in;
    const minCenterDistance = member + config.minCleatClearance_in;

    // The narrowest sheet column puts a splice at sheetWidth from the left edge.
    if (member / 2 + minCenterDistance > config.sheetWidth_in) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['cleat_member_width_in'],
        message: `Cleat member width ${member} leaves no clearance for a splice cleat on a ${config.sheetWidth_in} sheet`,
      });
    }

    if (config.maxCleatSpacing_in / 2 < minCenterDistance) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['cleat_member_width_in'],
        message: `Cleat member width ${member} is too wide for a maximum cleat spacing of ${config.maxCleatSpacing_in}`,
      });
    }

    // Back and right mirror front and left. Growth never shrinks a face.
    const skid = selectSkidLumber(params.product_weight_lbs, params.allow_3x4_skids);
    const specs = derivePanelSpecs(params, skid, initialEnvelope(params, skid));
    for (const name of ['front', 'left', 'top'] as const) {
      const { width_in: width, height_in: height } = specs[name];
      if (Math.min(width, height) < 2 * member) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `The ${name} panel (${width} x ${height}) is narrower than its two ${member} edge cleats`,
        });
      }
      if (Math.max(width, height) > config.maxPanelDimension_in) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `The ${name} panel (${width} x ${height}) exceeds the ${config.maxPanelDimension_in} in maximum panel dimension`,
        });
      }
    }
  });
}

export const crateParamsSchema = buildCrateParamsSchema();

export function validateCrateParams(
  input: unknown,
  config: CrateLayoutConfig = DEFAULT_CRATE_CONFIG
): CrateParams {
  const schema = config === DEFAULT_CRATE_CONFIG ? crateParamsSchema : buildCrateParamsSchema(config);
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new CrateLayoutError('invalid_input', 'Invalid crate parameters', parsed.error.flatten());
  }
  return parsed.data;
}
