/**
 * Crate Layout Types
 *
 * Consolidated type definitions for the crate layout engine.
 * All lengths are inches, weights are pounds.
 */

// =============================================================================
// Input Parameters
// =============================================================================

/**
 * Validated parameter record for one crate calculation.
 * Plain scalars and one list; no nested objects.
 */
export interface CrateParams {
  product_length_in: number;
  product_width_in: number;
  product_height_in: number;
  product_weight_lbs: number;
  /** Clearance between product and panel on each side */
  side_clearance_in: number;
  clearance_above_in: number;
  /** Gap between the floor and the bottom of the end panels */
  ground_clearance_in: number;
  /** Plywood sheathing thickness */
  panel_thickness_in: number;
  cleat_thickness_in: number;
  /** Actual face width of the cleat lumber */
  cleat_member_width_in: number;
  floorboard_thickness_in: number;
  /** Standard floorboard lumber widths available */
  lumber_widths_in: number[];
  min_custom_width_in: number;
  force_small_custom_board: boolean;
  max_middle_gap_in: number;
  allow_3x4_skids: boolean;
}

// =============================================================================
// Envelope & Panels
// =============================================================================

/**
 * Overall crate dimensions. Reconciliation only ever grows these.
 */
export interface CrateEnvelope {
  overall_width_in: number;
  overall_length_in: number;
  overall_height_in: number;
}

export type EnvelopeAxis = 'width' | 'length';

export type PanelName = 'front' | 'back' | 'left' | 'right' | 'top';

export const PANEL_NAMES: readonly PanelName[] = ['front', 'back', 'left', 'right', 'top'];

/**
 * Snapshot of one panel's face dimensions and materials.
 * For the top panel, height is the panel length (along the crate).
 */
export interface PanelSpec {
  width_in: number;
  height_in: number;
  sheathing_thickness_in: number;
  cleat_thickness_in: number;
  cleat_member_width_in: number;
}

// =============================================================================
// Plywood
// =============================================================================

/**
 * Which way the stock sheet is laid on the panel.
 * - 'standard': sheet long side along panel width
 * - 'rotated': sheet long side along panel height
 */
export type SheetOrientation = 'standard' | 'rotated';

/** A rectangular plywood piece on the panel face; origin at bottom-left. */
export interface Sheet {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface PlywoodTiling {
  orientation: SheetOrientation;
  columns: number;
  rows: number;
  sheets: Sheet[];
}

// =============================================================================
// Cleats
// =============================================================================

export type CleatOrientation = 'vertical' | 'horizontal';

/**
 * Why an intermediate vertical cleat exists.
 * - 'splice': sits on a plywood seam
 * - 'spacing': fills a gap wider than the spacing rule
 * - 'symmetric': uniform spacing on a panel without seams
 */
export type CleatOrigin = 'splice' | 'spacing' | 'symmetric';

export type CleatPlacementStrategy = 'symmetric' | 'splice-driven';

export interface VerticalCleat {
  orientation: 'vertical';
  x_centerline_in: number;
  x_left_edge_in: number;
  length_in: number;
  origin: CleatOrigin;
}

export interface HorizontalCleat {
  orientation: 'horizontal';
  x_left_edge_in: number;
  /** Clear span between the two vertical cleats it sits between */
  width_in: number;
  y_centerline_in: number;
  y_bottom_edge_in: number;
}

export type CleatInstance = VerticalCleat | HorizontalCleat;

/** Perimeter cleats: two of each, always present. */
export interface EdgeCleats {
  horizontal: { count: 2; length_in: number };
  vertical: { count: 2; length_in: number };
}

/**
 * Extra panel width required before a splice cleat can be placed.
 */
export interface MaterialNeeded {
  amount_in: number;
  /** The splice that triggered the request */
  splice_x_in: number;
}

export interface PanelLayout {
  panel: PanelName;
  spec: PanelSpec;
  orientation: SheetOrientation;
  sheets: Sheet[];
  strategy: CleatPlacementStrategy;
  edge_cleats: EdgeCleats;
  vertical_cleats: VerticalCleat[];
  horizontal_cleats: HorizontalCleat[];
}

// =============================================================================
// Klimps
// =============================================================================

/**
 * Front-panel edge a klimp clamps to its neighbour.
 * - 'top': the seam with the top panel
 * - 'left' / 'right': the seams with the end panels
 */
export type KlimpEdge = 'top' | 'left' | 'right';

/** Klimp position on the front panel face; origin at bottom-left. */
export interface Klimp {
  edge: KlimpEdge;
  x_in: number;
  y_in: number;
}

export interface KlimpLayout {
  diameter_in: number;
  klimps: Klimp[];
}

// =============================================================================
// Skids
// =============================================================================

export type SkidCallout = '3x4' | '4x4' | '4x6' | '6x6' | '8x8';

export interface SkidLumber {
  callout: SkidCallout;
  height_in: number;
  width_in: number;
  max_spacing_in: number;
}

export interface SkidPlacement {
  count: number;
  /** Centre-to-centre spacing */
  pitch_in: number;
  /** Left edge of the crate relative to its centred origin */
  origin_offset_in: number;
  first_position_in: number;
}

export interface SkidLayout extends SkidPlacement {
  lumber: SkidLumber;
  length_in: number;
}

// =============================================================================
// Floorboards
// =============================================================================

export type FloorboardKind = 'standard' | 'custom';

export interface Floorboard {
  width_in: number;
  y_position_in: number;
  kind: FloorboardKind;
}

export interface FloorboardLayout {
  boards: Floorboard[];
  middle_gap_in: number;
  custom_width_in: number;
}

export interface CrateFloorboards extends FloorboardLayout {
  board_length_in: number;
  thickness_in: number;
  start_offset_in: number;
  usable_span_in: number;
}

// =============================================================================
// Reconciliation & Results
// =============================================================================

/**
 * The four checks of a reconciliation pass, in the order they run.
 */
export type ReconciliationCheck = 'front-back-width' | 'left-right-length' | 'top-width' | 'top-length';

export interface GrowthStep {
  pass: number;
  check: ReconciliationCheck;
  axis: EnvelopeAxis;
  amount_in: number;
  splice_x_in: number;
  envelope: CrateEnvelope;
}

export interface ReconciliationResult {
  initial_envelope: CrateEnvelope;
  envelope: CrateEnvelope;
  passes: number;
  growth: GrowthStep[];
}

export interface CrateLayout {
  params: CrateParams;
  envelope: CrateEnvelope;
  reconciliation: ReconciliationResult;
  skids: SkidLayout;
  floorboards: CrateFloorboards;
  panels: Record<PanelName, PanelLayout>;
  /** Front panel only */
  klimps: KlimpLayout;
  warnings: string[];
}
