/**
 * Crate Layout Module
 *
 * Usage:
 *   import { calculateCrateLayout, renderCrateExpressions } from '@/lib/crate';
 */

// Types
export * from './types';

// Configuration & errors
export { DEFAULT_CRATE_CONFIG, loadCrateConfig, type CrateLayoutConfig, type CrateSlotCapacity } from './config';
export { CrateLayoutError, isCrateLayoutError, type CrateLayoutErrorCode } from './errors';
export { crateParamsSchema, validateCrateParams, type CrateParamsInput } from './validation';

// Layout engine
export { tilePanel, extractVerticalSplices, extractHorizontalSplices } from './plywoodLayout';
export { placeVerticalCleats, selectPlacementStrategy, type VerticalCleatPlacement } from './cleatPlacement';
export { sectionHorizontalCleats, sectionPanelSplices } from './horizontalCleats';
export { selectSkidLumber, calculateSkidPlacement, skidCenterlines } from './skidCalculator';
export { calculateFloorboardLayout } from './floorboardCalculator';
export { reconcileEnvelope, initialEnvelope, derivePanelSpecs, type ReconcileOptions } from './reconciliation';
export { placeFrontPanelKlimps, distributeAlongSpan, type KlimpRules } from './klimpPlacement';
export { calculateCrateLayout, buildPanelLayout } from './crateCalculator';

// Output boundary
export { toSlotRecord, fillSlots, type Slot, type CrateSlotRecord } from './slots';
export { renderCrateExpressions, INACTIVE_DIMENSION_IN, PANEL_PREFIXES } from './expressions';
