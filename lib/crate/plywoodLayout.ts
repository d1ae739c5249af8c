/**
 * Plywood Sheet Layout Optimizer
 *
 * Tiles a panel face with stock plywood sheets, minimising the sheet count.
 *
 * Orientation decision table (first rule that separates the candidates wins):
 * 1. Fewer sheets
 * 2. Fewer columns, i.e. fewer vertical splices
 * 3. Standard orientation (sheet long side along the panel width)
 *
 * Within the chosen orientation sheets are laid row-major. When more than one
 * row is needed the undersized remainder row sits at the bottom (y = 0) with
 * full-height rows above it, which fixes where the horizontal splices fall.
 */

import { DEFAULT_CRATE_CONFIG, type CrateLayoutConfig } from './config';
import { CrateLayoutError } from './errors';
import type { PlywoodTiling, Sheet, SheetOrientation } from './types';

// =============================================================================
// Orientation Candidates
// =============================================================================

export interface OrientationCandidate {
  orientation: SheetOrientation;
  /** Sheet extent along the panel width */
  sheetWidth: number;
  /** Sheet extent along the panel height */
  sheetHeight: number;
  columns: number;
  rows: number;
  sheetCount: number;
}

type SheetSize = Pick<CrateLayoutConfig, 'sheetLength_in' | 'sheetWidth_in'>;

function buildCandidate(
  orientation: SheetOrientation,
  panelWidth: number,
  panelHeight: number,
  sheetWidth: number,
  sheetHeight: number
): OrientationCandidate {
  const columns = Math.ceil(panelWidth / sheetWidth);
  const rows = Math.ceil(panelHeight / sheetHeight);
  return { orientation, sheetWidth, sheetHeight, columns, rows, sheetCount: columns * rows };
}

/**
 * Sheet counts for both orientations of a stock sheet on the panel.
 */
export function planOrientations(
  panelWidth: number,
  panelHeight: number,
  size: SheetSize = DEFAULT_CRATE_CONFIG
): { standard: OrientationCandidate; rotated: OrientationCandidate } {
  return {
    standard: buildCandidate('standard', panelWidth, panelHeight, size.sheetLength_in, size.sheetWidth_in),
    rotated: buildCandidate('rotated', panelWidth, panelHeight, size.sheetWidth_in, size.sheetLength_in),
  };
}

/**
 * Pick an orientation using the decision table in the module header.
 */
export function chooseOrientation(
  standard: OrientationCandidate,
  rotated: OrientationCandidate
): OrientationCandidate {
  if (rotated.sheetCount !== standard.sheetCount) {
    return rotated.sheetCount < standard.sheetCount ? rotated : standard;
  }
  if (rotated.columns !== standard.columns) {
    return rotated.columns < standard.columns ? rotated : standard;
  }
  return standard;
}

// =============================================================================
// Tiling
// =============================================================================

function assertTileableDimension(value: number, field: string, maxDimension: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new CrateLayoutError('invalid_input', `Panel ${field} must be a positive number, got ${value}`);
  }
  if (value > maxDimension) {
    throw new CrateLayoutError(
      'invalid_input',
      `Panel ${field} ${value} exceeds the maximum of ${maxDimension}`
    );
  }
}

/**
 * Lay out plywood sheets covering [0, width] × [0, height] exactly.
 */
export function tilePanel(
  panelWidth: number,
  panelHeight: number,
  config: CrateLayoutConfig = DEFAULT_CRATE_CONFIG
): PlywoodTiling {
  assertTileableDimension(panelWidth, 'width', config.maxPanelDimension_in);
  assertTileableDimension(panelHeight, 'height', config.maxPanelDimension_in);

  const { standard, rotated } = planOrientations(panelWidth, panelHeight, config);
  const chosen = chooseOrientation(standard, rotated);
  const { sheetWidth, sheetHeight, columns, rows } = chosen;

  const remainderHeight = panelHeight - (rows - 1) * sheetHeight;
  const sheets: Sheet[] = [];

  for (let row = 0; row < rows; row++) {
    // Row 0 carries the remainder; with a single row that is the full height.
    const y = row === 0 ? 0 : remainderHeight + (row - 1) * sheetHeight;
    const height = row === 0 ? remainderHeight : Math.min(sheetHeight, panelHeight - y);

    for (let col = 0; col < columns; col++) {
      const x = col * sheetWidth;
      const width = Math.min(sheetWidth, panelWidth - x);
      if (width > 0 && height > 0) {
        sheets.push({ x, y, width, height });
      }
    }
  }

  return { orientation: chosen.orientation, columns, rows, sheets };
}

// =============================================================================
// Splices
// =============================================================================

function uniqueSorted(values: number[]): number[] {
  return Array.from(new Set(values)).sort((a, b) => a - b);
}

/**
 * X positions where sheets meet side by side.
 */
export function extractVerticalSplices(sheets: Sheet[]): number[] {
  const rows = new Map<number, Sheet[]>();
  for (const sheet of sheets) {
    const row = rows.get(sheet.y) ?? [];
    row.push(sheet);
    rows.set(sheet.y, row);
  }

  const splices: number[] = [];
  for (const row of rows.values()) {
    const ordered = [...row].sort((a, b) => a.x - b.x);
    for (let i = 0; i < ordered.length - 1; i++) {
      splices.push(ordered[i].x + ordered[i].width);
    }
  }
  return uniqueSorted(splices);
}

/**
 * Y positions where one row of sheets sits on another.
 */
export function extractHorizontalSplices(sheets: Sheet[]): number[] {
  return uniqueSorted(sheets.filter((sheet) => sheet.y > 0).map((sheet) => sheet.y));
}
