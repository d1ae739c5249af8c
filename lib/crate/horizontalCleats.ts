/**
 * Horizontal Splice-Cleat Sectioning
 *
 * A horizontal plywood seam is backed by short cleat sections fitted between
 * neighbouring vertical cleats, one section per gap (edge cleats included).
 */

import { DEFAULT_CRATE_CONFIG, type CrateLayoutConfig } from './config';
import { CrateLayoutError } from './errors';
import type { HorizontalCleat } from './types';

export interface SectionRules {
  minSectionWidth_in: number;
  maxSections: number;
}

export function sectionRulesFrom(config: CrateLayoutConfig = DEFAULT_CRATE_CONFIG): SectionRules {
  return {
    minSectionWidth_in: config.minCleatSectionWidth_in,
    maxSections: config.slots.horizontalCleats,
  };
}

/**
 * Seams inside the top or bottom edge-cleat band are already backed.
 */
export function isSpliceCoveredByEdgeCleats(
  spliceY: number,
  panelHeight: number,
  memberWidth: number
): boolean {
  return spliceY <= memberWidth || spliceY >= panelHeight - memberWidth;
}

/**
 * Build the horizontal sections for one seam.
 *
 * @param intermediateCenterlines - vertical cleat centerlines, edge cleats excluded
 */
export function sectionHorizontalCleats(
  panelWidth: number,
  intermediateCenterlines: readonly number[],
  spliceY: number,
  memberWidth: number,
  rules: SectionRules = sectionRulesFrom()
): HorizontalCleat[] {
  const half = memberWidth / 2;
  const centerlines = [half, ...[...intermediateCenterlines].sort((a, b) => a - b), panelWidth - half];

  const sections: HorizontalCleat[] = [];
  for (let i = 0; i < centerlines.length - 1; i++) {
    const leftCenter = centerlines[i];
    const rightCenter = centerlines[i + 1];
    const start = leftCenter + half;
    let span = rightCenter - half - start;
    if (span < 0) {
      span = rightCenter - leftCenter - memberWidth;
    }
    if (span < rules.minSectionWidth_in) {
      continue;
    }
    sections.push({
      orientation: 'horizontal',
      x_left_edge_in: start,
      width_in: span,
      y_centerline_in: spliceY,
      y_bottom_edge_in: spliceY - half,
    });
  }

  if (sections.length > rules.maxSections) {
    throw new CrateLayoutError(
      'capacity_exceeded',
      `Splice at y=${spliceY} needs ${sections.length} horizontal cleat sections; the limit is ${rules.maxSections}`,
      { spliceY, sections: sections.length, limit: rules.maxSections }
    );
  }

  return sections;
}

/**
 * Sections for every horizontal seam of a panel that is not already covered
 * by the top or bottom edge cleat.
 */
export function sectionPanelSplices(
  panelWidth: number,
  panelHeight: number,
  intermediateCenterlines: readonly number[],
  spliceYs: readonly number[],
  memberWidth: number,
  rules: SectionRules = sectionRulesFrom()
): HorizontalCleat[] {
  return spliceYs
    .filter((y) => !isSpliceCoveredByEdgeCleats(y, panelHeight, memberWidth))
    .flatMap((y) => sectionHorizontalCleats(panelWidth, intermediateCenterlines, y, memberWidth, rules));
}
