/**
 * Fixed-Slot Adapter
 *
 * The expression format declares a fixed number of instances per collection.
 * Layouts keep variable-length arrays; this adapter pads them to the declared
 * counts with explicit inactive slots. Overflow is an error, never a truncation.
 */

import { DEFAULT_CRATE_CONFIG, type CrateLayoutConfig } from './config';
import { CrateLayoutError } from './errors';
import type {
  CrateLayout,
  Floorboard,
  HorizontalCleat,
  Klimp,
  PanelLayout,
  PanelName,
  Sheet,
  VerticalCleat,
} from './types';

export type Slot<T> = { active: true; value: T } | { active: false };

export function fillSlots<T>(items: readonly T[], capacity: number, label: string): Slot<T>[] {
  if (items.length > capacity) {
    throw new CrateLayoutError(
      'capacity_exceeded',
      `${label}: ${items.length} instances exceed the ${capacity} available slots`,
      { label, count: items.length, capacity }
    );
  }
  return Array.from({ length: capacity }, (_, i): Slot<T> =>
    i < items.length ? { active: true, value: items[i] } : { active: false }
  );
}

export function activeCount<T>(slots: readonly Slot<T>[]): number {
  return slots.filter((slot) => slot.active).length;
}

export interface PanelSlots {
  layout: PanelLayout;
  sheets: Slot<Sheet>[];
  vertical_cleats: Slot<VerticalCleat>[];
  horizontal_cleats: Slot<HorizontalCleat>[];
}

export interface CrateSlotRecord {
  layout: CrateLayout;
  floorboards: Slot<Floorboard>[];
  panels: Record<PanelName, PanelSlots>;
  klimps: Slot<Klimp>[];
}

function toPanelSlots(panel: PanelLayout, config: CrateLayoutConfig): PanelSlots {
  return {
    layout: panel,
    sheets: fillSlots(panel.sheets, config.slots.sheets, `${panel.panel} panel plywood`),
    vertical_cleats: fillSlots(
      panel.vertical_cleats,
      config.slots.verticalCleats,
      `${panel.panel} panel intermediate vertical cleats`
    ),
    horizontal_cleats: fillSlots(
      panel.horizontal_cleats,
      config.slots.horizontalCleats,
      `${panel.panel} panel intermediate horizontal cleats`
    ),
  };
}

export function toSlotRecord(
  layout: CrateLayout,
  config: CrateLayoutConfig = DEFAULT_CRATE_CONFIG
): CrateSlotRecord {
  const { panels } = layout;
  return {
    layout,
    floorboards: fillSlots(layout.floorboards.boards, config.slots.floorboards, 'Floorboards'),
    panels: {
      front: toPanelSlots(panels.front, config),
      back: toPanelSlots(panels.back, config),
      left: toPanelSlots(panels.left, config),
      right: toPanelSlots(panels.right, config),
      top: toPanelSlots(panels.top, config),
    },
    klimps: fillSlots(layout.klimps.klimps, config.slots.klimps, 'front panel klimps'),
  };
}
