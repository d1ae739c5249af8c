/**
 * CAD Expression Writer
 *
 * Turns a crate layout into parametric expression lines:
 *
 *   [Inch]KEY = value
 *   KEY = value
 *   // comment
 *
 * Every instance collection is written at its full slot count. Inactive slots
 * carry a suppress flag of 0 and sentinel dimensions, since the CAD model
 * rejects zero-size features.
 */

import { format } from 'date-fns';

import { DEFAULT_CRATE_CONFIG, type CrateLayoutConfig } from './config';
import { activeCount, toSlotRecord, type PanelSlots, type Slot } from './slots';
import type { CrateLayout, Floorboard, Klimp, KlimpLayout, PanelName } from './types';
import { PANEL_NAMES } from './types';

/** Size written for a suppressed instance. */
export const INACTIVE_DIMENSION_IN = 0.0001;

export const PANEL_PREFIXES: Record<PanelName, string> = {
  front: 'FP_',
  back: 'BP_',
  left: 'LP_',
  right: 'RP_',
  top: 'TP_',
};

const PANEL_TITLES: Record<PanelName, string> = {
  front: 'FRONT PANEL',
  back: 'BACK PANEL',
  left: 'LEFT END PANEL',
  right: 'RIGHT END PANEL',
  top: 'TOP PANEL',
};

// =============================================================================
// Line Helpers
// =============================================================================

function inch(key: string, value: number, digits = 3): string {
  return `[Inch]${key} = ${value.toFixed(digits)}`;
}

function plain(key: string, value: number): string {
  return `${key} = ${value}`;
}

function flag(key: string, on: boolean): string {
  return `${key} = ${on ? 1 : 0}`;
}

function heading(title: string): string[] {
  return ['', `// --- ${title} ---`];
}

// =============================================================================
// Sections
// =============================================================================

function inputLines(layout: CrateLayout): string[] {
  const p = layout.params;
  return [
    ...heading('USER INPUTS & CRATE CONSTANTS'),
    `[lbm]product_weight = ${p.product_weight_lbs.toFixed(3)}`,
    inch('product_length_input', p.product_length_in),
    inch('product_width_input', p.product_width_in),
    inch('INPUT_Product_Actual_Height', p.product_height_in),
    inch('clearance_side_input', p.side_clearance_in),
    inch('INPUT_Clearance_Above_Product', p.clearance_above_in),
    inch('INPUT_Ground_Clearance_End_Panels', p.ground_clearance_in),
    inch('INPUT_Panel_Thickness', p.panel_thickness_in),
    inch('INPUT_Cleat_Thickness', p.cleat_thickness_in),
    inch('INPUT_Cleat_Member_Actual_Width', p.cleat_member_width_in),
    inch('INPUT_Floorboard_Actual_Thickness', p.floorboard_thickness_in),
    inch('INPUT_Max_Allowable_Middle_Gap', p.max_middle_gap_in),
    inch('INPUT_Min_Custom_Lumber_Width', p.min_custom_width_in),
    flag('BOOL_Allow_3x4_Skids_Input', p.allow_3x4_skids),
    flag('BOOL_Force_Small_Custom_Floorboard', p.force_small_custom_board),
  ];
}

function envelopeLines(layout: CrateLayout): string[] {
  const { envelope } = layout;
  return [
    ...heading('CALCULATED CRATE DIMENSIONS'),
    inch('crate_overall_width_OD', envelope.overall_width_in),
    inch('crate_overall_length_OD', envelope.overall_length_in),
    inch('crate_overall_height_OD', envelope.overall_height_in),
  ];
}

function skidLines(layout: CrateLayout): string[] {
  const { skids } = layout;
  return [
    ...heading('SKID PARAMETERS'),
    `// Skid Lumber Callout: ${skids.lumber.callout}`,
    inch('Skid_Actual_Height', skids.lumber.height_in),
    inch('Skid_Actual_Width', skids.lumber.width_in),
    inch('Skid_Actual_Length', skids.length_in),
    plain('CALC_Skid_Count', skids.count),
    inch('CALC_Skid_Pitch', skids.pitch_in, 4),
    inch('X_Master_Skid_Origin_Offset', skids.origin_offset_in, 4),
  ];
}

function floorboardLines(layout: CrateLayout, slots: Slot<Floorboard>[]): string[] {
  const { floorboards } = layout;
  const lines = [
    ...heading('FLOORBOARD PARAMETERS'),
    inch('FB_Board_Actual_Length', floorboards.board_length_in),
    inch('FB_Board_Actual_Thickness', floorboards.thickness_in),
    inch('CALC_FB_Actual_Middle_Gap', floorboards.middle_gap_in, 4),
    inch('CALC_FB_Center_Custom_Board_Width', floorboards.custom_width_in, 4),
    inch('CALC_FB_Start_Y_Offset_Abs', floorboards.start_offset_in),
    plain('CALC_FB_Count', activeCount(slots)),
    '// Floorboard Instance Data',
  ];

  slots.forEach((slot, i) => {
    const key = `FB_Inst_${i + 1}`;
    if (slot.active) {
      lines.push(
        flag(`${key}_Suppress_Flag`, true),
        inch(`${key}_Actual_Width`, slot.value.width_in, 4),
        inch(`${key}_Y_Pos_Abs`, slot.value.y_position_in, 4)
      );
    } else {
      lines.push(
        flag(`${key}_Suppress_Flag`, false),
        inch(`${key}_Actual_Width`, INACTIVE_DIMENSION_IN, 4),
        inch(`${key}_Y_Pos_Abs`, 0, 4)
      );
    }
  });
  return lines;
}

function panelLines(name: PanelName, slots: PanelSlots): string[] {
  const p = PANEL_PREFIXES[name];
  const { layout } = slots;
  const lines = [
    ...heading(PANEL_TITLES[name]),
    inch(`${p}Panel_Width`, layout.spec.width_in),
    inch(`${p}Panel_Height`, layout.spec.height_in),
    inch(`${p}Sheathing_Thickness`, layout.spec.sheathing_thickness_in),
    inch(`${p}Cleat_Thickness`, layout.spec.cleat_thickness_in),
    inch(`${p}Cleat_Member_Width`, layout.spec.cleat_member_width_in),
    `// Plywood orientation: ${layout.orientation}, cleat placement: ${layout.strategy}`,
  ];

  slots.sheets.forEach((slot, i) => {
    const key = `${p}Plywood_${i + 1}`;
    const sheet = slot.active ? slot.value : null;
    lines.push(
      flag(`${key}_Active`, slot.active),
      inch(`${key}_X_Position`, sheet?.x ?? 0, 4),
      inch(`${key}_Y_Position`, sheet?.y ?? 0, 4),
      inch(`${key}_Width`, sheet?.width ?? INACTIVE_DIMENSION_IN, 4),
      inch(`${key}_Height`, sheet?.height ?? INACTIVE_DIMENSION_IN, 4)
    );
  });

  lines.push(
    inch(`${p}Edge_HC_Length`, layout.edge_cleats.horizontal.length_in),
    plain(`${p}Edge_HC_Count`, layout.edge_cleats.horizontal.count),
    inch(`${p}Edge_VC_Length`, layout.edge_cleats.vertical.length_in),
    plain(`${p}Edge_VC_Count`, layout.edge_cleats.vertical.count),
    plain(`${p}Inter_VC_Count`, activeCount(slots.vertical_cleats))
  );

  slots.vertical_cleats.forEach((slot, i) => {
    const key = `${p}Inter_VC_Inst_${i + 1}`;
    const cleat = slot.active ? slot.value : null;
    lines.push(
      flag(`${key}_Suppress_Flag`, slot.active),
      inch(`${key}_X_Pos_Centerline`, cleat?.x_centerline_in ?? 0, 4),
      inch(`${key}_X_Pos_From_Left_Edge`, cleat?.x_left_edge_in ?? 0, 4),
      inch(`${key}_Length`, cleat?.length_in ?? INACTIVE_DIMENSION_IN, 4)
    );
  });

  lines.push(plain(`${p}Inter_HC_Count`, activeCount(slots.horizontal_cleats)));

  slots.horizontal_cleats.forEach((slot, i) => {
    const key = `${p}Inter_HC_Inst_${i + 1}`;
    const cleat = slot.active ? slot.value : null;
    lines.push(
      flag(`${key}_Suppress_Flag`, slot.active),
      inch(`${key}_Width`, cleat?.width_in ?? INACTIVE_DIMENSION_IN, 4),
      inch(`${key}_X_Pos`, cleat?.x_left_edge_in ?? 0, 4),
      inch(`${key}_Y_Pos`, cleat?.y_bottom_edge_in ?? 0, 4),
      inch(`${key}_Y_Pos_Centerline`, cleat?.y_centerline_in ?? 0, 4)
    );
  });

  return lines;
}

function klimpLines(klimps: KlimpLayout, slots: Slot<Klimp>[]): string[] {
  const lines = [
    '// Front Panel Klimps',
    plain('FP_Klimp_Count', activeCount(slots)),
    inch('FP_Klimp_Diameter', klimps.diameter_in),
  ];

  slots.forEach((slot, i) => {
    const key = `FP_Klimp_Inst_${i + 1}`;
    const klimp = slot.active ? slot.value : null;
    lines.push(
      flag(`${key}_Suppress_Flag`, slot.active),
      inch(`${key}_X_Pos`, klimp?.x_in ?? 0, 4),
      inch(`${key}_Y_Pos`, klimp?.y_in ?? 0, 4)
    );
  });
  return lines;
}

// =============================================================================
// Entry Point
// =============================================================================

export interface RenderOptions {
  config?: CrateLayoutConfig;
  generatedAt?: Date;
}

/**
 * Render the complete expressions file for a crate layout.
 * Throws `capacity_exceeded` when a collection does not fit its slots.
 */
export function renderCrateExpressions(layout: CrateLayout, options: RenderOptions = {}): string {
  const config = options.config ?? DEFAULT_CRATE_CONFIG;
  const generatedAt = options.generatedAt ?? new Date();
  const record = toSlotRecord(layout, config);

  const lines = [
    '// Crate Expressions - Skids, Floorboards & Panels',
    `// Generated: ${format(generatedAt, 'yyyy-MM-dd HH:mm:ss')}`,
    ...layout.warnings.map((warning) => `// WARNING: ${warning}`),
    ...inputLines(layout),
    ...envelopeLines(layout),
    ...skidLines(layout),
    ...floorboardLines(layout, record.floorboards),
    ...PANEL_NAMES.flatMap((name) =>
      name === 'front'
        ? [...panelLines(name, record.panels.front), ...klimpLines(layout.klimps, record.klimps)]
        : panelLines(name, record.panels[name])
    ),
  ];

  return `${lines.join('\n')}\n`;
}
