import { z } from 'zod';
import { isDirection, type Direction } from '../types/tooltip';
import { colors, borderRadius } from '../styles/tokens';

export interface TooltipOptions {
  /** Side tried first; flipped to the opposite side when it lacks room */
  preferredDirection: Direction;
  /** Open/close on tap of the trigger */
  showOnTap: boolean;
  /** Auto-hide delay in ms, null for manual hide only */
  autoHideDuration: number | null;
  /** Gap between anchor and tooltip */
  margin: number;
  /** Max body width for left/right tooltips, null for 50% of the viewport */
  sideAxisWidth: number | null;
  /** Max body width for up/down tooltips, null for viewport minus 32 */
  mainAxisWidth: number | null;
  backgroundColor: string;
  cornerRadius: number;
  borderColor: string | null;
  borderWidth: number;
  /** Extrusion of the arrow away from the body */
  arrowHeight: number;
  /** Length of the arrow base */
  arrowWidth: number;
  /** How far the arrow base reaches under the body to hide the corner seam */
  arrowOverlap: number;
}

const DEFAULT_OPTIONS: TooltipOptions = {
  preferredDirection: 'up',
  showOnTap: true,
  autoHideDuration: null,
  margin: 0,
  sideAxisWidth: null,
  mainAxisWidth: null,
  backgroundColor: colors.tooltip.background,
  cornerRadius: borderRadius.tooltip,
  borderColor: null,
  borderWidth: 0,
  arrowHeight: 8,
  arrowWidth: 16,
  arrowOverlap: 1,
};

export { DEFAULT_OPTIONS as TOOLTIP_DEFAULTS };

const nonNegative = z.number().finite().nonnegative();
const positive = z.number().finite().positive();

const FIELD_SCHEMAS: { [K in keyof TooltipOptions]: z.ZodType<TooltipOptions[K]> } = {
  preferredDirection: z.enum(['up', 'down', 'left', 'right']),
  showOnTap: z.boolean(),
  autoHideDuration: nonNegative.nullable(),
  margin: nonNegative,
  sideAxisWidth: positive.nullable(),
  mainAxisWidth: positive.nullable(),
  backgroundColor: z.string().min(1),
  cornerRadius: nonNegative,
  borderColor: z.string().min(1).nullable(),
  borderWidth: nonNegative,
  arrowHeight: nonNegative,
  arrowWidth: nonNegative,
  arrowOverlap: nonNegative,
};

const OPTION_KEYS: readonly (keyof TooltipOptions)[] = [
  'preferredDirection',
  'showOnTap',
  'autoHideDuration',
  'margin',
  'sideAxisWidth',
  'mainAxisWidth',
  'backgroundColor',
  'cornerRadius',
  'borderColor',
  'borderWidth',
  'arrowHeight',
  'arrowWidth',
  'arrowOverlap',
];

function resolveField<K extends keyof TooltipOptions>(
  target: TooltipOptions,
  key: K,
  value: unknown
): void {
  const parsed = FIELD_SCHEMAS[key].safeParse(value);
  if (parsed.success) {
    target[key] = parsed.data;
  } else {
    console.warn(
      `[tooltipOptions] Invalid value for ${key}: ${JSON.stringify(value)}. Using default.`
    );
  }
}

/**
 * Merge user options over the defaults. Each field is validated on its own;
 * an invalid field is reported and replaced by its default, so a bad option
 * never stops the tooltip from working. `undefined` means "not set".
 */
export function resolveTooltipOptions(input: Partial<Record<keyof TooltipOptions, unknown>> = {}): TooltipOptions {
  const resolved: TooltipOptions = { ...DEFAULT_OPTIONS };
  for (const key of OPTION_KEYS) {
    const value = input[key];
    if (value !== undefined) {
      resolveField(resolved, key, value);
    }
  }
  return resolved;
}

type DatasetParser = (value: string) => unknown;

const parseNumber: DatasetParser = (value) => {
  if (!/^\d+(\.\d+)?$/.test(value.trim())) return undefined;
  return Number(value);
};

const parseNullableNumber: DatasetParser = (value) =>
  value === 'none' ? null : parseNumber(value);

const parseBoolean: DatasetParser = (value) => {
  if (value === 'true' || value === '') return true;
  if (value === 'false') return false;
  return undefined;
};

const parseDirection: DatasetParser = (value) => (isDirection(value) ? value : undefined);

const parseString: DatasetParser = (value) => (value.length > 0 ? value : undefined);

// data-tooltip-* attribute (camelCased by the DOM) → option
const DATASET_MAP: { attr: string; key: keyof TooltipOptions; parse: DatasetParser }[] = [
  { attr: 'tooltipDirection', key: 'preferredDirection', parse: parseDirection },
  { attr: 'tooltipShowOnTap', key: 'showOnTap', parse: parseBoolean },
  { attr: 'tooltipDuration', key: 'autoHideDuration', parse: parseNullableNumber },
  { attr: 'tooltipMargin', key: 'margin', parse: parseNumber },
  { attr: 'tooltipSideWidth', key: 'sideAxisWidth', parse: parseNullableNumber },
  { attr: 'tooltipMainWidth', key: 'mainAxisWidth', parse: parseNullableNumber },
  { attr: 'tooltipBackground', key: 'backgroundColor', parse: parseString },
  { attr: 'tooltipRadius', key: 'cornerRadius', parse: parseNumber },
  { attr: 'tooltipBorderColor', key: 'borderColor', parse: parseString },
  { attr: 'tooltipBorderWidth', key: 'borderWidth', parse: parseNumber },
  { attr: 'tooltipArrowHeight', key: 'arrowHeight', parse: parseNumber },
  { attr: 'tooltipArrowWidth', key: 'arrowWidth', parse: parseNumber },
  { attr: 'tooltipArrowOverlap', key: 'arrowOverlap', parse: parseNumber },
];

/**
 * Read option overrides from an element's dataset, e.g.
 * `<button data-tooltip-direction="left" data-tooltip-duration="1500">`.
 * Values that don't parse are skipped with a warning.
 */
export function parseTooltipOptionsFromDataset(
  dataset: Readonly<Record<string, string | undefined>>
): Partial<TooltipOptions> {
  const raw: Partial<Record<keyof TooltipOptions, unknown>> = {};

  for (const { attr, key, parse } of DATASET_MAP) {
    const value = dataset[attr];
    if (value === undefined) continue;
    const parsed = parse(value);
    if (parsed === undefined) {
      console.warn(`[parseTooltipOptionsFromDataset] Invalid value for ${attr}: "${value}". Ignoring.`);
      continue;
    }
    raw[key] = parsed;
  }

  const options: Partial<TooltipOptions> = {};
  for (const key of OPTION_KEYS) {
    if (key in raw) {
      copyValidated(options, key, raw[key]);
    }
  }
  return options;
}

function copyValidated<K extends keyof TooltipOptions>(
  target: Partial<TooltipOptions>,
  key: K,
  value: unknown
): void {
  const parsed = FIELD_SCHEMAS[key].safeParse(value);
  if (parsed.success) {
    target[key] = parsed.data;
  } else {
    console.warn(`[parseTooltipOptionsFromDataset] Invalid value for ${key}: ${JSON.stringify(value)}. Ignoring.`);
  }
}
