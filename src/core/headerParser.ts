/**
 * PAR Header Parser
 *
 * Reads the general information block of a Philips PAR file into a flat
 * key/value map plus typed scan parameters, and reads the image-type column
 * of the image information table.
 *
 * Repetition and echo times are stored in seconds (BIDS convention); the PAR
 * file gives them in milliseconds.
 */

import * as fs from 'fs';
import { createConversionError, toError } from './errors.js';
import type { HeaderMetadata, HeaderParseResult, ScanParameters } from './types.js';

type NumericKind = 'float' | 'int';

type LabelRule =
  | { label: string; key: 'Technique' | 'PatientPosition'; kind: 'string' }
  | { label: string; key: 'RepetitionTime' | 'EchoTime'; kind: 'milliseconds' }
  | { label: string; key: 'NumberOfSlices' | 'NumberOfDynamics'; kind: 'count' }
  | {
      label: string;
      key: 'FieldOfView' | 'ScanResolution' | 'Angulation' | 'OffCentre';
      kind: 'vector';
      length: number;
      numeric: NumericKind;
    };

/**
 * Known labels of the general information block. A line is assigned to the
 * first rule whose label it contains.
 */
const LABEL_RULES: readonly LabelRule[] = [
  { label: 'Repetition time [ms]', key: 'RepetitionTime', kind: 'milliseconds' },
  { label: 'Echo time [ms]', key: 'EchoTime', kind: 'milliseconds' },
  { label: 'FOV (ap,fh,rl) [mm]', key: 'FieldOfView', kind: 'vector', length: 3, numeric: 'float' },
  { label: 'Scan resolution  (x, y)', key: 'ScanResolution', kind: 'vector', length: 2, numeric: 'int' },
  { label: 'Technique', key: 'Technique', kind: 'string' },
  { label: 'Patient position', key: 'PatientPosition', kind: 'string' },
  { label: 'Angulation midslice(ap,fh,rl)[degr]', key: 'Angulation', kind: 'vector', length: 3, numeric: 'float' },
  { label: 'Off Centre midslice(ap,fh,rl) [mm]', key: 'OffCentre', kind: 'vector', length: 3, numeric: 'float' },
  { label: 'Max. number of slices/locations', key: 'NumberOfSlices', kind: 'count' },
  { label: 'Max. number of dynamics', key: 'NumberOfDynamics', kind: 'count' },
];

const IMAGE_INFO_BANNER = /IMAGE INFORMATION\s*=/;
const END_OF_DATA_BANNER = 'END OF DATA DESCRIPTION';
const IMAGE_TYPE_COLUMN = 4;

/**
 * Parse PAR header text
 */
export function parseParHeader(text: string): HeaderParseResult {
  const lines = text.split(/\r?\n/);
  const fields: Record<string, string> = {};
  const scanParameters: ScanParameters = {};
  const warnings: string[] = [];

  for (const line of lines) {
    const trimmed = line.trim();
    const colon = trimmed.indexOf(':');
    if (trimmed.startsWith('.') && colon !== -1) {
      const key = trimmed.slice(0, colon).replace(/\./g, '').trim();
      if (key) {
        fields[key] = trimmed.slice(colon + 1).trim();
      }
    }
  }

  for (const line of lines) {
    if (line.trimStart().startsWith('#')) continue;
    const rule = LABEL_RULES.find((r) => line.includes(r.label));
    if (!rule) continue;

    const colon = line.indexOf(':', line.indexOf(rule.label) + rule.label.length);
    if (colon === -1) {
      warnings.push(`${rule.label}: missing value separator`);
      continue;
    }

    try {
      applyRule(scanParameters, rule, line.slice(colon + 1).trim());
    } catch (e) {
      warnings.push(`${rule.label}: ${toError(e).message}`);
    }
  }

  const { NumberOfSlices: slices, RepetitionTime: tr } = scanParameters;
  if (slices !== undefined && slices > 0 && tr !== undefined) {
    scanParameters.SliceTiming = computeSliceTiming(tr, slices);
  }

  const header: HeaderMetadata = { fields, scanParameters };
  return { header, warnings };
}

/**
 * Read and parse a PAR file
 */
export function readParHeader(filePath: string): HeaderParseResult {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'latin1');
  } catch (e) {
    throw createConversionError('Cannot read PAR file', 'MissingInput', filePath, toError(e));
  }
  return parseParHeader(text);
}

/**
 * Uniform ascending slice acquisition: slice i starts at (i - 1) * TR / n
 */
export function computeSliceTiming(repetitionTime: number, sliceCount: number): number[] {
  const step = repetitionTime / sliceCount;
  return Array.from({ length: sliceCount }, (_, i) => round(i * step));
}

/**
 * Image-type code of every row of the image information table
 */
export function parseImageTypeCodes(text: string): number[] {
  const codes: number[] = [];
  let inTable = false;

  for (const line of text.split(/\r?\n/)) {
    if (IMAGE_INFO_BANNER.test(line)) {
      inTable = true;
      continue;
    }
    if (!inTable) continue;
    if (line.includes(END_OF_DATA_BANNER)) break;

    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;

    const columns = trimmed.split(/\s+/);
    const code = Number(columns[IMAGE_TYPE_COLUMN]);
    if (columns.length > IMAGE_TYPE_COLUMN && Number.isInteger(code)) {
      codes.push(code);
    }
  }

  return codes;
}

function applyRule(target: ScanParameters, rule: LabelRule, value: string): void {
  switch (rule.kind) {
    case 'string':
      target[rule.key] = value;
      break;
    case 'milliseconds':
      target[rule.key] = round(parseNumber(value, 'float') / 1000);
      break;
    case 'count':
      target[rule.key] = parseNumber(value, 'int');
      break;
    case 'vector': {
      const { numeric } = rule;
      const parts = value.split(/\s+/).filter(Boolean);
      if (parts.length !== rule.length) {
        throw new Error(`expected ${rule.length} values, got ${parts.length}`);
      }
      target[rule.key] = parts.map((part) => parseNumber(part, numeric));
      break;
    }
  }
}

function parseNumber(value: string, kind: NumericKind): number {
  const parsed = value === '' ? NaN : Number(value);
  if (!Number.isFinite(parsed) || (kind === 'int' && !Number.isInteger(parsed))) {
    throw new Error(`malformed ${kind === 'int' ? 'integer' : 'number'} "${value}"`);
  }
  return parsed;
}

function round(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}
