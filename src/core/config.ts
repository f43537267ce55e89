/**
 * Conversion options and the JSON options file
 */

import * as fs from 'fs';
import { z } from 'zod';
import { createConversionError, toError } from './errors.js';

export interface ConversionOptions {
  /** Insert `ses-<sessionLabel>` after the subject entity */
  includeSessionEntity: boolean;
  sessionLabel: string;
  /** Give repeated T1w acquisitions sequential run numbers */
  disambiguateT1wRuns: boolean;
  /** Write a magnitude1 image next to each phasediff fieldmap */
  extractFieldmapMagnitude: boolean;
  /** Case-insensitive file name substrings that exclude a PAR file */
  skipProtocolSubstrings: string[];
  rawDirName: string;
  outputDirName: string;
  converterCommand: string;
}

export const DEFAULT_OPTIONS: Readonly<ConversionOptions> = Object.freeze({
  includeSessionEntity: false,
  sessionLabel: '01',
  disambiguateT1wRuns: true,
  extractFieldmapMagnitude: true,
  skipProtocolSubstrings: ['survey', 'coil'],
  rawDirName: 'XMLPARREC',
  outputDirName: 'NIfTI_BIDS',
  converterCommand: 'parrec2nii',
});

const BIDS_LABEL = /^[a-zA-Z0-9]+$/;

export const ConversionOptionsSchema = z
  .object({
    includeSessionEntity: z.boolean(),
    sessionLabel: z.string().regex(BIDS_LABEL, 'session label must be alphanumeric'),
    disambiguateT1wRuns: z.boolean(),
    extractFieldmapMagnitude: z.boolean(),
    skipProtocolSubstrings: z.array(z.string().min(1)),
    rawDirName: z.string().min(1),
    outputDirName: z.string().min(1),
    converterCommand: z.string().min(1),
  })
  .partial()
  .strict();

export type PartialConversionOptions = z.infer<typeof ConversionOptionsSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ');
}

export function resolveOptions(overrides: PartialConversionOptions = {}): ConversionOptions {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );
  const result = ConversionOptionsSchema.safeParse(defined);
  if (!result.success) {
    throw createConversionError(`Invalid options (${formatIssues(result.error)})`, 'InvalidConfiguration');
  }
  return {
    ...DEFAULT_OPTIONS,
    skipProtocolSubstrings: [...DEFAULT_OPTIONS.skipProtocolSubstrings],
    ...result.data,
  };
}

/**
 * Read and validate a JSON options file
 */
export function loadOptionsFile(filePath: string): PartialConversionOptions {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (e) {
    throw createConversionError('Cannot read options file', 'InvalidConfiguration', filePath, toError(e));
  }

  const result = ConversionOptionsSchema.safeParse(raw);
  if (!result.success) {
    throw createConversionError(
      `Invalid options file (${formatIssues(result.error)})`,
      'InvalidConfiguration',
      filePath
    );
  }
  return result.data;
}
