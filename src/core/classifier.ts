/**
 * Filename Classifier
 *
 * Segments a PAR file name into scan identifiers and maps the free-text
 * protocol name onto BIDS entities through an ordered list of substring
 * rules (first match wins).
 */

import * as path from 'path';
import type { ConversionOptions } from './config.js';
import type {
  BidsEntities,
  ProtocolClassification,
  ScanIdentifiers,
  ScanInfo,
} from './types.js';

/**
 * `<patientId>_<exam>_<series>_<acquisition>_<H.MM.SS>_(<protocol>).PAR`
 */
const SCAN_FILENAME = /^(.+?)_(\d+)_(\d+)_(\d+)_(\d+\.\d+\.\d+)_\((.+?)\)\.par$/i;

const ENTITY_SEPARATOR = '_';
const DEFAULT_ANTICIPATION_RUN = '01';

interface ProtocolRule {
  matches: readonly string[];
  classify: (protocol: string) => ProtocolClassification;
}

const PROTOCOL_RULES: readonly ProtocolRule[] = [
  {
    matches: ['t1w', 't1'],
    classify: (protocol) => ({ suffix: 'T1w', modality: 'anat', acquisition: acquisitionLabel(protocol) }),
  },
  {
    matches: ['t2w', 't2'],
    classify: () => ({ suffix: 'T2w', modality: 'anat' }),
  },
  {
    matches: ['funct', 'resting'],
    classify: () => ({ suffix: 'bold', modality: 'func', task: 'rest' }),
  },
  {
    matches: ['anticipation'],
    classify: (protocol) => ({
      suffix: 'bold',
      modality: 'func',
      task: 'anticipation',
      run: anticipationRun(protocol),
    }),
  },
  {
    matches: ['test_epi'],
    classify: () => ({ suffix: 'bold', modality: 'func', task: 'test' }),
  },
  {
    matches: ['b0map'],
    classify: () => ({ suffix: 'phasediff', modality: 'fmap' }),
  },
  {
    matches: ['survey'],
    classify: () => ({ suffix: 'scout', modality: 'anat' }),
  },
];

/**
 * Segment a PAR file name. Returns null when the name does not follow the
 * scanner's export pattern.
 */
export function parseScanFilename(filename: string): ScanIdentifiers | null {
  const match = SCAN_FILENAME.exec(path.basename(filename));
  if (!match) return null;

  const [, patientId, examNumber, seriesNumber, acquisitionNumber, timestamp, protocolName] = match;
  return { patientId, examNumber, seriesNumber, acquisitionNumber, timestamp, protocolName };
}

/**
 * Build the ScanInfo for a PAR file inside a subject's raw directory
 */
export function createScanInfo(parPath: string, subjectId: string): ScanInfo | null {
  const identifiers = parseScanFilename(parPath);
  if (!identifiers) return null;

  return Object.freeze({
    ...identifiers,
    subjectId,
    parPath,
    sourceFiles: Object.freeze(['PAR', 'REC', 'XML', 'V41'].map((ext) => siblingPath(parPath, ext))),
  });
}

/**
 * Path of a file sharing the PAR file's base name, keeping the PAR
 * extension's letter case
 */
export function siblingPath(parPath: string, extension: string): string {
  const ext = path.extname(parPath);
  const sameCase = ext === ext.toLowerCase() ? extension.toLowerCase() : extension.toUpperCase();
  return path.join(path.dirname(parPath), `${path.basename(parPath, ext)}.${sameCase}`);
}

/**
 * Alphanumeric, lower-cased protocol name without `wip`/`vip` markers
 */
export function acquisitionLabel(protocol: string): string {
  return protocol
    .toLowerCase()
    .replace(/[^a-z0-9]/g, '')
    .replace(/wip/g, '')
    .replace(/vip/g, '');
}

function anticipationRun(protocol: string): string {
  const lower = protocol.toLowerCase();
  const tail = lower.slice(lower.lastIndexOf('anticipation') + 'anticipation'.length);
  const digits = /\d+/.exec(tail);
  return digits ? digits[0] : DEFAULT_ANTICIPATION_RUN;
}

/**
 * Map a protocol name to suffix and modality
 */
export function classifyProtocol(protocolName: string): ProtocolClassification {
  const protocol = protocolName.toLowerCase();
  const rule = PROTOCOL_RULES.find((r) => r.matches.some((needle) => protocol.includes(needle)));
  return rule ? rule.classify(protocolName) : { suffix: 'unknown', modality: 'unknown' };
}

/**
 * Per-subject run numbering for repeated acquisitions
 */
export class RunCounter {
  private readonly counts = new Map<string, number>();

  next(label: string): string {
    const count = (this.counts.get(label) ?? 0) + 1;
    this.counts.set(label, count);
    return String(count);
  }

  reset(): void {
    this.counts.clear();
  }
}

/**
 * Derive the BIDS entities of a scan
 */
export function deriveEntities(
  scan: Pick<ScanInfo, 'subjectId' | 'protocolName'>,
  options: Pick<ConversionOptions, 'includeSessionEntity' | 'sessionLabel' | 'disambiguateT1wRuns'>,
  runCounter: RunCounter
): BidsEntities {
  const { suffix, modality, task, run, acquisition } = classifyProtocol(scan.protocolName);
  const entities: BidsEntities = { subject: scan.subjectId, suffix, modality };

  if (options.includeSessionEntity) {
    entities.session = options.sessionLabel;
  }
  if (acquisition !== undefined) {
    entities.acquisition = acquisition;
    if (options.disambiguateT1wRuns) {
      entities.run = runCounter.next(acquisition);
    }
  }
  if (task !== undefined) {
    entities.task = task;
  }
  if (run !== undefined) {
    entities.run = run;
  }
  return entities;
}

/**
 * Compose the BIDS base name (no extension)
 */
export function formatBidsName(entities: BidsEntities): string {
  const parts = [`sub-${entities.subject}`];

  if (entities.session) {
    parts.push(`ses-${entities.session}`);
  }
  if (entities.modality === 'anat' && entities.suffix === 'T1w' && entities.acquisition) {
    parts.push(`acq-${entities.acquisition}`);
  }
  if (entities.modality === 'func' && entities.task) {
    parts.push(`task-${entities.task}`);
  }
  if (entities.run) {
    parts.push(`run-${entities.run}`);
  }
  parts.push(entities.suffix);

  return parts.join(ENTITY_SEPARATOR);
}

/**
 * Case-insensitive exclusion test against a file name
 */
export function isExcluded(filename: string, skipSubstrings: readonly string[]): boolean {
  const name = path.basename(filename).toLowerCase();
  return skipSubstrings.some((needle) => needle !== '' && name.includes(needle.toLowerCase()));
}
