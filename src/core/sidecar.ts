/**
 * Sidecar Assembler
 *
 * Builds the JSON document written next to each NIfTI image. Key order:
 * provenance, identity, PAR header fields, scan parameters, XML metadata,
 * then modality-specific fields. PAR header keys never replace provenance or
 * identity keys.
 *
 * RepetitionTime, EchoTime and SliceTiming are in seconds.
 */

import * as fs from 'fs';
import type { BidsEntities, HeaderMetadata, ScanInfo, XmlMetadata } from './types.js';

export const CONVERSION_SOFTWARE = 'parrec-bids';
export const CONVERSION_SOFTWARE_VERSION = '1.0.0';
export const SOURCE_FORMAT = 'Philips PAR/REC';

/**
 * Fixed-direction defaults for functional runs. The echo spacing and echo
 * train length are approximations, not values read from the scanner; they
 * are listed under `PlaceholderFields` in every sidecar that carries them.
 */
export const FUNCTIONAL_DEFAULTS = {
  PhaseEncodingDirection: 'j',
  SliceEncodingDirection: 'k',
  EffectiveEchoSpacing: 0.00055,
  EchoTrainLength: 35,
} as const;

export const PLACEHOLDER_FIELDS = ['EffectiveEchoSpacing', 'EchoTrainLength'] as const;

export const FIELDMAP_UNITS = 'Hz';

export type Sidecar = Record<string, unknown>;

export interface SidecarInput {
  scan: Pick<ScanInfo, 'subjectId' | 'sourceFiles'>;
  entities: Pick<BidsEntities, 'modality'> & Partial<Pick<BidsEntities, 'suffix'>>;
  header: HeaderMetadata;
  xml: XmlMetadata;
  conversionDate?: Date;
}

export function buildSidecar(input: SidecarInput): Sidecar {
  const { scan, entities, header, xml } = input;
  const { modality } = entities;

  const sidecar: Sidecar = {
    ConversionSoftware: CONVERSION_SOFTWARE,
    ConversionSoftwareVersion: CONVERSION_SOFTWARE_VERSION,
    ConversionDate: (input.conversionDate ?? new Date()).toISOString(),
    SourceFormat: SOURCE_FORMAT,
    SourceFiles: [...scan.sourceFiles],
    BIDSModality: modality,
    SubjectID: scan.subjectId,
  };

  for (const [key, value] of Object.entries(header.fields)) {
    if (!(key in sidecar)) {
      sidecar[key] = value;
    }
  }
  sidecar.ScanParameters = { ...header.scanParameters };
  sidecar.XMLMetadata = { ...xml };

  const { RepetitionTime, SliceTiming } = header.scanParameters;
  if (modality === 'func' && SliceTiming !== undefined) {
    if (RepetitionTime !== undefined) {
      sidecar.RepetitionTime = RepetitionTime;
    }
    sidecar.SliceTiming = [...SliceTiming];
    Object.assign(sidecar, FUNCTIONAL_DEFAULTS);
    sidecar.PlaceholderFields = [...PLACEHOLDER_FIELDS];
  }

  if (modality === 'fmap') {
    // magnitude images carry no frequency units
    if (entities.suffix !== 'magnitude1') {
      sidecar.Units = FIELDMAP_UNITS;
    }
    sidecar.IntendedFor = [];
  }

  return sidecar;
}

export function writeSidecar(filePath: string, sidecar: Sidecar): void {
  fs.writeFileSync(filePath, `${JSON.stringify(sidecar, null, 2)}\n`);
}
