/**
 * Type definitions for parrec-bids
 *
 * These types describe what is read from a PAR/REC acquisition and what is
 * derived from it on the way to a BIDS-named NIfTI file.
 */

/**
 * Identifiers segmented out of a PAR file name
 */
export interface ScanIdentifiers {
  patientId: string;
  examNumber: string;
  seriesNumber: string;
  acquisitionNumber: string;
  timestamp: string;
  protocolName: string;
}

/**
 * One source acquisition, created once per PAR file
 */
export interface ScanInfo extends ScanIdentifiers {
  /** Taken from the containing subject directory, not the file name */
  subjectId: string;
  parPath: string;
  /** PAR, REC, XML and V41 paths sharing the PAR file's base name */
  sourceFiles: readonly string[];
}

/**
 * Typed scan parameters. Times are in seconds.
 */
export interface ScanParameters {
  RepetitionTime?: number;
  EchoTime?: number;
  FieldOfView?: number[];
  ScanResolution?: number[];
  Technique?: string;
  PatientPosition?: string;
  Angulation?: number[];
  OffCentre?: number[];
  NumberOfSlices?: number;
  NumberOfDynamics?: number;
  SliceTiming?: number[];
}

/**
 * Header metadata read from a PAR file
 */
export interface HeaderMetadata {
  /** Every `. key : value` line of the general information block */
  fields: Record<string, string>;
  scanParameters: ScanParameters;
}

/**
 * Header parse result with the per-field problems that were skipped
 */
export interface HeaderParseResult {
  header: HeaderMetadata;
  warnings: string[];
}

/**
 * Flat attribute map from the XML file. Image-level names carry an
 * `Image_` prefix.
 */
export type XmlMetadata = Record<string, string>;

export type BidsModality = 'anat' | 'func' | 'fmap' | 'unknown';

export type BidsSuffix =
  | 'T1w'
  | 'T2w'
  | 'bold'
  | 'phasediff'
  | 'magnitude1'
  | 'scout'
  | 'unknown';

/**
 * Protocol classification before subject/session context is applied
 */
export interface ProtocolClassification {
  suffix: BidsSuffix;
  modality: BidsModality;
  task?: string;
  run?: string;
  /** Only set for T1w protocols */
  acquisition?: string;
}

/**
 * Entities composing a BIDS file name, in composition order
 */
export interface BidsEntities {
  subject: string;
  session?: string;
  acquisition?: string;
  task?: string;
  run?: string;
  suffix: BidsSuffix;
  modality: BidsModality;
}

/**
 * A written image and its JSON sidecar
 */
export interface OutputArtifact {
  imagePath: string;
  sidecarPath: string;
}

export type ScanOutcome =
  | { status: 'converted'; parPath: string; bidsName: string; artifacts: OutputArtifact[] }
  | { status: 'skipped'; parPath: string; reason: string }
  | { status: 'failed'; parPath: string; error: Error };

export interface SubjectReport {
  subjectId: string;
  outcomes: ScanOutcome[];
  /** Set when the subject could not be processed at all */
  error?: Error;
}

export interface ConversionReport {
  subjects: SubjectReport[];
  converted: number;
  failed: number;
  skipped: number;
}
