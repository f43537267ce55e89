/**
 * parrec-bids: Philips PAR/REC to BIDS conversion
 *
 * Parses PAR headers and XML metadata, derives BIDS entities from protocol
 * names, delegates pixel conversion to parrec2nii and writes JSON sidecars.
 *
 * @module parrec-bids
 */

/** Core entry points */
export {
  convertDataset,
  processSubject,
  listParFiles,
  listSubjectDirectories,
  summarize,
  isMissingDataDirectory,
  NIFTI_EXTENSION,
  SIDECAR_EXTENSION,
  type DatasetRequest,
  type PipelineContext,
} from './core/pipeline.js';
export {
  DEFAULT_OPTIONS,
  ConversionOptionsSchema,
  loadOptionsFile,
  resolveOptions,
  type ConversionOptions,
  type PartialConversionOptions,
} from './core/config.js';
export {
  ParRecError,
  ExternalToolError,
  createConversionError,
  type ConversionErrorKind,
} from './core/errors.js';
/** Parsers */
export { parseParHeader, readParHeader, computeSliceTiming, parseImageTypeCodes } from './core/headerParser.js';
export { parseXmlMetadata, readXmlMetadata, IMAGE_ATTRIBUTE_PREFIX } from './core/xmlParser.js';
/** Classification */
export {
  parseScanFilename,
  createScanInfo,
  classifyProtocol,
  acquisitionLabel,
  deriveEntities,
  formatBidsName,
  isExcluded,
  siblingPath,
  RunCounter,
} from './core/classifier.js';
/** Conversion and post-processing */
export {
  Parrec2NiiConverter,
  resolveConvertedImage,
  spawnCommand,
  type ImageConverter,
  type CommandRunner,
  type CommandResult,
} from './core/converter.js';
export {
  countFieldmapSlots,
  extractMagnitudeVolumes,
  extractFieldmapMagnitude,
  FIELDMAP_IMAGE_TYPE,
  type FieldmapSlots,
} from './core/fieldmap.js';
export {
  buildSidecar,
  writeSidecar,
  CONVERSION_SOFTWARE,
  CONVERSION_SOFTWARE_VERSION,
  FUNCTIONAL_DEFAULTS,
  PLACEHOLDER_FIELDS,
  type Sidecar,
  type SidecarInput,
} from './core/sidecar.js';
export { createLogger, silentLogger, type Logger, type LogLevel } from './utils/logger.js';
export type {
  BidsEntities,
  BidsModality,
  BidsSuffix,
  ConversionReport,
  HeaderMetadata,
  HeaderParseResult,
  OutputArtifact,
  ProtocolClassification,
  ScanIdentifiers,
  ScanInfo,
  ScanOutcome,
  ScanParameters,
  SubjectReport,
  XmlMetadata,
} from './core/types.js';
