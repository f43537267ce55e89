/**
 * Batch driver: one subject at a time, one PAR file at a time.
 *
 * A failure in one file or subject is logged and counted; it never stops its
 * siblings. Only a missing data directory is fatal.
 */

import * as fs from 'fs';
import * as path from 'path';
import { gzipSync } from 'zlib';
import {
  createScanInfo,
  deriveEntities,
  formatBidsName,
  isExcluded,
  RunCounter,
  siblingPath,
} from './classifier.js';
import type { ConversionOptions } from './config.js';
import type { ImageConverter } from './converter.js';
import { createConversionError, ExternalToolError, ParRecError, toError } from './errors.js';
import { extractFieldmapMagnitude } from './fieldmap.js';
import { readParHeader } from './headerParser.js';
import { buildSidecar, writeSidecar, type Sidecar } from './sidecar.js';
import type {
  BidsEntities,
  ConversionReport,
  OutputArtifact,
  ScanInfo,
  ScanOutcome,
  SubjectReport,
} from './types.js';
import { readXmlMetadata } from './xmlParser.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export const NIFTI_EXTENSION = '.nii.gz';
export const SIDECAR_EXTENSION = '.json';

export interface PipelineContext {
  options: ConversionOptions;
  converter: ImageConverter;
  logger?: Logger;
  /** Fixed conversion timestamp, for reproducible sidecars */
  now?: () => Date;
}

export interface DatasetRequest {
  dataDir: string;
  /** Restrict processing to these subject IDs; empty means all */
  subjects?: readonly string[];
}

interface SubjectContext extends PipelineContext {
  logger: Logger;
  subjectId: string;
  outputDir: string;
  runCounter: RunCounter;
  /** BIDS names already written for this subject */
  writtenNames: Set<string>;
}

/**
 * Subject directories under `dataDir`, sorted by name
 */
export function listSubjectDirectories(dataDir: string): string[] {
  return fs
    .readdirSync(dataDir, { withFileTypes: true })
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();
}

/**
 * PAR files in a raw directory, sorted by name so run numbering is stable
 */
export function listParFiles(rawDir: string): string[] {
  return fs
    .readdirSync(rawDir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && path.extname(entry.name).toLowerCase() === '.par')
    .map((entry) => path.join(rawDir, entry.name))
    .sort();
}

export async function convertDataset(
  request: DatasetRequest,
  context: PipelineContext
): Promise<ConversionReport> {
  const logger = context.logger ?? silentLogger;
  const { dataDir } = request;

  if (!fs.existsSync(dataDir) || !fs.statSync(dataDir).isDirectory()) {
    throw createConversionError('Data directory not found', 'MissingInput', dataDir);
  }

  const available = listSubjectDirectories(dataDir);
  let selected = available;

  const requested = request.subjects ?? [];
  if (requested.length > 0) {
    const wanted = new Set(requested);
    selected = available.filter((name) => wanted.has(name));
    const missing = requested.filter((name) => !available.includes(name));
    if (missing.length > 0) {
      logger.warn(`Warning: requested subjects not found: ${missing.join(', ')}`);
      logger.warn(`Available subjects: ${available.join(', ') || '(none)'}`);
    }
  }

  logger.info(`Found ${selected.length} subject(s) to process`);

  const subjects: SubjectReport[] = [];
  for (const subjectId of selected) {
    logger.info(`\n${'='.repeat(50)}\nProcessing subject: ${subjectId}\n${'='.repeat(50)}`);
    try {
      subjects.push(await processSubject(path.join(dataDir, subjectId), { ...context, logger }));
    } catch (e) {
      const error = toError(e);
      logger.error(`Failed to process subject ${subjectId}: ${error.message}`);
      subjects.push({ subjectId, outcomes: [], error });
    }
  }

  return summarize(subjects);
}

export async function processSubject(
  subjectDir: string,
  context: PipelineContext
): Promise<SubjectReport> {
  const logger = context.logger ?? silentLogger;
  const { options } = context;
  const subjectId = path.basename(subjectDir);
  const rawDir = path.join(subjectDir, options.rawDirName);
  const report: SubjectReport = { subjectId, outcomes: [] };

  if (!fs.existsSync(rawDir)) {
    logger.warn(`No ${options.rawDirName} directory found in ${subjectDir}`);
    return report;
  }

  const parFiles = listParFiles(rawDir);
  if (parFiles.length === 0) {
    logger.warn(`No PAR files found in ${rawDir}`);
    return report;
  }

  const outputDir = path.join(subjectDir, options.outputDirName);
  fs.mkdirSync(outputDir, { recursive: true });
  logger.info(`Processing subject ${subjectId}: found ${parFiles.length} PAR files`);

  const subjectContext: SubjectContext = {
    ...context,
    logger,
    subjectId,
    outputDir,
    runCounter: new RunCounter(),
    writtenNames: new Set(),
  };

  for (const parPath of parFiles) {
    report.outcomes.push(await processScan(parPath, subjectContext));
  }
  return report;
}

async function processScan(parPath: string, context: SubjectContext): Promise<ScanOutcome> {
  const { logger, options } = context;
  const filename = path.basename(parPath);
  logger.info(`\nProcessing: ${filename}`);

  if (isExcluded(filename, options.skipProtocolSubstrings)) {
    logger.info(`Skipping ${filename}: matches exclusion list`);
    return { status: 'skipped', parPath, reason: 'excluded' };
  }

  const scan = createScanInfo(parPath, context.subjectId);
  if (!scan) {
    logger.warn(`Skipping ${filename}: name does not match the PAR/REC naming pattern`);
    return { status: 'skipped', parPath, reason: 'FilenamePatternMismatch' };
  }

  const entities = deriveEntities(scan, options, context.runCounter);
  const bidsName = formatBidsName(entities);
  logger.debug(`${filename} -> ${bidsName} (${entities.modality})`);

  try {
    const artifacts = await convertScan(scan, entities, bidsName, context);
    logger.info(`BIDS conversion complete: ${artifacts.map((a) => path.basename(a.imagePath)).join(', ')}`);
    return { status: 'converted', parPath, bidsName, artifacts };
  } catch (e) {
    const error = toError(e);
    logger.error(`Failed to convert ${filename}: ${error.message}`);
    if (error instanceof ExternalToolError && error.stderr) {
      logger.error(`stderr: ${error.stderr}`);
    }
    return { status: 'failed', parPath, error };
  }
}

async function convertScan(
  scan: ScanInfo,
  entities: BidsEntities,
  bidsName: string,
  context: SubjectContext
): Promise<OutputArtifact[]> {
  const { logger, options, outputDir } = context;
  const conversionDate = (context.now ?? (() => new Date()))();

  assertNameAvailable(bidsName, scan.parPath, context);

  const { header, warnings } = readParHeader(scan.parPath);
  for (const warning of warnings) {
    logger.warn(`Warning: ${path.basename(scan.parPath)}: ${warning}`);
  }
  const xml = readXmlMetadata(siblingPath(scan.parPath, 'XML'), logger);

  const converted = await context.converter.convert(scan.parPath, outputDir);
  if (!fs.existsSync(converted)) {
    throw createConversionError('Converted image not found', 'PostConversionFileMissing', converted);
  }

  const imagePath = path.join(outputDir, `${bidsName}${NIFTI_EXTENSION}`);
  moveAsCompressed(converted, imagePath);

  const sidecarPath = path.join(outputDir, `${bidsName}${SIDECAR_EXTENSION}`);
  writeSidecar(sidecarPath, buildSidecar({ scan, entities, header, xml, conversionDate }));
  const artifacts: OutputArtifact[] = [{ imagePath, sidecarPath }];
  context.writtenNames.add(bidsName);

  if (entities.modality === 'fmap' && options.extractFieldmapMagnitude) {
    const magnitudeEntities: BidsEntities = { ...entities, suffix: 'magnitude1' };
    try {
      const sidecar = buildSidecar({ scan, entities: magnitudeEntities, header, xml, conversionDate });
      const magnitude = writeMagnitude(scan, magnitudeEntities, imagePath, sidecar, context);
      if (magnitude) {
        artifacts.push(magnitude);
      }
    } catch (e) {
      logger.error(`Magnitude extraction failed for ${path.basename(scan.parPath)}: ${toError(e).message}`);
    }
  }

  return artifacts;
}

function assertNameAvailable(bidsName: string, parPath: string, context: SubjectContext): void {
  if (context.writtenNames.has(bidsName)) {
    throw createConversionError(
      `Output name ${bidsName} was already written by an earlier scan of ${context.subjectId}`,
      'OutputNameCollision',
      parPath
    );
  }
}

/**
 * Rename the converter output to its BIDS path, compressing `.nii` files
 */
function moveAsCompressed(source: string, target: string): void {
  if (source.endsWith('.gz')) {
    fs.renameSync(source, target);
    return;
  }
  fs.writeFileSync(target, gzipSync(fs.readFileSync(source)));
  fs.unlinkSync(source);
}

function writeMagnitude(
  scan: ScanInfo,
  entities: BidsEntities,
  phasediffPath: string,
  sidecar: Sidecar,
  context: SubjectContext
): OutputArtifact | null {
  const { logger, outputDir } = context;
  const magnitudeName = formatBidsName(entities);
  assertNameAvailable(magnitudeName, scan.parPath, context);
  const imagePath = path.join(outputDir, `${magnitudeName}${NIFTI_EXTENSION}`);

  const extraction = extractFieldmapMagnitude(scan.parPath, phasediffPath, imagePath);
  if (!extraction) {
    logger.info(`No magnitude images listed in ${path.basename(scan.parPath)}; skipping magnitude1`);
    return null;
  }
  logger.debug(
    `Fieldmap slots: ${extraction.slots.magnitude} magnitude, ${extraction.slots.phaseDifference} phase difference`
  );

  const sidecarPath = path.join(outputDir, `${magnitudeName}${SIDECAR_EXTENSION}`);
  writeSidecar(sidecarPath, sidecar);
  context.writtenNames.add(magnitudeName);
  return { imagePath, sidecarPath };
}

export function summarize(subjects: SubjectReport[]): ConversionReport {
  let converted = 0;
  let failed = 0;
  let skipped = 0;
  for (const subject of subjects) {
    if (subject.error) failed++;
    for (const outcome of subject.outcomes) {
      if (outcome.status === 'converted') converted++;
      else if (outcome.status === 'failed') failed++;
      else skipped++;
    }
  }
  return { subjects, converted, failed, skipped };
}

export function isMissingDataDirectory(error: unknown): error is ParRecError {
  return error instanceof ParRecError && error.kind === 'MissingInput';
}
