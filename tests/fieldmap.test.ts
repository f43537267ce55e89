import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { gunzipSync, gzipSync } from 'zlib';
import {
  countFieldmapSlots,
  extractFieldmapMagnitude,
  extractMagnitudeVolumes,
} from '../src/core/fieldmap.js';
import { buildParText, createNifti, makeTempDir, readDims, removeDir } from './helpers/fixtures.js';

const VOX_OFFSET = 352;
const BYTES_PER_VOLUME = 2 * 2 * 1 * 2;

const repeat = (code: number, count: number) => Array.from({ length: count }, () => code);

describe('fieldmap slot counting', () => {
  it('counts magnitude and phase-difference codes', () => {
    expect(countFieldmapSlots([0, 0, 18, 18, 18, 3])).toEqual({ magnitude: 2, phaseDifference: 3 });
    expect(countFieldmapSlots([])).toEqual({ magnitude: 0, phaseDifference: 0 });
  });
});

describe('magnitude volume extraction', () => {
  it('keeps the first N volumes and patches the time dimension', () => {
    const source = gzipSync(createNifti([2, 2, 1, 16]));

    const extracted = extractMagnitudeVolumes(source, 8);
    expect(extracted).not.toBeNull();
    const image = gunzipSync(extracted ?? Buffer.alloc(0));

    expect(readDims(image)).toEqual([4, 2, 2, 1, 8, 0, 0, 0]);
    expect(image.length).toBe(VOX_OFFSET + 8 * BYTES_PER_VOLUME);
    expect(image.readInt16LE(VOX_OFFSET)).toBe(1);
    expect(image.readInt16LE(image.length - 2)).toBe(8);
  });

  it('reads uncompressed input', () => {
    const extracted = extractMagnitudeVolumes(createNifti([2, 2, 1, 4]), 2);
    const image = gunzipSync(extracted ?? Buffer.alloc(0));

    expect(readDims(image)).toEqual([4, 2, 2, 1, 2, 0, 0, 0]);
  });

  it('drops to a 3-D image when one volume is kept', () => {
    const extracted = extractMagnitudeVolumes(createNifti([2, 2, 1, 4]), 1);
    const image = gunzipSync(extracted ?? Buffer.alloc(0));

    expect(readDims(image)).toEqual([3, 2, 2, 1, 1, 0, 0, 0]);
    expect(image.length).toBe(VOX_OFFSET + BYTES_PER_VOLUME);
  });

  it('caps N at the number of volumes present', () => {
    const extracted = extractMagnitudeVolumes(createNifti([2, 2, 1, 4]), 10);
    const image = gunzipSync(extracted ?? Buffer.alloc(0));

    expect(readDims(image)[4]).toBe(4);
  });

  it('passes a single-volume image through unchanged', () => {
    const source = createNifti([2, 2, 1]);
    const extracted = extractMagnitudeVolumes(source, 8);

    expect(gunzipSync(extracted ?? Buffer.alloc(0)).equals(source)).toBe(true);
  });

  it('returns null when there are no magnitude volumes', () => {
    expect(extractMagnitudeVolumes(createNifti([2, 2, 1, 4]), 0)).toBeNull();
  });

  it('rejects data that is not NIfTI', () => {
    expect(() => extractMagnitudeVolumes(Buffer.alloc(400), 2)).toThrow('Not a NIfTI image');
  });
});

describe('fieldmap magnitude file', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) removeDir(dir);
    dir = undefined;
  });

  it('writes the magnitude sub-volume named in the PAR image table', () => {
    dir = makeTempDir();
    const parPath = path.join(dir, 'scan.PAR');
    const imagePath = path.join(dir, 'scan.nii.gz');
    const outputPath = path.join(dir, 'sub-VA003_magnitude1.nii.gz');
    fs.writeFileSync(parPath, buildParText({ Technique: 'FFE' }, [...repeat(0, 8), ...repeat(18, 8)]));
    fs.writeFileSync(imagePath, gzipSync(createNifti([2, 2, 1, 16])));

    const result = extractFieldmapMagnitude(parPath, imagePath, outputPath);

    expect(result).toEqual({ slots: { magnitude: 8, phaseDifference: 8 }, outputPath });
    expect(readDims(gunzipSync(fs.readFileSync(outputPath)))[4]).toBe(8);
  });

  it('writes nothing when the table lists no magnitude slots', () => {
    dir = makeTempDir();
    const parPath = path.join(dir, 'scan.PAR');
    const imagePath = path.join(dir, 'scan.nii.gz');
    const outputPath = path.join(dir, 'sub-VA003_magnitude1.nii.gz');
    fs.writeFileSync(parPath, buildParText({}, repeat(18, 4)));
    fs.writeFileSync(imagePath, gzipSync(createNifti([2, 2, 1, 4])));

    expect(extractFieldmapMagnitude(parPath, imagePath, outputPath)).toBeNull();
    expect(fs.existsSync(outputPath)).toBe(false);
  });

  it('reports an unreadable PAR file as missing input', () => {
    expect(() => extractFieldmapMagnitude('/nonexistent/scan.PAR', '/nonexistent/scan.nii.gz', '/tmp/x.nii.gz')).toThrow(
      /Cannot read PAR image table \(file: \/nonexistent\/scan\.PAR\)/
    );
  });
});
