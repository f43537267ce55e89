/**
 * Fieldmap Extractor
 *
 * A B0 fieldmap acquisition stores magnitude and phase-difference images in
 * one REC file. The image information table of the PAR file tags each slot
 * with an image-type code; the converted 4-D image is cut down to the first
 * N volumes, where N is the number of magnitude-coded slots.
 */

import * as fs from 'fs';
import { gunzipSync, gzipSync } from 'zlib';
import * as nifti from 'nifti-reader-js';
import { createConversionError, toError } from './errors.js';
import { parseImageTypeCodes } from './headerParser.js';

export const FIELDMAP_IMAGE_TYPE = {
  magnitude: 0,
  phaseDifference: 18,
} as const;

export interface FieldmapSlots {
  magnitude: number;
  phaseDifference: number;
}

const NIFTI1_DIM_OFFSET = 40;
const NIFTI2_DIM_OFFSET = 16;

export function countFieldmapSlots(codes: readonly number[]): FieldmapSlots {
  let magnitude = 0;
  let phaseDifference = 0;
  for (const code of codes) {
    if (code === FIELDMAP_IMAGE_TYPE.magnitude) magnitude++;
    else if (code === FIELDMAP_IMAGE_TYPE.phaseDifference) phaseDifference++;
  }
  return { magnitude, phaseDifference };
}

function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const buffer = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(buffer).set(bytes);
  return buffer;
}

/**
 * Keep the first `volumeCount` volumes of a NIfTI image (plain or gzip).
 * Single-volume images pass through unchanged. Returns gzip-compressed
 * NIfTI bytes, or null when `volumeCount` is zero.
 */
export function extractMagnitudeVolumes(image: Uint8Array, volumeCount: number): Buffer | null {
  if (volumeCount <= 0) return null;

  let data = toArrayBuffer(image);
  if (nifti.isCompressed(data)) {
    data = toArrayBuffer(gunzipSync(image));
  }

  const header = nifti.isNIFTI(data) ? nifti.readHeader(data) : null;
  if (!header) {
    throw new Error('Not a NIfTI image');
  }

  const dims = header.dims;
  const volumes = dims[0] >= 4 ? dims[4] : 1;
  if (volumes <= 1) {
    return gzipSync(new Uint8Array(data));
  }

  const keep = Math.min(volumeCount, volumes);
  const voxelsPerVolume = dims[1] * Math.max(dims[2], 1) * Math.max(dims[3], 1);
  const bytesPerVolume = (voxelsPerVolume * header.numBitsPerVoxel) / 8;
  const imageData = new Uint8Array(nifti.readImage(header, data));
  const voxOffset = Math.floor(header.vox_offset);

  const output = new Uint8Array(voxOffset + keep * bytesPerVolume);
  output.set(new Uint8Array(data, 0, voxOffset));
  output.set(imageData.subarray(0, keep * bytesPerVolume), voxOffset);

  const view = new DataView(output.buffer);
  const newDims = [...dims];
  newDims[4] = keep;
  if (keep === 1) {
    newDims[0] = 3;
  }
  for (let i = 0; i < 8; i++) {
    const value = newDims[i] ?? 0;
    if (header instanceof nifti.NIFTI2) {
      view.setBigInt64(NIFTI2_DIM_OFFSET + i * 8, BigInt(value), header.littleEndian);
    } else {
      view.setInt16(NIFTI1_DIM_OFFSET + i * 2, value, header.littleEndian);
    }
  }

  return gzipSync(output);
}

export interface MagnitudeExtraction {
  slots: FieldmapSlots;
  outputPath: string;
}

/**
 * Write the magnitude sub-volume of a converted fieldmap. Returns null when
 * the PAR file lists no magnitude slots.
 */
export function extractFieldmapMagnitude(
  parPath: string,
  convertedImagePath: string,
  outputPath: string
): MagnitudeExtraction | null {
  let slots: FieldmapSlots;
  try {
    slots = countFieldmapSlots(parseImageTypeCodes(fs.readFileSync(parPath, 'latin1')));
  } catch (e) {
    throw createConversionError('Cannot read PAR image table', 'MissingInput', parPath, toError(e));
  }
  if (slots.magnitude === 0) return null;

  const magnitude = extractMagnitudeVolumes(fs.readFileSync(convertedImagePath), slots.magnitude);
  if (!magnitude) return null;

  fs.writeFileSync(outputPath, magnitude);
  return { slots, outputPath };
}
