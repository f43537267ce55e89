import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { gzipSync } from 'zlib';
import type { ImageConverter } from '../../src/core/converter.js';
import { ExternalToolError } from '../../src/core/errors.js';

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'parrec-bids-'));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * PAR text with a general information block and an image information table
 * whose 5th column holds the given image-type codes
 */
export function buildParText(general: Record<string, string>, imageTypes: number[] = []): string {
  const lines = [
    '# === DATA DESCRIPTION FILE ======================================================',
    '#',
    '# === GENERAL INFORMATION ========================================================',
    '#',
  ];
  for (const [label, value] of Object.entries(general)) {
    lines.push(`.    ${label.padEnd(35)}:   ${value}`);
  }
  lines.push(
    '#',
    '# === IMAGE INFORMATION DEFINITION =============================================',
    '#  The rest of this file contains ONE line per image',
    '#  image type mr      (integer)',
    '#',
    '# === IMAGE INFORMATION ==========================================================',
    '#  sl ec  dyn ph ty    idx pix scan% rec size',
    '#'
  );
  imageTypes.forEach((type, index) => {
    lines.push(`  ${index + 1}   1    1  1 ${type} 2 ${index} 16 100 64 64`);
  });
  lines.push('', '# === END OF DATA DESCRIPTION FILE ===============================================', '');
  return lines.join('\n');
}

const NIFTI1_HEADER_SIZE = 348;
const NIFTI1_VOX_OFFSET = 352;

/**
 * Uncompressed little-endian NIfTI-1 image of int16 voxels. Every voxel of
 * volume `v` holds the value `v + 1`.
 */
export function createNifti(dims: number[]): Buffer {
  const [x, y, z, t] = [dims[0] ?? 1, dims[1] ?? 1, dims[2] ?? 1, dims[3] ?? 1];
  const voxelsPerVolume = x * y * z;
  const buffer = Buffer.alloc(NIFTI1_VOX_OFFSET + voxelsPerVolume * t * 2);

  buffer.writeInt32LE(NIFTI1_HEADER_SIZE, 0);
  buffer.writeUInt8('r'.charCodeAt(0), 38);
  const dim = [dims.length, ...dims];
  for (let i = 0; i < 8; i++) {
    buffer.writeInt16LE(dim[i] ?? 0, 40 + i * 2);
  }
  buffer.writeInt16LE(4, 70); // int16
  buffer.writeInt16LE(16, 72);
  for (let i = 0; i < 8; i++) {
    buffer.writeFloatLE(1, 76 + i * 4);
  }
  buffer.writeFloatLE(NIFTI1_VOX_OFFSET, 108);
  buffer.writeFloatLE(1, 112);
  buffer.write('n+1\0', 344, 'latin1');

  for (let v = 0; v < t; v++) {
    for (let i = 0; i < voxelsPerVolume; i++) {
      buffer.writeInt16LE(v + 1, NIFTI1_VOX_OFFSET + (v * voxelsPerVolume + i) * 2);
    }
  }
  return buffer;
}

export function readDims(nifti: Buffer): number[] {
  return Array.from({ length: 8 }, (_, i) => nifti.readInt16LE(40 + i * 2));
}

/**
 * In-process stand-in for parrec2nii: writes a synthetic gzip image named
 * after the PAR file, or fails for the listed file names
 */
export class FakeConverter implements ImageConverter {
  readonly calls: string[] = [];

  constructor(
    private readonly dims: number[] = [2, 2, 1, 16],
    private readonly failing: ReadonlySet<string> = new Set()
  ) {}

  async convert(inputPath: string, outputDir: string): Promise<string> {
    const name = path.basename(inputPath);
    this.calls.push(name);
    if (this.failing.has(name)) {
      throw new ExternalToolError('parrec2nii exited with code 1', inputPath, 1, 'corrupt REC file');
    }
    const output = path.join(outputDir, `${path.basename(name, path.extname(name))}.nii.gz`);
    fs.writeFileSync(output, gzipSync(createNifti(this.dims)));
    return output;
  }
}
