/**
 * Conversion Invoker
 *
 * Pixel data decoding is delegated to an external PAR/REC to NIfTI tool.
 * `ImageConverter` is the seam tests replace with an in-process fake.
 */

import { spawn } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';
import { createConversionError, ExternalToolError, toError } from './errors.js';

export interface ImageConverter {
  /**
   * Convert `inputPath` into `outputDir` and return the written image path
   */
  convert(inputPath: string, outputDir: string): Promise<string>;
}

export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export type CommandRunner = (command: string, args: readonly string[]) => Promise<CommandResult>;

/**
 * Run a command to completion, capturing its output
 */
export const spawnCommand: CommandRunner = (command, args) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    let stdout = '';
    let stderr = '';

    child.stdout.setEncoding('utf8').on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.setEncoding('utf8').on('data', (chunk: string) => {
      stderr += chunk;
    });
    child.on('error', reject);
    child.on('close', (exitCode) => resolve({ exitCode, stdout, stderr }));
  });

/**
 * Find the converter's output, with or without the `.gz` extension
 */
export function resolveConvertedImage(outputDir: string, stem: string): string | null {
  for (const candidate of [`${stem}.nii.gz`, `${stem}.nii`]) {
    const fullPath = path.join(outputDir, candidate);
    if (fs.existsSync(fullPath)) {
      return fullPath;
    }
  }
  return null;
}

export interface Parrec2NiiOptions {
  command?: string;
  runner?: CommandRunner;
}

/**
 * `parrec2nii` invoked with overwrite, compression and header embedding
 */
export class Parrec2NiiConverter implements ImageConverter {
  private readonly command: string;
  private readonly runner: CommandRunner;

  constructor(options: Parrec2NiiOptions = {}) {
    this.command = options.command ?? 'parrec2nii';
    this.runner = options.runner ?? spawnCommand;
  }

  buildArgs(inputPath: string, outputDir: string): string[] {
    return ['--overwrite', '--output-dir', outputDir, '--compressed', '--store-header', inputPath];
  }

  async convert(inputPath: string, outputDir: string): Promise<string> {
    let result: CommandResult;
    try {
      result = await this.runner(this.command, this.buildArgs(inputPath, outputDir));
    } catch (e) {
      const cause = toError(e);
      throw new ExternalToolError(
        `Could not run ${this.command}: ${cause.message}`,
        inputPath,
        null,
        '',
        cause
      );
    }

    if (result.exitCode !== 0) {
      throw new ExternalToolError(
        `${this.command} exited with code ${result.exitCode}`,
        inputPath,
        result.exitCode,
        result.stderr.trim()
      );
    }

    const stem = path.basename(inputPath, path.extname(inputPath));
    const image = resolveConvertedImage(outputDir, stem);
    if (!image) {
      throw createConversionError(
        `${this.command} reported success but wrote no ${stem}.nii(.gz)`,
        'PostConversionFileMissing',
        inputPath
      );
    }
    return image;
  }
}
