import * as fs from 'fs';
import { parse as parseJsonc, printParseErrorCode, type ParseError } from 'jsonc-parser';
import { DEFAULT_JPEG_QUALITY } from './image-processor';

// Settings that may live in a JSONC file next to the images
export interface FileConfig {
  suffix?: string;
  jpegQuality?: number;
}

export interface ProcessOptions {
  suffix: string;
  jpegQuality: number;
  verbose: boolean;
  quiet: boolean;
}

export const DEFAULT_OPTIONS: Readonly<ProcessOptions> = Object.freeze({
  suffix: '_clean',
  jpegQuality: DEFAULT_JPEG_QUALITY,
  verbose: false,
  quiet: false,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseConfig(content: string): FileConfig {
  const errors: ParseError[] = [];
  const raw: unknown = parseJsonc(content, errors, { allowTrailingComma: true });

  if (errors.length > 0) {
    const first = errors[0];
    throw new Error(`Invalid config: ${printParseErrorCode(first.error)} at offset ${first.offset}`);
  }
  if (!isRecord(raw)) {
    throw new Error('Invalid config: expected an object');
  }

  const config: FileConfig = {};

  if (raw.suffix !== undefined) {
    if (typeof raw.suffix !== 'string' || raw.suffix === '') {
      throw new Error('Invalid config: "suffix" must be a non-empty string');
    }
    config.suffix = raw.suffix;
  }

  if (raw.jpegQuality !== undefined) {
    const quality = raw.jpegQuality;
    if (typeof quality !== 'number' || !Number.isInteger(quality) || quality < 1 || quality > 100) {
      throw new Error('Invalid config: "jpegQuality" must be an integer from 1 to 100');
    }
    config.jpegQuality = quality;
  }

  return config;
}

export function readConfig(filepath: string): FileConfig {
  const content = fs.readFileSync(filepath, 'utf-8');
  return parseConfig(content);
}

/**
 * Defaults, then the config file, then explicit command-line flags.
 */
export function resolveOptions(
  flags: Partial<ProcessOptions>,
  fileConfig: FileConfig = {}
): ProcessOptions {
  return {
    suffix: flags.suffix ?? fileConfig.suffix ?? DEFAULT_OPTIONS.suffix,
    jpegQuality: flags.jpegQuality ?? fileConfig.jpegQuality ?? DEFAULT_OPTIONS.jpegQuality,
    verbose: flags.verbose ?? DEFAULT_OPTIONS.verbose,
    quiet: flags.quiet ?? DEFAULT_OPTIONS.quiet,
  };
}
