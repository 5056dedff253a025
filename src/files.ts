import * as fs from 'fs';
import * as path from 'path';
import fg from 'fast-glob';

const SUPPORTED_EXTENSIONS = ['.png', '.jpg', '.jpeg'];

export function isSupportedImage(filename: string): boolean {
  return SUPPORTED_EXTENSIONS.includes(path.extname(filename).toLowerCase());
}

export function isGlobPattern(input: string): boolean {
  return /[*?[]/.test(input);
}

// Earlier output carries the suffix somewhere in its name; never reprocess it
export function hasOutputSuffix(filename: string, suffix: string): boolean {
  if (suffix === '') return false;
  return path.basename(filename).toLowerCase().includes(suffix.toLowerCase());
}

function isCandidate(filepath: string, suffix: string): boolean {
  return isSupportedImage(filepath) && !hasOutputSuffix(filepath, suffix);
}

/**
 * Supported images directly inside `dir`, sorted by name. Subdirectories are
 * not descended into.
 */
export async function findImageFiles(dir: string, suffix: string): Promise<string[]> {
  const entries = await fs.promises.readdir(dir, { withFileTypes: true });

  return entries
    .filter((entry) => entry.isFile() && isCandidate(entry.name, suffix))
    .map((entry) => path.join(dir, entry.name))
    .sort();
}

export async function expandGlob(pattern: string, suffix: string): Promise<string[]> {
  const matches = await fg(pattern, { onlyFiles: true, dot: false });
  return matches.filter((match) => isCandidate(match, suffix)).sort();
}

export interface ResolvedInputs {
  files: string[];
  // True when at least one input was a directory or a glob
  scanned: boolean;
}

/**
 * Turn positional arguments into a list of files. Globs are expanded,
 * directories scanned, anything else is taken as a file path as given.
 */
export async function resolveInputs(inputs: string[], suffix: string): Promise<ResolvedInputs> {
  const files: string[] = [];
  let scanned = false;

  for (const input of inputs) {
    if (isGlobPattern(input)) {
      scanned = true;
      files.push(...(await expandGlob(input, suffix)));
      continue;
    }

    const stats = await fs.promises.stat(input);
    if (stats.isDirectory()) {
      scanned = true;
      files.push(...(await findImageFiles(input, suffix)));
    } else {
      files.push(input);
    }
  }

  return { files: Array.from(new Set(files)), scanned };
}

// "path/to/photo.png" + "_clean" -> "path/to/photo_clean.png"
export function generateOutputPath(inputPath: string, suffix: string): string {
  const dir = path.dirname(inputPath);
  const ext = path.extname(inputPath);
  const base = path.basename(inputPath, ext);
  return path.join(dir, `${base}${suffix}${ext}`);
}
