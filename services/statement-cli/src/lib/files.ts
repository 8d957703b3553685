/**
 * Input File Collection
 *
 * Resolves the PDF statements named on the command line: every `.pdf` file
 * directly inside `--dir` (any case, sorted by name) followed by the
 * positional paths that exist.
 */

import fs from 'fs';
import path from 'path';

export interface FileSelection {
  files: string[];
  /** Positional paths that do not exist */
  missing: string[];
}

export function isPdfFile(fileName: string): boolean {
  return path.extname(fileName).toLowerCase() === '.pdf';
}

/**
 * @throws Error when `dir` is given but is not a directory
 */
export function listPdfFiles(dir: string): string[] {
  if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
    throw new Error(`Directory not found: ${dir}`);
  }

  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && isPdfFile(entry.name))
    .map((entry) => entry.name)
    .sort()
    .map((name) => path.join(dir, name));
}

export function collectPdfFiles(paths: readonly string[], dir?: string): FileSelection {
  const files = dir ? listPdfFiles(dir) : [];
  const missing: string[] = [];

  for (const filePath of paths) {
    if (fs.existsSync(filePath)) {
      files.push(filePath);
    } else {
      missing.push(filePath);
    }
  }

  return { files, missing };
}
