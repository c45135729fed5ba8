/**
 * Pack Orchestrator - Builds a FAR archive from files on disk
 *
 * Inputs may be files or directories; a directory contributes the regular files
 * directly inside it. Members are named by their base name.
 */

import { readdir, readFile, stat } from 'node:fs/promises';
import { basename, resolve } from 'node:path';
import { FarBinary } from './far-binary.js';
import type { FarArchive } from './types/far-archive.js';
import type { FarFile } from './types/far-file.js';

export class PackError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'PackError';
  }
}

export interface PackResult {
  readonly outputFile: string;
  readonly fileCount: number;
  readonly totalSize: number;
}

/**
 * Enumerate the regular files directly inside a directory, sorted by name.
 */
async function enumerateDirectoryFiles(directoryPath: string): Promise<string[]> {
  const entries = await readdir(directoryPath, { withFileTypes: true });

  const files: string[] = [];
  for (const entry of entries) {
    if (entry.isFile()) {
      files.push(resolve(directoryPath, entry.name));
    }
  }

  return files.sort();
}

/**
 * Expand input paths into the ordered list of files to pack.
 */
async function collectInputFiles(inputPaths: readonly string[]): Promise<string[]> {
  const files: string[] = [];
  for (const inputPath of inputPaths) {
    const info = await stat(inputPath);
    if (info.isDirectory()) {
      files.push(...await enumerateDirectoryFiles(inputPath));
    } else if (info.isFile()) {
      files.push(resolve(inputPath));
    } else {
      throw new PackError(`Not a file or directory: ${inputPath}`);
    }
  }
  return files;
}

/**
 * Pack files into a FAR archive, in input order.
 *
 * @param inputPaths - Files and directories to pack
 * @param outputFile - Path where the archive will be written
 * @throws PackError if an input cannot be read, two members share a name, or the archive cannot be written
 */
export async function packFiles({ inputPaths, outputFile }: { readonly inputPaths: readonly string[]; readonly outputFile: string }): Promise<PackResult> {
  try {
    const filePaths = await collectInputFiles(inputPaths);

    const seen = new Map<string, string>();
    const files: FarFile[] = [];
    for (const filePath of filePaths) {
      const name = basename(filePath);
      const previous = seen.get(name);
      if (previous) {
        throw new PackError(`Duplicate member name "${name}" from ${previous} and ${filePath}`);
      }
      seen.set(name, filePath);

      const data = await readFile(filePath);
      files.push(FarBinary.createFile({ name, data }));
      console.log(`  + ${name} (${data.length} bytes)`);
    }

    const archive: FarArchive = FarBinary.build({ files });
    const totalSize = await FarBinary.write({ archive, outputPath: outputFile });

    return { outputFile, fileCount: files.length, totalSize };
  } catch (error) {
    if (error instanceof PackError) {
      throw error;
    }
    throw new PackError(
      `Failed to pack "${outputFile}": ${error instanceof Error ? error.message : String(error)}`,
      error
    );
  }
}
