/**
 * Extract Orchestrator - Writes the members of a FAR archive to a directory
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, isAbsolute, relative, resolve, sep } from 'node:path';
import { FarBinary } from './far-binary.js';
import type { FarArchive } from './types/far-archive.js';
import type { FarFile } from './types/far-file.js';

export class ExtractError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'ExtractError';
  }
}

/**
 * Resolve a member's destination, refusing names that leave the output directory.
 */
function resolveMemberPath(outputDir: string, name: string): string {
  const target = resolve(outputDir, name);
  const rel = relative(outputDir, target);
  if (name.length === 0 || isAbsolute(name) || rel.length === 0 || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    throw new ExtractError(`Refusing to extract "${name}" outside ${outputDir}`);
  }
  return target;
}

/**
 * Hydrate an archive and write all or the selected members under `outputDir`.
 *
 * @param names - Members to extract; all when omitted or empty
 * @returns Paths of the written files, in manifest order
 * @throws ExtractError if the archive is invalid, a requested name is missing, or a member name is unsafe
 */
export async function extractArchive({
  inputFile,
  outputDir,
  names = [],
}: {
  readonly inputFile: string;
  readonly outputDir: string;
  readonly names?: readonly string[];
}): Promise<string[]> {
  try {
    const loaded = await FarBinary.read({ filePath: inputFile });
    const archive: FarArchive = FarBinary.hydrate({ archive: loaded.archive, buffer: loaded.buffer });

    const known = new Set(archive.files.map((file: FarFile) => file.name));
    const missing = names.filter((name: string) => !known.has(name));
    if (missing.length > 0) {
      throw new ExtractError(`Not found in archive: ${missing.join(', ')}`);
    }

    const wanted = new Set(names);
    const selected = archive.files.filter((file: FarFile) => wanted.size === 0 || wanted.has(file.name));
    const root = resolve(outputDir);
    const targets = selected.map((file: FarFile) => resolveMemberPath(root, file.name));

    const written: string[] = [];
    for (let i = 0; i < selected.length; i++) {
      await mkdir(dirname(targets[i]), { recursive: true });
      await writeFile(targets[i], selected[i].data);
      written.push(targets[i]);
    }
    return written;
  } catch (error) {
    if (error instanceof ExtractError) {
      throw error;
    }
    throw new ExtractError(
      `Failed to extract "${inputFile}": ${error instanceof Error ? error.message : String(error)}`,
      error
    );
  }
}
