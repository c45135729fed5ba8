#!/usr/bin/env node
/**
 * FAR Archive Tools - CLI Interface
 *
 * Command-line interface for packing, listing, extracting and verifying FAR archives.
 */

import { Command } from 'commander';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { FarBinary } from './far-binary.js';
import { packFiles } from './pack.js';
import { listArchive } from './list.js';
import { extractArchive } from './extract.js';

const program = new Command();

// Version is set at build time
const version = '0.1.0';

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

program
  .name('far-tools')
  .description('Byte-exact FAR archive packing and extraction')
  .version(version);

program
  .command('pack')
  .description('Pack files and directories into a FAR archive')
  .argument('<output-file>', 'Path where the archive will be written')
  .argument('<inputs...>', 'Files, or directories whose files are packed')
  .action(async (outputFile: string, inputs: string[]) => {
    try {
      console.log(`Packing ${inputs.length} input(s) into: ${outputFile}`);
      console.log('');

      const result = await packFiles({
        inputPaths: inputs.map((input: string) => resolve(input)),
        outputFile: resolve(outputFile),
      });

      console.log('');
      console.log(`✅ Packed ${result.fileCount} file(s), ${result.totalSize} bytes`);

    } catch (error) {
      console.error('❌ Pack failed:', describeError(error));
      process.exit(1);
    }
  });

program
  .command('list')
  .description('List the files stored in a FAR archive')
  .argument('<archive>', 'Path to the archive')
  .option('--hashes', 'Also print the SHA256 of each file')
  .action(async (archivePath: string, options: { hashes?: boolean }) => {
    try {
      const listing = await listArchive({ inputFile: resolve(archivePath), hashes: options.hashes === true });

      console.log(`${listing.filePath} (version ${listing.version}, ${listing.totalSize} bytes)`);
      console.log(`SHA256: ${listing.sha256}`);
      console.log('');
      for (const entry of listing.entries) {
        const hash = entry.sha256 ? `  ${entry.sha256}` : '';
        console.log(`${String(entry.size).padStart(10)}  @${String(entry.offset).padEnd(10)}  ${entry.name}${hash}`);
      }
      console.log('');
      console.log(`${listing.entries.length} file(s)`);

    } catch (error) {
      console.error('❌ List failed:', describeError(error));
      process.exit(1);
    }
  });

program
  .command('extract')
  .description('Extract all or selected files from a FAR archive')
  .argument('<archive>', 'Path to the archive')
  .argument('<output-dir>', 'Directory where files will be written')
  .argument('[names...]', 'Names of the files to extract (default: all)')
  .action(async (archivePath: string, outputDir: string, names: string[]) => {
    try {
      console.log(`Extracting archive: ${archivePath}`);
      console.log(`Output will be written to: ${outputDir}`);
      console.log('');

      const written = await extractArchive({
        inputFile: resolve(archivePath),
        outputDir: resolve(outputDir),
        names,
      });

      for (const filePath of written) {
        console.log(`  - ${filePath}`);
      }
      console.log('');
      console.log(`✅ Extracted ${written.length} file(s)`);

    } catch (error) {
      console.error('❌ Extract failed:', describeError(error));
      process.exit(1);
    }
  });

program
  .command('verify')
  .description('Check that each archive decodes and that every file lies within it')
  .argument('<archives...>', 'Paths to the archives to check')
  .action(async (archivePaths: string[]) => {
    let failures = 0;
    for (const archivePath of archivePaths) {
      try {
        const buffer = await readFile(resolve(archivePath));
        const archive = FarBinary.decode({ buffer });
        FarBinary.hydrate({ archive, buffer });
        console.log(`✅ ${archivePath}: ${archive.entries.length} file(s), version ${archive.version}`);
      } catch (error) {
        failures += 1;
        console.error(`❌ ${archivePath}:`, describeError(error));
      }
    }
    if (failures > 0) {
      process.exit(1);
    }
  });

program.parse();
