/**
 * Command definitions for the pbo-tools CLI.
 */

import { Command } from 'commander';
import { basename, dirname, extname, join, resolve } from 'node:path';
import { createArchive } from './pack.js';
import { extractArchive } from './unpack.js';
import { listArchive } from './metadata.js';
import type { PboArchiveInfo } from './types/pbo-archive-structure.js';
import type { PboLogger, ProgressReporter } from './types/operation.js';

// Version is set at build time
const version = '0.1.0';

/** `<dir>.pbo` beside the source directory. */
export function defaultArchivePath(sourceDir: string): string {
  return `${resolve(sourceDir)}.pbo`;
}

/** Directory beside the archive, named after it without its extension. */
export function defaultExtractDir(archiveFile: string): string {
  const resolved = resolve(archiveFile);
  return join(dirname(resolved), basename(resolved, extname(resolved)));
}

function formatTimestamp(timestamp: number): string {
  return new Date(timestamp * 1000).toISOString().replace('T', ' ').replace('.000Z', '');
}

/**
 * Renders the `list` output: optional product and properties, one line per entry, a summary.
 */
export function formatArchiveListing(info: PboArchiveInfo): string[] {
  const lines: string[] = [];
  if (info.productName.length > 0) {
    lines.push(`Product: ${info.productName}`);
  }
  for (const [key, value] of Object.entries(info.properties)) {
    lines.push(`Property: ${key}=${value}`);
  }
  for (const entry of info.entries) {
    lines.push(`${String(entry.dataSize).padStart(10)}  ${formatTimestamp(entry.timestamp)}  ${entry.name}`);
  }
  lines.push(`${info.entries.length} entries, ${info.payloadSize} bytes`);
  return lines;
}

/**
 * Builds the CLI. All output goes through `logger`; failures go through
 * commander's `error()`, which prints to stderr and exits with status 1.
 */
export function createProgram({ logger = console }: { readonly logger?: PboLogger } = {}): Command {
  const program = new Command();

  program
    .name('pbo-tools')
    .description('Pack directories into stored PBO archives and extract them again')
    .version(version)
    .option('-q, --quiet', 'Suppress per-file progress output');

  const progressReporter = (): ProgressReporter | undefined => {
    const { quiet } = program.opts<{ quiet?: boolean }>();
    return quiet ? undefined : (message: string) => logger.log(`  ${message}`);
  };

  const fail = (operation: string, error: unknown): never =>
    program.error(`❌ ${operation} failed: ${error instanceof Error ? error.message : String(error)}`, { exitCode: 1 });

  program
    .command('pack')
    .description('Pack every file under a directory into a PBO archive')
    .argument('<source-dir>', 'Directory to pack')
    .argument('[output-file]', 'Archive to write (default: <source-dir>.pbo)')
    .option('--prefix <prefix>', 'Write a "prefix" header property')
    .action(async (sourceDir: string, outputFile: string | undefined, options: { prefix?: string }) => {
      try {
        const target = outputFile ? resolve(outputFile) : defaultArchivePath(sourceDir);
        const count = await createArchive(resolve(sourceDir), target, {
          logger,
          onProgress: progressReporter(),
          properties: options.prefix !== undefined ? { prefix: options.prefix } : undefined,
        });
        logger.log(`✅ Packed ${count} files into ${target}`);
      } catch (error) {
        fail('Pack', error);
      }
    });

  program
    .command('unpack')
    .description('Extract a PBO archive into a directory')
    .argument('<archive>', 'Archive to extract')
    .argument('[output-dir]', 'Destination directory (default: beside the archive, named after it)')
    .action(async (archive: string, outputDir: string | undefined) => {
      try {
        const target = outputDir ? resolve(outputDir) : defaultExtractDir(archive);
        const count = await extractArchive(resolve(archive), target, {
          logger,
          onProgress: progressReporter(),
        });
        logger.log(`✅ Extracted ${count} files into ${target}`);
      } catch (error) {
        fail('Unpack', error);
      }
    });

  program
    .command('list')
    .description('List the entries of a PBO archive')
    .argument('<archive>', 'Archive to inspect')
    .action(async (archive: string) => {
      try {
        const info = await listArchive(archive);
        for (const line of formatArchiveListing(info)) {
          logger.log(line);
        }
      } catch (error) {
        fail('List', error);
      }
    });

  return program;
}
