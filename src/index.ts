#!/usr/bin/env node

// docbin CLI entry point
// Re-export the compiler API for library consumers
export { DocCompiler } from './compiler/doc-compiler.js';
export { DocumentTree } from './tree/document-tree.js';
export { AttributedNode } from './tree/node.js';
export { buildObjects } from './parsing/document-builder.js';
export { getSections, sectionsFromHyphens } from './parsing/sections.js';
export { encodeTree } from './codec/tree-encoder.js';
export { decodeTree } from './codec/tree-decoder.js';
export { encodeCompressedInt, readCompressedInt } from './codec/compressed-int.js';
export { renderMarkup } from './output/markup.js';
export { loadCompilerConfig } from './shared/config.js';
export * from './shared/errors.js';
export type { CompileStats, CompilerConfig } from './shared/types.js';

import { realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import { getHelpText, parseArgs } from './cli/args.js';
import { DocCompiler } from './compiler/doc-compiler.js';
import { loadCompilerConfig } from './shared/config.js';
import { debug } from './shared/debug.js';
import { errorMessage } from './shared/errors.js';

/**
 * Runs the CLI. Returns the process exit code.
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const args = parseArgs(argv);

  if (args.help) {
    process.stdout.write(getHelpText());
    return 0;
  }

  if (args.errors.length > 0) {
    for (const message of args.errors) {
      process.stderr.write(`docbin: ${message}\n`);
    }
    process.stderr.write('Run docbin --help for usage.\n');
    return 2;
  }

  try {
    const config = loadCompilerConfig({ configPath: args.configPath, overrides: args.overrides });
    debug('cli', 'Resolved config', { ...config });

    const stats = await new DocCompiler(config).compile();

    const xmlNote = stats.xmlPath ? `, XML at ${stats.xmlPath}` : '';
    process.stdout.write(
      `docbin: ${stats.objectsCreated} objects from ${stats.filesProcessed} files ` +
        `(${stats.documentsSkipped} skipped) -> ${stats.binaryPath} (${stats.binaryBytes} bytes)${xmlNote}\n`,
    );
    return 0;
  } catch (err) {
    process.stderr.write(`docbin: ${errorMessage(err)}\n`);
    return 1;
  }
}

function isEntryPoint(): boolean {
  const invoked = process.argv[1];
  if (!invoked) {
    return false;
  }
  try {
    return realpathSync(invoked) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      process.stderr.write(`docbin: ${errorMessage(err)}\n`);
      process.exitCode = 1;
    },
  );
}
