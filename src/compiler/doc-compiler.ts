/**
 * Documentation compiler.
 *
 * Reads every documentation file, builds one tree, then writes the binary
 * value-tree blob and (optionally) the XML rendering. The whole tree is
 * built before anything is encoded, and each output is written in one go.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { decodeTree } from '../codec/tree-decoder.js';
import { encodeTree } from '../codec/tree-encoder.js';
import { discoverDocFiles } from '../discovery/doc-files.js';
import { renderMarkup } from '../output/markup.js';
import { debug, debugTimed } from '../shared/debug.js';
import { DocbinError } from '../shared/errors.js';
import type { CompileStats, CompilerConfig } from '../shared/types.js';
import { DocumentTree } from '../tree/document-tree.js';
import { countNodes, type AttributedNode } from '../tree/node.js';

export class DocCompiler {
  private readonly config: CompilerConfig;

  constructor(config: CompilerConfig) {
    this.config = config;
  }

  /**
   * Runs a full compile. Any parse or encoding error aborts the run before
   * either output file is written.
   */
  async compile(): Promise<CompileStats> {
    const files = await discoverDocFiles(this.config.docsDir);

    const tree = new DocumentTree();
    debugTimed('compile', `Parsed ${files.length} files`, () => {
      for (const file of files) {
        tree.addDocument(file.content, file.relativePath);
      }
    });
    const root = tree.freeze();
    debug('compile', 'Built tree', { nodes: countNodes(root) });

    const bytes = debugTimed('encode', 'Encoded tree', () => encodeTree(root));
    const markup = this.config.generateXml ? renderMarkup(root) : null;

    if (markup !== null) {
      await writeOutput(this.config.xmlOut, markup);
    }
    await writeOutput(this.config.binaryOut, bytes);

    if (this.config.verify) {
      await this.verify(root);
    }

    const stats: CompileStats = {
      filesProcessed: files.length,
      documentsSkipped: tree.documentsSkipped,
      objectsCreated: tree.objectCount,
      binaryBytes: bytes.length,
      binaryPath: this.config.binaryOut,
      xmlPath: markup !== null ? this.config.xmlOut : null,
      verified: this.config.verify,
    };
    debug('compile', 'Compile finished', { ...stats });
    return stats;
  }

  /**
   * Reads the written blob back and checks it describes the same objects.
   */
  private async verify(root: AttributedNode): Promise<void> {
    const written = new Uint8Array(await readFile(this.config.binaryOut));
    const decoded = decodeTree(written);
    const expected = root.children.map((object) => object.getAttribute('name') ?? '');
    const actual = decoded.children.map((object) => object.getAttribute('name') ?? '');
    if (
      decoded.tag !== root.tag ||
      expected.length !== actual.length ||
      expected.some((name, i) => name.trim() !== actual[i])
    ) {
      throw new DocbinError(`Verification of ${this.config.binaryOut} failed: decoded objects differ`, {
        expected: expected.length,
        actual: actual.length,
      });
    }
    debug('compile', 'Verified binary output', { objects: actual.length });
  }
}

async function writeOutput(path: string, data: string | Uint8Array): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, data);
  debug('compile', 'Wrote output', { path, length: data.length });
}
