import { buildObjects } from '../parsing/document-builder.js';
import { debug } from '../shared/debug.js';
import { TreeFrozenError } from '../shared/errors.js';
import { AttributedNode } from './node.js';

export const ROOT_TAG = 'root';

/**
 * Owns the shared root node that every parsed document appends to.
 *
 * Lifecycle: create once, add documents during discovery, freeze before
 * encoding. Documents are appended in the order `addDocument` is called.
 */
export class DocumentTree {
  readonly root: AttributedNode = new AttributedNode(ROOT_TAG);
  private documentCount = 0;
  private skippedCount = 0;

  get documentsAdded(): number {
    return this.documentCount;
  }

  get documentsSkipped(): number {
    return this.skippedCount;
  }

  get objectCount(): number {
    return this.root.children.length;
  }

  /**
   * Parses one document and appends its objects to the root.
   *
   * @returns Number of `object` nodes appended (0 when the document has no title)
   */
  addDocument(markdown: string, sourceFile: string): number {
    if (this.root.isFrozen) {
      throw new TreeFrozenError(ROOT_TAG);
    }
    const created = buildObjects(this.root, markdown, sourceFile);
    if (created === 0) {
      this.skippedCount++;
    } else {
      this.documentCount++;
    }
    return created;
  }

  /**
   * Freezes the tree and returns its root, ready for encoding.
   */
  freeze(): AttributedNode {
    this.root.freeze();
    debug('tree', 'Tree frozen', {
      documents: this.documentCount,
      skipped: this.skippedCount,
      objects: this.objectCount,
    });
    return this.root;
  }
}
