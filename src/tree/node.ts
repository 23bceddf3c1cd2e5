import { TreeFrozenError } from '../shared/errors.js';

/**
 * Generic tree element: a tag, ordered string attributes and ordered children.
 *
 * Attribute order is significant -- the encoder writes attributes in
 * insertion order. Re-setting an existing attribute keeps its position.
 */
export class AttributedNode {
  readonly tag: string;
  private readonly attrs = new Map<string, string>();
  private readonly kids: AttributedNode[] = [];
  private frozen = false;

  constructor(tag: string, attributes: Iterable<readonly [string, string]> = []) {
    this.tag = tag;
    for (const [name, value] of attributes) {
      this.attrs.set(name, value);
    }
  }

  get attributes(): ReadonlyMap<string, string> {
    return this.attrs;
  }

  get children(): readonly AttributedNode[] {
    return this.kids;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  getAttribute(name: string): string | undefined {
    return this.attrs.get(name);
  }

  setAttribute(name: string, value: string): this {
    this.assertMutable();
    this.attrs.set(name, value);
    return this;
  }

  appendChild(child: AttributedNode): AttributedNode {
    this.assertMutable();
    this.kids.push(child);
    return child;
  }

  /**
   * Creates a node, appends it as the last child and returns it.
   */
  createChild(tag: string, attributes: Iterable<readonly [string, string]> = []): AttributedNode {
    return this.appendChild(new AttributedNode(tag, attributes));
  }

  /**
   * Freezes this node and its whole subtree. Mutators throw afterwards.
   */
  freeze(): this {
    if (this.frozen) {
      return this;
    }
    this.frozen = true;
    for (const child of this.kids) {
      child.freeze();
    }
    return this;
  }

  private assertMutable(): void {
    if (this.frozen) {
      throw new TreeFrozenError(this.tag);
    }
  }
}

/**
 * Counts every node in a subtree, the root included.
 */
export function countNodes(node: AttributedNode): number {
  let total = 1;
  for (const child of node.children) {
    total += countNodes(child);
  }
  return total;
}
