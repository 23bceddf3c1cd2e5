import { describe, it, expect } from 'vitest';
import { DocumentTree, ROOT_TAG } from '../document-tree.js';
import { AttributedNode, countNodes } from '../node.js';
import { TreeFrozenError } from '../../shared/errors.js';

describe('AttributedNode', () => {
  it('keeps attributes in insertion order', () => {
    const node = new AttributedNode('n');
    node.setAttribute('z', '1').setAttribute('a', '2').setAttribute('m', '3');
    expect([...node.attributes.keys()]).toEqual(['z', 'a', 'm']);
  });

  it('keeps the original position when an attribute is set again', () => {
    const node = new AttributedNode('n', [['first', '1'], ['second', '2']]);
    node.setAttribute('first', 'changed');
    expect([...node.attributes]).toEqual([
      ['first', 'changed'],
      ['second', '2'],
    ]);
  });

  it('appends children in order', () => {
    const node = new AttributedNode('n');
    node.createChild('a');
    node.appendChild(new AttributedNode('b'));
    node.createChild('c');
    expect(node.children.map((c) => c.tag)).toEqual(['a', 'b', 'c']);
  });

  it('rejects mutation anywhere in a frozen subtree', () => {
    const root = new AttributedNode('root');
    const leaf = root.createChild('object').createChild('methods');
    root.freeze();

    expect(leaf.isFrozen).toBe(true);
    expect(() => root.createChild('object')).toThrow(TreeFrozenError);
    expect(() => leaf.setAttribute('a', 'b')).toThrow('Cannot modify <methods>: tree is frozen');
  });

  it('counts nodes including the root', () => {
    const root = new AttributedNode('root');
    root.createChild('a').createChild('b');
    root.createChild('c');
    expect(countNodes(root)).toBe(4);
  });
});

describe('DocumentTree', () => {
  it('collects objects from every added document', () => {
    const tree = new DocumentTree();

    expect(tree.addDocument('title: one, two', 'a/one.md')).toBe(2);
    expect(tree.addDocument('description: no title here', 'a/none.md')).toBe(0);
    expect(tree.addDocument('title: three', 'b/three.md')).toBe(1);

    expect(tree.documentsAdded).toBe(2);
    expect(tree.documentsSkipped).toBe(1);
    expect(tree.objectCount).toBe(3);
    expect(tree.root.tag).toBe(ROOT_TAG);
    expect(tree.root.children.map((o) => o.getAttribute('name'))).toEqual(['one', 'two', 'three']);
  });

  it('refuses documents after freezing', () => {
    const tree = new DocumentTree();
    tree.addDocument('title: one', 'a/one.md');
    const root = tree.freeze();

    expect(root.isFrozen).toBe(true);
    expect(() => tree.addDocument('description: untitled', 'a/two.md')).toThrow(TreeFrozenError);
  });
});
