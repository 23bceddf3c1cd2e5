/**
 * Renders an attributed tree as XML.
 *
 * Nodes become elements, attributes become element attributes in insertion
 * order. No whitespace is added between elements; childless nodes are
 * written as `<tag />`. Attribute values are written as stored (untrimmed).
 */

import { EncodingError } from '../shared/errors.js';
import type { AttributedNode } from '../tree/node.js';

export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

const TAG_NAME = /^[A-Za-z_][A-Za-z0-9_.-]*$/;

// C0 controls that XML 1.0 cannot carry, even as character references.
const FORBIDDEN_CONTROL = /[\u0000-\u0008\u000B\u000C\u000E-\u001F]/;

const ATTRIBUTE_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  '\n': '&#10;',
  '\r': '&#13;',
  '\t': '&#09;',
};

export function escapeAttribute(value: string): string {
  return value.replace(/[&<>"\n\r\t]/g, (ch) => ATTRIBUTE_ESCAPES[ch] ?? ch);
}

function assertName(name: string, what: string, tag: string): void {
  if (!TAG_NAME.test(name)) {
    throw new EncodingError(`${what} "${name}" of <${tag}> is not a valid XML name`, { tag, name });
  }
}

function renderNode(node: AttributedNode, out: string[]): void {
  assertName(node.tag, 'Tag', node.tag);
  out.push('<', node.tag);

  for (const [name, value] of node.attributes) {
    assertName(name, 'Attribute', node.tag);
    const control = FORBIDDEN_CONTROL.exec(value);
    if (control !== null) {
      const code = control[0].charCodeAt(0).toString(16).padStart(4, '0');
      throw new EncodingError(
        `Attribute "${name}" of <${node.tag}> contains control character U+${code.toUpperCase()}`,
        { tag: node.tag, name },
      );
    }
    out.push(' ', name, '="', escapeAttribute(value), '"');
  }

  if (node.children.length === 0) {
    out.push(' />');
    return;
  }

  out.push('>');
  for (const child of node.children) {
    renderNode(child, out);
  }
  out.push('</', node.tag, '>');
}

/**
 * Renders the element tree only, without the XML declaration.
 */
export function renderElement(node: AttributedNode): string {
  const out: string[] = [];
  renderNode(node, out);
  return out.join('');
}

/**
 * Renders a complete XML document, declaration first, newline-terminated.
 */
export function renderMarkup(node: AttributedNode): string {
  return `${XML_DECLARATION}\n${renderElement(node)}\n`;
}
