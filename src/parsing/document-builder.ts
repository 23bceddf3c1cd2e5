/**
 * Document model builder.
 *
 * Turns one documentation file into `object` nodes appended to a shared
 * root. Each object gets five container children, always in this order:
 * iolets, categories, arguments, methods, flags.
 *
 * Field policy:
 * - no `title`                       -> whole document skipped
 * - method without `type` or `name`  -> that method skipped
 * - optional fields (object description, argument default,
 *   flag description)                -> empty string
 * - any other missing field          -> MissingFieldError, aborting the run
 */

import { debug } from '../shared/debug.js';
import { MissingFieldError } from '../shared/errors.js';
import type { AttributedNode } from '../tree/node.js';
import { getSections, sectionsFromHyphens, type SectionMap } from './sections.js';
import {
  ARGUMENT_KEYS,
  DOCUMENT_KEYS,
  FLAG_KEYS,
  IOLET_KEYS,
  METHOD_KEYS,
  ORDINAL_KEYS,
  VARIABLE_ORDINAL,
  type ArgumentKey,
  type DocumentKey,
  type FlagKey,
  type IoletKey,
  type MethodKey,
  type OrdinalKey,
} from './vocabulary.js';

export const CONTAINER_TAGS = ['iolets', 'categories', 'arguments', 'methods', 'flags'] as const;

const TITLE_STRIP = /^['"\n\f\r\t ]+|['"\n\f\r\t ]+$/g;

type IoletKind = 'inlet' | 'outlet';

interface ObjectContainers {
  iolets: AttributedNode;
  categories: AttributedNode;
  arguments: AttributedNode;
  methods: AttributedNode;
  flags: AttributedNode;
}

/**
 * Looks up a field the record cannot do without.
 */
function required<K extends string>(
  sections: SectionMap<K>,
  field: K,
  record: string,
  sourceFile: string,
): string {
  const value = sections.get(field);
  if (value === undefined) {
    throw new MissingFieldError(sourceFile, record, field);
  }
  return value;
}

function addMethods(methods: AttributedNode, text: string, sourceFile: string): void {
  for (const block of sectionsFromHyphens(text)) {
    const method: SectionMap<MethodKey> = getSections(block, METHOD_KEYS);
    const label = method.get('type') ?? method.get('name');
    if (label === undefined) {
      debug('parse', 'Skipping method without type or name', { sourceFile });
      continue;
    }
    methods.createChild('method', [
      ['type', label],
      ['description', required(method, 'description', `method "${label}"`, sourceFile)],
    ]);
  }
}

function addCategories(categories: AttributedNode, text: string): void {
  for (const item of text.split(',')) {
    const name = item.trim();
    if (name.length > 0) {
      categories.createChild('category', [['name', name]]);
    }
  }
}

function addArguments(args: AttributedNode, text: string, sourceFile: string): void {
  for (const block of sectionsFromHyphens(text)) {
    const argument: SectionMap<ArgumentKey> = getSections(block, ARGUMENT_KEYS);
    args.createChild('argument', [
      ['type', required(argument, 'type', 'argument', sourceFile)],
      ['description', required(argument, 'description', 'argument', sourceFile)],
      ['default', argument.get('default') ?? ''],
    ]);
  }
}

function addFlags(flags: AttributedNode, text: string, sourceFile: string): void {
  for (const block of sectionsFromHyphens(text)) {
    const flag: SectionMap<FlagKey> = getSections(block, FLAG_KEYS);
    flags.createChild('flag', [
      ['name', required(flag, 'name', 'flag', sourceFile)],
      ['description', flag.get('description') ?? ''],
    ]);
  }
}

/**
 * Builds the tooltip for one inlet/outlet: a `(type) description` line per item.
 */
function buildTooltip(text: string, record: string, sourceFile: string): string {
  let tooltip = '';
  for (const block of sectionsFromHyphens(text)) {
    const item: SectionMap<IoletKey> = getSections(block, IOLET_KEYS);
    const type = required(item, 'type', record, sourceFile);
    const description = required(item, 'description', record, sourceFile);
    tooltip += `(${type}) ${description}\n`;
  }
  return tooltip;
}

function addIolets(iolets: AttributedNode, kind: IoletKind, text: string, sourceFile: string): void {
  const ordinals: SectionMap<OrdinalKey> = getSections(text, ORDINAL_KEYS);
  for (const [ordinal, content] of ordinals) {
    iolets.createChild(kind, [
      ['variable', ordinal === VARIABLE_ORDINAL ? '1' : '0'],
      ['tooltip', buildTooltip(content, `${kind} ${ordinal}`, sourceFile)],
    ]);
  }
}

function createObject(
  root: AttributedNode,
  name: string,
  description: string,
): ObjectContainers {
  const object = root.createChild('object', [
    ['name', name],
    ['description', description],
  ]);
  return {
    iolets: object.createChild('iolets'),
    categories: object.createChild('categories'),
    arguments: object.createChild('arguments'),
    methods: object.createChild('methods'),
    flags: object.createChild('flags'),
  };
}

/**
 * Splits the title section into object names. Empty names are dropped.
 */
export function parseTitleNames(title: string): string[] {
  return title
    .split(',')
    .map((name) => name.replace(TITLE_STRIP, ''))
    .filter((name) => name.length > 0);
}

/**
 * Parses one document and appends an `object` node per title name to `root`.
 *
 * @param sourceFile - Name used in error messages
 * @returns Number of object nodes appended; 0 when the document has no title
 */
export function buildObjects(root: AttributedNode, markdown: string, sourceFile = '<inline>'): number {
  const sections: SectionMap<DocumentKey> = getSections(markdown, DOCUMENT_KEYS, { lineStart: true });

  const title = sections.get('title');
  if (title === undefined) {
    debug('parse', 'Skipping document without title', { sourceFile });
    return 0;
  }

  const description = sections.get('description') ?? '';
  const names = parseTitleNames(title);

  for (const name of names) {
    const containers = createObject(root, name, description);

    const methods = sections.get('methods');
    if (methods !== undefined) addMethods(containers.methods, methods, sourceFile);

    const categories = sections.get('pdcategory');
    if (categories !== undefined) addCategories(containers.categories, categories);

    const args = sections.get('arguments');
    if (args !== undefined) addArguments(containers.arguments, args, sourceFile);

    const flags = sections.get('flags');
    if (flags !== undefined) addFlags(containers.flags, flags, sourceFile);

    const inlets = sections.get('inlets');
    if (inlets !== undefined) addIolets(containers.iolets, 'inlet', inlets, sourceFile);

    const outlets = sections.get('outlets');
    if (outlets !== undefined) addIolets(containers.iolets, 'outlet', outlets, sourceFile);
  }

  debug('parse', 'Built objects', { sourceFile, objects: names.length });
  return names.length;
}
