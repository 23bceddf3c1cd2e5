/**
 * Section key vocabularies recognised by the document format.
 *
 * Every list doubles as a type: `DocumentKey`, `MethodKey`, etc. are the
 * unions of their entries, so a SectionMap can only be indexed by keys the
 * splitter actually looked for.
 */

/** Top-level keys of a document. Matched only at the start of a line. */
export const DOCUMENT_KEYS = [
  'title',
  'description',
  'pdcategory',
  'categories',
  'flags',
  'arguments',
  'last_update',
  'inlets',
  'outlets',
  'draft',
  'see_also',
  'methods',
] as const;

export const METHOD_KEYS = ['name', 'type', 'description'] as const;
export const ARGUMENT_KEYS = ['type', 'description', 'default'] as const;
export const FLAG_KEYS = ['name', 'description'] as const;
export const IOLET_KEYS = ['type', 'description'] as const;

/** Inlet/outlet positions; `nth` marks a variable position. */
export const ORDINAL_KEYS = ['1st', '2nd', '3rd', '4th', '5th', '6th', '7th', '8th', 'nth'] as const;

export type DocumentKey = (typeof DOCUMENT_KEYS)[number];
export type MethodKey = (typeof METHOD_KEYS)[number];
export type ArgumentKey = (typeof ARGUMENT_KEYS)[number];
export type FlagKey = (typeof FLAG_KEYS)[number];
export type IoletKey = (typeof IOLET_KEYS)[number];
export type OrdinalKey = (typeof ORDINAL_KEYS)[number];

export const VARIABLE_ORDINAL: OrdinalKey = 'nth';
