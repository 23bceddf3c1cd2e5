/**
 * Labeled-span splitter for the documentation format.
 *
 * A document is a run of `key: value` sections. Section boundaries are the
 * positions of the `key:` tokens themselves, not line structure, so a value
 * may span many lines and contain nested lists. The same splitter handles
 * top-level keys, sub-record keys and inlet/outlet ordinals; only the
 * vocabulary changes.
 */

/**
 * Trimmed section text keyed by the vocabulary entry that introduced it,
 * in order of appearance. Keys that were not found are absent.
 */
export type SectionMap<K extends string> = ReadonlyMap<K, string>;

export interface SectionOptions {
  /**
   * Only accept a key token at the very start of the text or directly after
   * a newline. Keeps indented sub-record keys (`  description:`) from being
   * mistaken for top-level ones.
   */
  lineStart?: boolean;
}

/**
 * Finds the first acceptable position of `token` in `text`, or -1.
 */
function findToken(text: string, token: string, lineStart: boolean): number {
  let index = text.indexOf(token);
  if (!lineStart) {
    return index;
  }
  while (index !== -1 && index !== 0 && text[index - 1] !== '\n') {
    index = text.indexOf(token, index + 1);
  }
  return index;
}

/**
 * Cleans raw section text: drops one leading newline left over from the
 * `key:` line, trims whitespace, then removes one layer of double quotes.
 */
export function cleanSectionText(raw: string): string {
  let content = raw;
  if (content.startsWith('\r\n')) {
    content = content.slice(2);
  } else if (content.startsWith('\n')) {
    content = content.slice(1);
  }
  content = content.trim();
  if (content.startsWith('"')) {
    content = content.slice(1);
  }
  if (content.endsWith('"')) {
    content = content.slice(0, -1);
  }
  return content;
}

/**
 * Splits `text` into sections introduced by `key:` tokens from `vocabulary`.
 *
 * Only the first occurrence of each key counts. Each section runs from the
 * end of its token to the start of the next found token (or the end of the
 * text). Finding no keys yields an empty map; whether that matters is up to
 * the caller.
 */
export function getSections<K extends string>(
  text: string,
  vocabulary: readonly K[],
  options: SectionOptions = {},
): SectionMap<K> {
  const lineStart = options.lineStart ?? false;
  const found: { key: K; index: number }[] = [];

  for (const key of vocabulary) {
    if (found.some((entry) => entry.key === key)) {
      continue;
    }
    const index = findToken(text, `${key}:`, lineStart);
    if (index !== -1) {
      found.push({ key, index });
    }
  }

  found.sort((a, b) => a.index - b.index);

  const sections = new Map<K, string>();
  for (let i = 0; i < found.length; i++) {
    const { key, index } = found[i];
    const start = index + key.length + 1;
    const end = i + 1 < found.length ? found[i + 1].index : text.length;
    sections.set(key, cleanSectionText(text.slice(start, end)));
  }
  return sections;
}

/**
 * Splits a hyphen list into its top-level items.
 *
 * A line whose trimmed text starts with `-` begins a new item holding the
 * text after that first `-`. Following lines are appended (trimmed) to the
 * current item with a newline. Lines before the first bullet are dropped,
 * as are items left empty.
 */
export function sectionsFromHyphens(text: string): string[] {
  const blocks: string[][] = [];
  let current: string[] | null = null;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line.startsWith('-')) {
      current = [line.slice(1).trim()];
      blocks.push(current);
    } else if (current) {
      current.push(line);
    }
  }

  return blocks
    .map((lines) => lines.join('\n').trim())
    .filter((block) => block.length > 0);
}
