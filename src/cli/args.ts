import type { CompilerOverrides } from '../shared/types.js';

export interface ParsedArgs {
  overrides: CompilerOverrides;
  configPath?: string;
  help: boolean;
  /** Unknown flags or flags missing their value. */
  errors: string[];
}

const VALUE_FLAGS = new Map<string, 'docsDir' | 'binaryOut' | 'xmlOut' | 'configPath'>([
  ['--docs', 'docsDir'],
  ['-d', 'docsDir'],
  ['--out', 'binaryOut'],
  ['-o', 'binaryOut'],
  ['--xml', 'xmlOut'],
  ['--config', 'configPath'],
  ['-c', 'configPath'],
]);

export function parseArgs(argv: string[] = process.argv.slice(2)): ParsedArgs {
  const result: ParsedArgs = { overrides: {}, help: false, errors: [] };

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i];

    if (arg === '--help' || arg === '-h') {
      result.help = true;
      i++;
      continue;
    }

    if (arg === '--no-xml') {
      result.overrides.generateXml = false;
      i++;
      continue;
    }

    if (arg === '--verify') {
      result.overrides.verify = true;
      i++;
      continue;
    }

    const target = VALUE_FLAGS.get(arg);
    if (target !== undefined) {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith('-')) {
        result.errors.push(`${arg} requires a value`);
        i++;
        continue;
      }
      if (target === 'configPath') {
        result.configPath = value;
      } else {
        result.overrides[target] = value;
        // Naming an XML path implies wanting the XML file.
        if (target === 'xmlOut') result.overrides.generateXml = true;
      }
      i += 2;
      continue;
    }

    result.errors.push(`Unknown argument: ${arg}`);
    i++;
  }

  return result;
}

export function getHelpText(): string {
  return `
docbin - Compile object documentation into a binary value tree

Usage:
  docbin [options]

Options:
  --docs, -d <dir>      Documentation directory (default: ./Documentation)
  --out, -o <file>      Binary output file (default: ./Documentation.bin)
  --xml <file>          Also write XML here (default: ./Documentation/Documentation.xml)
  --no-xml              Skip the XML output
  --config, -c <file>   Config file (default: ./docbin.json if present)
  --verify              Decode the written binary and check it
  --help, -h            Show this help message

Environment Variables:
  DOCBIN_DOCS_DIR, DOCBIN_BINARY_OUT, DOCBIN_XML_OUT, DOCBIN_GENERATE_XML
  DOCBIN_DEBUG=1        Log progress to stderr
`;
}
