import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';

import { ConfigError, errorMessage } from './errors.js';
import {
  DocbinConfigFileSchema,
  type CompilerConfig,
  type CompilerOverrides,
  type DocbinConfigFile,
} from './types.js';

/**
 * Name of the optional project config file, looked up in the working directory.
 */
export const CONFIG_FILE_NAME = 'docbin.json';

export const DEFAULT_DOCS_DIR = 'Documentation';
export const DEFAULT_BINARY_OUT = 'Documentation.bin';
export const DEFAULT_XML_OUT = join('Documentation', 'Documentation.xml');

/**
 * Cached debug-enabled flag. Resolved lazily, or set by `loadCompilerConfig`
 * once the config file and environment are known.
 */
let _debugCached: boolean | null = null;

/**
 * Returns whether debug logging is enabled for this process.
 *
 * Resolution order:
 * 1. `DOCBIN_DEBUG` env var -- `"1"` or `"true"` enables debug mode
 * 2. `./docbin.json` -- `{ "debug": true }` enables debug mode
 * 3. Default: disabled
 *
 * The result is cached after the first call. A broken config file never
 * enables debug here; `loadCompilerConfig` reports it properly and applies
 * the `debug` field of whichever config file it loaded.
 */
export function isDebugEnabled(): boolean {
  if (_debugCached !== null) {
    return _debugCached;
  }

  const envVal = process.env.DOCBIN_DEBUG;
  if (envVal === '1' || envVal === 'true') {
    _debugCached = true;
    return true;
  }

  _debugCached = readDebugFlag(join(process.cwd(), CONFIG_FILE_NAME));
  return _debugCached;
}

/**
 * Overrides the cached debug flag.
 */
export function setDebugEnabled(enabled: boolean): void {
  _debugCached = enabled;
}

function readDebugFlag(configPath: string): boolean {
  try {
    const raw = JSON.parse(readFileSync(configPath, 'utf-8')) as Record<string, unknown>;
    return raw.debug === true;
  } catch {
    return false;
  }
}

/**
 * Parses a boolean environment variable. Unset or empty means "not given".
 */
export function parseBooleanEnv(name: string, value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === '1' || normalized === 'true' || normalized === 'yes') return true;
  if (normalized === '0' || normalized === 'false' || normalized === 'no') return false;
  throw new ConfigError(`${name} must be a boolean (1/0, true/false, yes/no), got "${value}"`, {
    name,
    value,
  });
}

/**
 * Reads and validates a config file.
 *
 * Returns null when the file does not exist and `required` is false.
 */
export function readConfigFile(configPath: string, required: boolean): DocbinConfigFile | null {
  if (!existsSync(configPath)) {
    if (required) {
      throw new ConfigError(`Config file not found: ${configPath}`, { configPath });
    }
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Config file ${configPath} is not valid JSON: ${errorMessage(err)}`, {
      configPath,
    });
  }

  const parsed = DocbinConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`,
    );
    throw new ConfigError(`Invalid config file ${configPath}: ${issues.join('; ')}`, {
      configPath,
      issues,
    });
  }
  return parsed.data;
}

export interface LoadConfigOptions {
  /** Working directory; relative CLI/env paths resolve against it. Default: process.cwd() */
  cwd?: string;
  /** Explicit config file path. When given, the file must exist. */
  configPath?: string;
  /** Environment to read overrides from. Default: process.env */
  env?: NodeJS.ProcessEnv;
  /** Command-line overrides; win over everything else. */
  overrides?: CompilerOverrides;
}

/**
 * Resolves the compiler configuration.
 *
 * Precedence (later wins): defaults, config file, environment, overrides.
 * Relative paths from the config file resolve against the file's directory;
 * all other relative paths resolve against `cwd`.
 *
 * The debug flag follows the same order (config file, then `DOCBIN_DEBUG`)
 * and is applied to the process-wide flag read by `debug()`.
 */
export function loadCompilerConfig(options: LoadConfigOptions = {}): CompilerConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const overrides = options.overrides ?? {};

  const configPath = options.configPath !== undefined
    ? resolve(cwd, options.configPath)
    : join(cwd, CONFIG_FILE_NAME);
  const file = readConfigFile(configPath, options.configPath !== undefined);
  const fileBase = dirname(configPath);

  const config: CompilerConfig = {
    docsDir: resolve(cwd, DEFAULT_DOCS_DIR),
    binaryOut: resolve(cwd, DEFAULT_BINARY_OUT),
    xmlOut: resolve(cwd, DEFAULT_XML_OUT),
    generateXml: true,
    verify: false,
  };

  if (file) {
    if (file.docsDir !== undefined) config.docsDir = resolve(fileBase, file.docsDir);
    if (file.binaryOut !== undefined) config.binaryOut = resolve(fileBase, file.binaryOut);
    if (file.xmlOut !== undefined) config.xmlOut = resolve(fileBase, file.xmlOut);
    if (file.generateXml !== undefined) config.generateXml = file.generateXml;
    if (file.verify !== undefined) config.verify = file.verify;
  }

  if (env.DOCBIN_DOCS_DIR) config.docsDir = resolve(cwd, env.DOCBIN_DOCS_DIR);
  if (env.DOCBIN_BINARY_OUT) config.binaryOut = resolve(cwd, env.DOCBIN_BINARY_OUT);
  if (env.DOCBIN_XML_OUT) config.xmlOut = resolve(cwd, env.DOCBIN_XML_OUT);
  const envXml = parseBooleanEnv('DOCBIN_GENERATE_XML', env.DOCBIN_GENERATE_XML);
  if (envXml !== undefined) config.generateXml = envXml;

  const debugFlag = parseBooleanEnv('DOCBIN_DEBUG', env.DOCBIN_DEBUG) ?? file?.debug;
  if (debugFlag !== undefined) setDebugEnabled(debugFlag);

  if (overrides.docsDir !== undefined) config.docsDir = resolve(cwd, overrides.docsDir);
  if (overrides.binaryOut !== undefined) config.binaryOut = resolve(cwd, overrides.binaryOut);
  if (overrides.xmlOut !== undefined) config.xmlOut = resolve(cwd, overrides.xmlOut);
  if (overrides.generateXml !== undefined) config.generateXml = overrides.generateXml;
  if (overrides.verify !== undefined) config.verify = overrides.verify;

  return config;
}
