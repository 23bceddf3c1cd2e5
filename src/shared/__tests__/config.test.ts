import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  CONFIG_FILE_NAME,
  isDebugEnabled,
  loadCompilerConfig,
  parseBooleanEnv,
  readConfigFile,
  setDebugEnabled,
} from '../config.js';
import { ConfigError } from '../errors.js';

describe('loadCompilerConfig', () => {
  let cwd: string;

  beforeEach(() => {
    cwd = mkdtempSync(join(tmpdir(), 'docbin-config-'));
  });

  afterEach(() => {
    rmSync(cwd, { recursive: true, force: true });
    setDebugEnabled(false);
  });

  it('uses defaults relative to the working directory', () => {
    const config = loadCompilerConfig({ cwd, env: {} });

    expect(config).toEqual({
      docsDir: join(cwd, 'Documentation'),
      binaryOut: join(cwd, 'Documentation.bin'),
      xmlOut: join(cwd, 'Documentation', 'Documentation.xml'),
      generateXml: true,
      verify: false,
    });
  });

  it('reads docbin.json and resolves its paths against the file', () => {
    writeFileSync(
      join(cwd, CONFIG_FILE_NAME),
      JSON.stringify({ docsDir: 'docs', binaryOut: 'build/docs.bin', generateXml: false }),
    );

    const config = loadCompilerConfig({ cwd, env: {} });

    expect(config.docsDir).toBe(join(cwd, 'docs'));
    expect(config.binaryOut).toBe(join(cwd, 'build', 'docs.bin'));
    expect(config.generateXml).toBe(false);
  });

  it('resolves an explicit config file relative to its own directory', () => {
    mkdirSync(join(cwd, 'conf'));
    writeFileSync(join(cwd, 'conf', 'custom.json'), JSON.stringify({ docsDir: '../manual' }));

    const config = loadCompilerConfig({ cwd, env: {}, configPath: 'conf/custom.json' });

    expect(config.docsDir).toBe(join(cwd, 'manual'));
  });

  it('lets the environment override the config file', () => {
    writeFileSync(join(cwd, CONFIG_FILE_NAME), JSON.stringify({ docsDir: 'docs', generateXml: true }));

    const config = loadCompilerConfig({
      cwd,
      env: { DOCBIN_DOCS_DIR: 'env-docs', DOCBIN_GENERATE_XML: 'false', DOCBIN_XML_OUT: 'x.xml' },
    });

    expect(config.docsDir).toBe(join(cwd, 'env-docs'));
    expect(config.xmlOut).toBe(join(cwd, 'x.xml'));
    expect(config.generateXml).toBe(false);
  });

  it('lets overrides win over everything', () => {
    const config = loadCompilerConfig({
      cwd,
      env: { DOCBIN_BINARY_OUT: 'env.bin', DOCBIN_GENERATE_XML: '0' },
      overrides: { binaryOut: 'cli.bin', generateXml: true, verify: true },
    });

    expect(config.binaryOut).toBe(join(cwd, 'cli.bin'));
    expect(config.generateXml).toBe(true);
    expect(config.verify).toBe(true);
  });

  it('rejects unknown keys in the config file', () => {
    writeFileSync(join(cwd, CONFIG_FILE_NAME), JSON.stringify({ docDir: 'typo' }));
    expect(() => loadCompilerConfig({ cwd, env: {} })).toThrow(ConfigError);
  });

  it('rejects wrongly typed values and names the field', () => {
    writeFileSync(join(cwd, CONFIG_FILE_NAME), JSON.stringify({ generateXml: 'yes' }));
    expect(() => loadCompilerConfig({ cwd, env: {} })).toThrow(/generateXml/);
  });

  it('rejects malformed JSON', () => {
    writeFileSync(join(cwd, CONFIG_FILE_NAME), '{ not json');
    expect(() => loadCompilerConfig({ cwd, env: {} })).toThrow(ConfigError);
  });

  it('requires an explicitly named config file to exist', () => {
    expect(() => loadCompilerConfig({ cwd, env: {}, configPath: 'missing.json' })).toThrow(
      `Config file not found: ${join(cwd, 'missing.json')}`,
    );
  });

  it('turns debug logging on from an explicitly named config file', () => {
    setDebugEnabled(false);
    writeFileSync(join(cwd, 'custom.json'), JSON.stringify({ debug: true }));

    loadCompilerConfig({ cwd, env: {}, configPath: 'custom.json' });

    expect(isDebugEnabled()).toBe(true);
  });

  it('lets DOCBIN_DEBUG override the config file debug flag', () => {
    setDebugEnabled(false);
    writeFileSync(join(cwd, CONFIG_FILE_NAME), JSON.stringify({ debug: true }));

    loadCompilerConfig({ cwd, env: { DOCBIN_DEBUG: '0' } });

    expect(isDebugEnabled()).toBe(false);
  });

  it('leaves the debug flag alone when nothing sets it', () => {
    setDebugEnabled(true);

    loadCompilerConfig({ cwd, env: {} });

    expect(isDebugEnabled()).toBe(true);
  });

  it('rejects a malformed boolean in the environment', () => {
    expect(() => loadCompilerConfig({ cwd, env: { DOCBIN_GENERATE_XML: 'maybe' } })).toThrow(ConfigError);
  });
});

describe('readConfigFile', () => {
  it('returns null for a missing optional file', () => {
    expect(readConfigFile(join(tmpdir(), 'docbin-does-not-exist.json'), false)).toBeNull();
  });
});

describe('parseBooleanEnv', () => {
  it('accepts the usual spellings', () => {
    expect(parseBooleanEnv('X', '1')).toBe(true);
    expect(parseBooleanEnv('X', 'TRUE')).toBe(true);
    expect(parseBooleanEnv('X', 'yes')).toBe(true);
    expect(parseBooleanEnv('X', '0')).toBe(false);
    expect(parseBooleanEnv('X', 'False')).toBe(false);
    expect(parseBooleanEnv('X', 'no')).toBe(false);
  });

  it('treats unset or empty as not given', () => {
    expect(parseBooleanEnv('X', undefined)).toBeUndefined();
    expect(parseBooleanEnv('X', '')).toBeUndefined();
  });
});
