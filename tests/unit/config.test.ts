import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ConfigError, loadConfigFile, resolveConfigPath } from '../../src/config/index.js';

describe('resolveConfigPath', () => {
  it('uses KIT_CONFIG when set', () => {
    expect(resolveConfigPath({ KIT_CONFIG: '/etc/kit.yaml' }, '/home/dev')).toEqual({
      path: '/etc/kit.yaml',
      explicit: true,
    });
  });

  it('falls back to the file in the home directory', () => {
    expect(resolveConfigPath({ KIT_CONFIG: '' }, '/home/dev')).toEqual({
      path: '/home/dev/.kit/config.yaml',
      explicit: false,
    });
  });
});

describe('loadConfigFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), 'kit-config-test-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function write(name: string, contents: string): string {
    const file = path.join(dir, name);
    mkdirSync(path.dirname(file), { recursive: true });
    writeFileSync(file, contents, 'utf-8');
    return file;
  }

  it('reads a YAML config', () => {
    const file = write('config.yaml', 'shell: zsh\n');
    expect(loadConfigFile({ path: file, explicit: true })).toEqual({ shell: 'zsh' });
  });

  it('reads a JSON config', () => {
    const file = write('config.json', '{"shell": "fish"}');
    expect(loadConfigFile({ path: file, explicit: true })).toEqual({ shell: 'fish' });
  });

  it('treats an empty file as an empty config', () => {
    const file = write('config.yaml', '');
    expect(loadConfigFile({ path: file, explicit: false })).toEqual({});
  });

  it('returns an empty config when the default file is absent', () => {
    expect(loadConfigFile({ path: path.join(dir, 'missing.yaml'), explicit: false })).toEqual({});
  });

  it('throws when an explicit file is absent', () => {
    const missing = path.join(dir, 'missing.yaml');
    expect(() => loadConfigFile({ path: missing, explicit: true })).toThrow(
      `Config file not found: ${missing}`,
    );
  });

  it('rejects unsupported shells', () => {
    const file = write('config.yaml', 'shell: tcsh\n');
    expect(() => loadConfigFile({ path: file, explicit: true })).toThrow(ConfigError);
    expect(() => loadConfigFile({ path: file, explicit: true })).toThrow(/shell: Invalid enum value/);
  });

  it('rejects unknown keys', () => {
    const file = write('config.yaml', 'shel: bash\n');
    expect(() => loadConfigFile({ path: file, explicit: true })).toThrow(/Unrecognized key/);
  });

  it('reports unparseable files', () => {
    const file = write('config.json', '{ nope');
    expect(() => loadConfigFile({ path: file, explicit: true })).toThrow(/^Cannot parse /);
  });
});
