import { describe, it, expect, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { loadPortReferences } from '../ports.js';
import { ConfigurationError } from '../../errors.js';

describe('port reference list', () => {
  let tempDir: string | null = null;

  const writeTemp = (contents: string): string => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'ports-'));
    const file = path.join(tempDir, 'ports.json');
    fs.writeFileSync(file, contents);
    return file;
  };

  afterEach(() => {
    if (tempDir) {
      fs.rmSync(tempDir, { recursive: true, force: true });
      tempDir = null;
    }
  });

  it('loads the bundled ports', () => {
    const ports = loadPortReferences();

    expect(ports).toHaveLength(15);
    expect(new Set(ports.map((port) => port.code)).size).toBe(15);
    expect(ports[0].code).toBe('SGSIN');
  });

  it('rejects entries that fail validation', () => {
    const file = writeTemp(JSON.stringify([{ code: 'bad' }, { code: 'worse' }]));
    expect(() => loadPortReferences(file)).toThrow(ConfigurationError);
  });

  it('rejects duplicate codes', () => {
    const entry = {
      code: 'AAAAA',
      name: 'Alpha',
      country: 'Testland',
      countryCode: 'TL',
      latitude: 0,
      longitude: 0,
      berthCapacity: 4,
      terminalCount: 1,
    };
    const file = writeTemp(JSON.stringify([entry, entry]));
    expect(() => loadPortReferences(file)).toThrow('Duplicate port codes');
  });

  it('reports unreadable files as configuration errors', () => {
    const file = writeTemp('not json');
    expect(() => loadPortReferences(file)).toThrow(ConfigurationError);
  });
});
