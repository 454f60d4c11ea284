import fs from 'fs';
import os from 'os';
import path from 'path';
import { ConfigFileLoader, stripJsonComments } from './configFileLoader.js';

describe('stripJsonComments', () => {
  test('removes line and block comments but keeps strings intact', () => {
    const content = [
      '{',
      '  // remark',
      '  "path": "/ws//x", /* inline */',
      '  "note": "a /* not a comment */ b"',
      '}',
    ].join('\n');

    expect(JSON.parse(stripJsonComments(content))).toEqual({
      path: '/ws//x',
      note: 'a /* not a comment */ b',
    });
  });
});

describe('ConfigFileLoader', () => {
  let dir: string;
  const loader = new ConfigFileLoader();

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'loader-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('loads a commented config', () => {
    const file = path.join(dir, 'c.json');
    fs.writeFileSync(file, '{\n// proxy\n"outbounds": [{"protocol": "vless"}]\n}');
    const result = loader.load(file);
    expect(result).toEqual({ config: { outbounds: [{ protocol: 'vless' }] }, shouldRemoveFromRecent: false });
    expect(loader.validate(result.config)).toBe(true);
  });

  test('missing files and traversal paths should leave the recent list', () => {
    expect(loader.load(path.join(dir, 'missing.json'))).toEqual({ config: null, shouldRemoveFromRecent: true });
    expect(loader.load('../c.json')).toEqual({ config: null, shouldRemoveFromRecent: true });
  });

  test('invalid json and non-objects are unusable', () => {
    const broken = path.join(dir, 'broken.json');
    fs.writeFileSync(broken, '{"outbounds": [');
    expect(loader.load(broken).config).toBeNull();

    const list = path.join(dir, 'list.json');
    fs.writeFileSync(list, '[1, 2]');
    expect(loader.load(list)).toEqual({ config: null, shouldRemoveFromRecent: true });
  });

  test('validate requires an outbound list', () => {
    expect(loader.validate({ outbounds: [] })).toBe(true);
    expect(loader.validate({ inbounds: [] })).toBe(false);
    expect(loader.validate({ outbounds: ['x'] })).toBe(false);
  });
});
