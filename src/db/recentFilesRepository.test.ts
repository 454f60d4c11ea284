import fs from 'fs';
import os from 'os';
import path from 'path';
import { MAX_RECENT_FILES, RecentFilesRepository, hasTraversalSegment } from './recentFilesRepository.js';

describe('RecentFilesRepository', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'recent-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('most recent first, without duplicates', () => {
    const recent = new RecentFilesRepository(dir);
    recent.add('a.json');
    recent.add('b.json');
    recent.add('a.json');

    expect(recent.getAll()).toEqual(['a.json', 'b.json']);
    expect(recent.getLastSelected()).toBe('a.json');
  });

  test('keeps at most twenty entries', () => {
    const recent = new RecentFilesRepository(dir);
    for (let i = 0; i < 25; i++) {
      recent.add(`config-${i}.json`);
    }
    const all = recent.getAll();
    expect(all).toHaveLength(MAX_RECENT_FILES);
    expect(all[0]).toBe('config-24.json');
    expect(all[19]).toBe('config-5.json');
  });

  test('rejects traversal segments', () => {
    const recent = new RecentFilesRepository(dir);
    expect(recent.add('../secret.json')).toBe(false);
    expect(recent.add('configs/../../x.json')).toBe(false);
    expect(recent.getAll()).toEqual([]);
    expect(recent.getLastSelected()).toBeNull();
  });

  test('absolute paths can be refused', () => {
    const strict = new RecentFilesRepository(dir, { allowAbsolute: false });
    expect(strict.add('/etc/passwd')).toBe(false);
    expect(strict.getAll()).toEqual([]);

    const relaxed = new RecentFilesRepository(dir);
    expect(relaxed.add('/etc/xray/config.json')).toBe(true);
    expect(relaxed.getAll()).toEqual(['/etc/xray/config.json']);
  });

  test('remove only succeeds for listed files', () => {
    const recent = new RecentFilesRepository(dir);
    recent.add('a.json');
    expect(recent.remove('b.json')).toBe(false);
    expect(recent.remove('a.json')).toBe(true);
    expect(recent.getAll()).toEqual([]);
  });

  test('stored entries that are no longer valid are filtered out', () => {
    fs.writeFileSync(path.join(dir, 'recent_files.json'), JSON.stringify(['ok.json', '../bad.json', 7]));
    expect(new RecentFilesRepository(dir).getAll()).toEqual([]);

    fs.writeFileSync(path.join(dir, 'recent_files.json'), JSON.stringify(['ok.json', '../bad.json']));
    expect(new RecentFilesRepository(dir).getAll()).toEqual(['ok.json']);
  });
});

test('hasTraversalSegment matches whole segments only', () => {
  expect(hasTraversalSegment('..')).toBe(true);
  expect(hasTraversalSegment('a\\..\\b')).toBe(true);
  expect(hasTraversalSegment('file..json')).toBe(false);
});
