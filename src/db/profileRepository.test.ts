import fs from 'fs';
import os from 'os';
import path from 'path';
import type { ProfileConfig } from '../types/models.js';
import { ProfileRepository } from './profileRepository.js';

const config: ProfileConfig = {
  outbounds: [{ tag: 'proxy', protocol: 'vless', settings: { vnext: [{ address: 'a.example', port: 443, users: [{ id: 'u1' }] }] } }],
};

describe('ProfileRepository', () => {
  let dir: string;
  let profiles: ProfileRepository;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'profiles-'));
    profiles = new ProfileRepository(dir);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('save, read back, update and delete', () => {
    const id = profiles.save('Home', config);
    expect(id).not.toBeNull();
    const stored = profiles.getById(id ?? '');
    expect(stored).toMatchObject({ id, name: 'Home', config });
    expect(typeof stored?.created_at).toBe('string');

    expect(profiles.update(id ?? '', { name: 'Work' })).toBe(true);
    expect(profiles.getById(id ?? '')?.name).toBe('Work');
    expect(profiles.getById(id ?? '')?.config).toEqual(config);

    expect(profiles.delete(id ?? '')).toBe(true);
    expect(profiles.delete(id ?? '')).toBe(false);
    expect(profiles.loadAll()).toEqual([]);
  });

  test('rejects blank names and configs without outbounds', () => {
    expect(profiles.save('  ', config)).toBeNull();
    expect(profiles.save('Bad', { inbounds: [] })).toBeNull();
    expect(profiles.loadAll()).toEqual([]);
  });

  test('updates keep the name non-empty', () => {
    const id = profiles.save('Home', config) ?? '';
    expect(profiles.update(id, { name: '' })).toBe(false);
    expect(profiles.update(id, { name: '   ' })).toBe(false);
    expect(profiles.getById(id)?.name).toBe('Home');
    expect(profiles.getById(id)?.updated_at).toBeUndefined();
  });

  test('unknown ids', () => {
    expect(profiles.getById('')).toBeNull();
    expect(profiles.getById('missing')).toBeNull();
    expect(profiles.update('missing', { name: 'x' })).toBe(false);
  });

  test('a corrupt document reads as empty', () => {
    fs.writeFileSync(path.join(dir, 'profiles.json'), '{not json');
    expect(profiles.loadAll()).toEqual([]);
  });

  test('writes leave no temporary file behind', () => {
    profiles.save('Home', config);
    expect(fs.readdirSync(dir)).toEqual(['profiles.json']);
  });
});
