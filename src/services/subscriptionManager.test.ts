import fs from 'fs';
import os from 'os';
import path from 'path';
import { SubscriptionRepository } from '../db/subscriptionRepository.js';
import { SubscriptionManager, parseSubscriptionContent } from './subscriptionManager.js';
import type { Fetcher } from './subscriptionManager.js';

const base64 = (value: string) => Buffer.from(value, 'utf-8').toString('base64');

const LINKS = ['trojan://test-secret@t.example:443#T1', 'ss://aes-128-gcm:test-secret@s.example:8388#S2', 'not a link'].join('\n');

describe('parseSubscriptionContent', () => {
  test('a JSON array of configs, with comments and trailing commas', () => {
    const content = [
      '\uFEFF[',
      '  // first',
      '  {"remarks": "A", "outbounds": [{"protocol": "vless"}],},',
      '  {"tag": "B", "outbounds": []},',
      '  {"outbounds": []},',
      '  {"inbounds": []}',
      ']',
    ].join('\n');

    const profiles = parseSubscriptionContent(content);
    expect(profiles.map(p => p.name)).toEqual(['A', 'B', 'Server']);
    expect(profiles[0].config).toEqual({ remarks: 'A', outbounds: [{ protocol: 'vless' }] });
  });

  test('a base64 list of share links', () => {
    const profiles = parseSubscriptionContent(base64(LINKS));
    expect(profiles.map(p => p.name)).toEqual(['T1', 'S2']);
    expect(profiles[0].config).toEqual({
      remarks: 'T1',
      outbounds: [
        {
          tag: 'proxy',
          protocol: 'trojan',
          settings: { servers: [{ address: 't.example', port: 443, password: 'test-secret' }] },
          streamSettings: {
            network: 'tcp',
            security: 'tls',
            tlsSettings: { serverName: 't.example', allowInsecure: false },
          },
        },
        { protocol: 'freedom', tag: 'direct' },
      ],
    });
  });

  test('a plain list of share links', () => {
    expect(parseSubscriptionContent(LINKS).map(p => p.name)).toEqual(['T1', 'S2']);
  });

  test('nothing usable', () => {
    expect(parseSubscriptionContent('   ')).toEqual([]);
    expect(parseSubscriptionContent('<html>Not found</html>')).toEqual([]);
  });
});

describe('SubscriptionManager', () => {
  let dir: string;
  let body: string;
  let fetcher: jest.Mock<Promise<string>, [string, number]>;
  let manager: SubscriptionManager;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'submgr-'));
    body = base64(LINKS);
    fetcher = jest.fn<Promise<string>, [string, number]>(async () => body);
    const typed: Fetcher = fetcher;
    manager = new SubscriptionManager(new SubscriptionRepository(dir), typed, 500);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('add rejects malformed urls', () => {
    expect(manager.add('Main', 'not a url')).toBeNull();
    expect(manager.add('Main', 'https://sub.example/list')).not.toBeNull();
    expect(manager.list()).toHaveLength(1);
  });

  test('update replaces the stored profiles', async () => {
    const id = manager.add('Main', 'https://sub.example/list') ?? '';

    expect(await manager.update(id)).toEqual({ success: true, message: 'Updated 2 servers', count: 2 });
    expect(fetcher).toHaveBeenCalledWith('https://sub.example/list', 500);

    const [stored] = manager.list();
    expect(stored.profiles.map(p => p.name)).toEqual(['T1', 'S2']);
    expect(typeof stored.updated_at).toBe('string');
  });

  test('fetch errors are reported, not thrown', async () => {
    const id = manager.add('Main', 'https://sub.example/list') ?? '';
    fetcher.mockRejectedValueOnce(new Error('HTTP 500'));

    expect(await manager.update(id)).toEqual({ success: false, message: 'HTTP 500', count: 0 });
    expect(manager.list()[0].profiles).toEqual([]);
  });

  test('unknown subscriptions', async () => {
    expect(await manager.update('nope')).toEqual({ success: false, message: 'Subscription not found: nope', count: 0 });
  });

  test('remove', () => {
    const id = manager.add('Main', 'https://sub.example/list') ?? '';
    expect(manager.remove(id)).toBe(true);
    expect(manager.list()).toEqual([]);
  });
});
