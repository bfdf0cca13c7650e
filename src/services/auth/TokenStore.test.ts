import fs from 'fs';
import os from 'os';
import path from 'path';
import { FileTokenStore } from './TokenStore';
import { generatePkceState } from './pkce';
import { TokenRecord } from '../../types/music';

describe('FileTokenStore', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'playlist-bridge-'));
    file = path.join(dir, 'nested', 'tidal_token.json');
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  const record: TokenRecord = {
    accessToken: 'test-access',
    refreshToken: 'test-refresh',
    expiresAt: 1_700_000_000_000,
    scope: ['playlists.read', 'playlists.write'],
  };

  test('reads a missing file as no record', async () => {
    const store = new FileTokenStore(file);
    expect(await store.load()).toBeNull();
    expect(await store.loadPendingAuth()).toBeNull();
  });

  test('round-trips a record using snake_case keys on disk', async () => {
    const store = new FileTokenStore(file);
    await store.save(record);

    const onDisk: unknown = JSON.parse(await fs.promises.readFile(file, 'utf-8'));
    expect(onDisk).toEqual({
      access_token: 'test-access',
      refresh_token: 'test-refresh',
      expires_at: 1_700_000_000_000,
      scope: ['playlists.read', 'playlists.write'],
    });
    expect(await new FileTokenStore(file).load()).toEqual(record);
  });

  test('treats a corrupt file as no record', async () => {
    await fs.promises.mkdir(path.dirname(file), { recursive: true });
    await fs.promises.writeFile(file, '{not json', 'utf-8');

    expect(await new FileTokenStore(file).load()).toBeNull();
  });

  test('treats a file with the wrong shape as no record', async () => {
    await fs.promises.mkdir(path.dirname(file), { recursive: true });
    await fs.promises.writeFile(file, JSON.stringify({ access_token: 42 }), 'utf-8');

    expect(await new FileTokenStore(file).load()).toBeNull();
  });

  test('keeps a pending authorization across saves until it is cleared', async () => {
    const store = new FileTokenStore(file);
    const pending = generatePkceState();

    await store.savePendingAuth(pending);
    await store.save(record);
    expect(await store.loadPendingAuth()).toEqual(pending);
    expect(await store.load()).toEqual(record);

    await store.savePendingAuth(null);
    expect(await store.loadPendingAuth()).toBeNull();
    expect(await store.load()).toEqual(record);
  });

  test('clear removes the file', async () => {
    const store = new FileTokenStore(file);
    await store.save(record);
    await store.clear();

    expect(fs.existsSync(file)).toBe(false);
    expect(await store.load()).toBeNull();
  });

  test('uses the resolved path as the account key', () => {
    expect(new FileTokenStore('cache/a.json').key).toBe(path.resolve('cache/a.json'));
  });
});
