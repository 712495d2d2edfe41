/**
 * Tests for the snapshot body cache
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createLogger } from '../LoggingService';
import { SnapshotStore } from '../SnapshotStore';

describe('SnapshotStore', () => {
  let dir: string;
  let store: SnapshotStore;
  const logger = createLogger('test');

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'snapshot-store-'));
    store = new SnapshotStore(dir, logger);
  });

  afterEach(() => {
    store.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should save a body under the sanitized URL', () => {
    const saved = store.save('https://example.com/robots.txt', '20240110000000', 'D1', 'User-agent: *');

    expect(saved).toBe(path.join(dir, 'example.com_robots.txt', '20240110000000.html'));
    expect(fs.readFileSync(saved, 'utf-8')).toBe('User-agent: *');
  });

  it('should read back a saved body', () => {
    store.save('https://example.com/', '20240110000000', 'D1', '<html>January</html>');

    expect(store.has('https://example.com/', '20240110000000')).toBe(true);
    expect(store.read('https://example.com/', '20240110000000')).toBe('<html>January</html>');
  });

  it('should report unknown captures as missing', () => {
    expect(store.has('https://example.com/', '20240110000000')).toBe(false);
    expect(store.read('https://example.com/', '20240110000000')).toBeNull();
  });

  it('should treat a deleted body file as missing', () => {
    const saved = store.save('https://example.com/', '20240110000000', 'D1', 'body');
    fs.rmSync(saved);

    expect(store.has('https://example.com/', '20240110000000')).toBe(false);
    expect(store.read('https://example.com/', '20240110000000')).toBeNull();
  });

  it('should list snapshots ordered by url and timestamp', () => {
    store.save('https://example.org/', '20240301000000', 'D3', 'c');
    store.save('https://example.com/', '20240215000000', 'D2', 'bb');
    store.save('https://example.com/', '20240110000000', 'D1', 'a');

    const all = store.list();

    expect(all.map((s) => `${s.url}@${s.timestamp}`)).toEqual([
      'https://example.com/@20240110000000',
      'https://example.com/@20240215000000',
      'https://example.org/@20240301000000',
    ]);
    expect(all[1].digest).toBe('D2');
    expect(all[1].sizeBytes).toBe(2);
    expect(store.list('https://example.org/').map((s) => s.timestamp)).toEqual(['20240301000000']);
  });

  it('should replace a capture saved twice', () => {
    store.save('https://example.com/', '20240110000000', 'D1', 'old');
    store.save('https://example.com/', '20240110000000', 'D1', 'new');

    expect(store.count()).toBe(1);
    expect(store.read('https://example.com/', '20240110000000')).toBe('new');
  });

  it('should keep its index across reopening', () => {
    store.save('https://example.com/', '20240110000000', 'D1', 'kept');
    store.close();

    store = new SnapshotStore(dir, logger);

    expect(store.count()).toBe(1);
    expect(store.read('https://example.com/', '20240110000000')).toBe('kept');
  });
});
