/**
 * Tests for ChunkedWriter
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { WriteError } from '../../domain/errors';
import { SnapshotContent } from '../../domain/models/types';
import { ChunkedWriter, mergeChunks } from '../ChunkedWriter';
import { createLogger } from '../LoggingService';

const logger = createLogger('test');

function entry(day: number, content = 'x'.repeat(100), domain = 'example.com'): SnapshotContent {
  const dd = String(day).padStart(2, '0');
  return {
    url: `https://${domain}/`,
    domain,
    date: `2024-01-${dd}`,
    timestamp: `202401${dd}000000`,
    content,
  };
}

describe('ChunkedWriter', () => {
  let dir: string;
  let outputPath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'chunked-writer-'));
    outputPath = path.join(dir, 'out.json');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should split entries across chunk files once the limit is reached', () => {
    // One entry is about 116 bytes, so every second entry fills a 150-byte chunk
    const writer = new ChunkedWriter({ outputPath, maxChunkBytes: 150 }, logger);

    for (let day = 1; day <= 5; day++) {
      writer.add(entry(day));
    }
    const files = writer.close();

    expect(files.map((file) => path.basename(file))).toEqual(['out_1.json', 'out_2.json', 'out_3.json']);
    expect(Object.keys(mergeChunks([files[0]])['example.com'])).toEqual(['2024-01-01', '2024-01-02']);
    expect(Object.keys(mergeChunks([files[2]])['example.com'])).toEqual(['2024-01-05']);
  });

  it('should write every entry exactly once across chunks', () => {
    const writer = new ChunkedWriter({ outputPath, maxChunkBytes: 300 }, logger);
    const added: SnapshotContent[] = [];

    for (let day = 1; day <= 9; day++) {
      const snapshot = entry(day, `body ${day} `.repeat(10), day % 2 === 0 ? 'example.org' : 'example.com');
      added.push(snapshot);
      writer.add(snapshot);
    }
    const files = writer.close();

    expect(files.length).toBeGreaterThan(1);

    const seen = new Map<string, number>();
    for (const file of files) {
      const chunk = mergeChunks([file]);
      for (const [domain, dates] of Object.entries(chunk)) {
        for (const date of Object.keys(dates)) {
          const key = `${domain}|${date}`;
          seen.set(key, (seen.get(key) ?? 0) + 1);
        }
      }
    }
    expect(Array.from(seen.values()).every((count) => count === 1)).toBe(true);

    const merged = mergeChunks(files);
    for (const snapshot of added) {
      expect(merged[snapshot.domain][snapshot.date]).toBe(snapshot.content);
    }
    expect(seen.size).toBe(added.length);
    expect(writer.entryCount).toBe(9);
  });

  it('should write a single file when everything fits', () => {
    const writer = new ChunkedWriter({ outputPath, maxChunkBytes: 1024 * 1024 }, logger);

    writer.add(entry(1, 'January'));
    writer.add(entry(2, 'February'));
    const files = writer.close();

    expect(files).toEqual([path.join(dir, 'out_1.json')]);
    expect(JSON.parse(fs.readFileSync(files[0], 'utf-8'))).toEqual({
      'example.com': { '2024-01-01': 'January', '2024-01-02': 'February' },
    });
  });

  it('should continue numbering after existing chunks', () => {
    fs.writeFileSync(path.join(dir, 'out_1.json'), '{}');
    fs.writeFileSync(path.join(dir, 'out_7.json'), '{}');
    fs.writeFileSync(path.join(dir, 'other_9.json'), '{}');

    const writer = new ChunkedWriter({ outputPath, maxChunkBytes: 1024 }, logger);
    writer.add(entry(1, 'content'));

    expect(writer.close()).toEqual([path.join(dir, 'out_8.json')]);
  });

  it('should keep the latest content for a repeated date', () => {
    const writer = new ChunkedWriter({ outputPath, maxChunkBytes: 1024 }, logger);

    writer.add(entry(1, 'first'));
    writer.add(entry(1, 'second'));

    expect(writer.pendingCount).toBe(1);
    expect(writer.entryCount).toBe(1);
    expect(mergeChunks(writer.close())).toEqual({ 'example.com': { '2024-01-01': 'second' } });
  });

  it('should keep the first URL when two URLs share a domain and date', () => {
    // A 40-byte limit flushes after every entry
    const writer = new ChunkedWriter({ outputPath, maxChunkBytes: 40 }, logger);

    expect(writer.add(entry(1, 'apex'))).toBe(true);
    expect(writer.add({ ...entry(1, 'www'), url: 'https://www.example.com/' })).toBe(false);
    expect(writer.add({ ...entry(2, 'www next day'), url: 'https://www.example.com/' })).toBe(true);

    const files = writer.close();
    expect(writer.entryCount).toBe(2);
    expect(files).toHaveLength(2);
    expect(mergeChunks(files)).toEqual({ 'example.com': { '2024-01-01': 'apex', '2024-01-02': 'www next day' } });
  });

  it('should write nothing when no entries were added', () => {
    const writer = new ChunkedWriter({ outputPath, maxChunkBytes: 1024 }, logger);

    expect(writer.flush()).toBeNull();
    expect(writer.close()).toEqual([]);
    expect(fs.readdirSync(dir)).toEqual([]);
  });

  it('should keep pending entries when a chunk cannot be written', () => {
    const writer = new ChunkedWriter({ outputPath, maxChunkBytes: 1024 }, logger);
    writer.add(entry(1, 'kept'));
    fs.rmSync(dir, { recursive: true, force: true });

    expect(() => writer.flush()).toThrow(WriteError);
    expect(writer.pendingCount).toBe(1);
    expect(writer.files).toEqual([]);

    fs.mkdirSync(dir, { recursive: true });
    const written = writer.flush();

    expect(written).toBe(path.join(dir, 'out_1.json'));
    expect(mergeChunks(writer.files)).toEqual({ 'example.com': { '2024-01-01': 'kept' } });
  });

  it('should reject a non-positive size limit', () => {
    expect(() => new ChunkedWriter({ outputPath, maxChunkBytes: 0 }, logger)).toThrow(RangeError);
  });
});
