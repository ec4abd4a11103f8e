/**
 * Cache Strategies Tests
 * Unit tests for the file and memory cache stores
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FileCacheStore, MemoryCacheStore } from '../cache.strategies';
import { CacheEntry } from '../cache.types';

const KEY = 'a'.repeat(64);

const entry: CacheEntry = {
  urlHash: KEY,
  url: 'https://docs.example.com/guide',
  finalUrl: 'https://docs.example.com/guide',
  html: '<p>Guide</p>',
  statusCode: 200,
  contentType: 'text/html',
  fetchedAt: '2026-01-01T00:00:00.000Z',
};

describe('FileCacheStore', () => {
  let directory: string;
  let store: FileCacheStore;

  beforeEach(() => {
    directory = path.join(fs.mkdtempSync(path.join(os.tmpdir(), 'file-store-')), 'nested');
    store = new FileCacheStore(directory);
  });

  afterEach(() => {
    fs.rmSync(path.dirname(directory), { recursive: true, force: true });
  });

  it('should return null before anything was written', () => {
    expect(store.read(KEY)).toBeNull();
    expect(store.size()).toBe(0);
  });

  it('should create the directory on first write', () => {
    store.write(KEY, entry);

    expect(fs.existsSync(directory)).toBe(true);
    expect(store.read(KEY)).toEqual(entry);
  });

  it('should leave no temporary files behind', () => {
    store.write(KEY, entry);
    store.write(KEY, { ...entry, html: '<p>Updated</p>' });

    expect(fs.readdirSync(directory)).toEqual([`${KEY}.json`]);
    expect(store.read(KEY)).toEqual({ ...entry, html: '<p>Updated</p>' });
  });

  it('should throw on corrupt JSON', () => {
    fs.mkdirSync(directory, { recursive: true });
    fs.writeFileSync(path.join(directory, `${KEY}.json`), 'not json');

    expect(() => store.read(KEY)).toThrow();
  });

  it('should only count and clear entry files', () => {
    store.write(KEY, entry);
    store.write('b'.repeat(64), entry);
    fs.writeFileSync(path.join(directory, 'README.txt'), 'keep me');

    expect(store.size()).toBe(2);
    store.clear();

    expect(store.size()).toBe(0);
    expect(fs.readdirSync(directory)).toEqual(['README.txt']);
  });

  it('should describe itself by absolute directory', () => {
    expect(store.describe()).toBe(path.resolve(directory));
  });
});

describe('MemoryCacheStore', () => {
  it('should read back, count and clear entries', () => {
    const store = new MemoryCacheStore();
    expect(store.read(KEY)).toBeNull();

    store.write(KEY, entry);
    expect(store.read(KEY)).toBe(entry);
    expect(store.size()).toBe(1);
    expect(store.describe()).toBe('memory');

    store.clear();
    expect(store.size()).toBe(0);
  });
});
