import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  enumerateLocalDirectory,
  enumerateRemoteContainer,
  createTaskDescriptor,
  findLocalPathCollisions,
  normalizePrefix,
  constructKey,
} from './TaskEnumerator.js';
import { InMemoryStorageClient } from '../test/InMemoryStorageClient.js';
import { EnumerationError, StorageError } from '../utils/errorHandler.js';

describe('TaskEnumerator', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'batch-enumerator-test-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  });

  describe('enumerateLocalDirectory', () => {
    it('should list regular files and skip sub-directories', async () => {
      await fs.promises.writeFile(path.join(tempDir, 'c.txt'), 'c');
      await fs.promises.writeFile(path.join(tempDir, 'a.txt'), 'a');
      await fs.promises.writeFile(path.join(tempDir, 'b.txt'), 'b');
      await fs.promises.mkdir(path.join(tempDir, 'nested'));
      await fs.promises.writeFile(path.join(tempDir, 'nested', 'd.txt'), 'd');

      const tasks = await enumerateLocalDirectory('test-container', tempDir);

      expect(tasks).toHaveLength(3);
      expect(tasks.map((t) => t.objectName)).toEqual(['a.txt', 'b.txt', 'c.txt']);
      expect(tasks[0]).toEqual({
        container: 'test-container',
        objectName: 'a.txt',
        localPath: path.join(tempDir, 'a.txt'),
        direction: 'upload',
      });
      expect(Object.isFrozen(tasks[0])).toBe(true);
    });

    it('should resolve relative directories to absolute file paths', async () => {
      await fs.promises.writeFile(path.join(tempDir, 'file.bin'), 'data');
      const relativeDir = path.relative(process.cwd(), tempDir);

      const tasks = await enumerateLocalDirectory('test-container', relativeDir);

      expect(path.isAbsolute(tasks[0].localPath)).toBe(true);
      expect(tasks[0].localPath).toBe(path.join(path.resolve(tempDir), 'file.bin'));
    });

    it('should apply a key prefix to object names', async () => {
      await fs.promises.writeFile(path.join(tempDir, 'photo.jpg'), 'jpg');

      const tasks = await enumerateLocalDirectory('test-container', tempDir, 'backups/2024');

      expect(tasks[0].objectName).toBe('backups/2024/photo.jpg');
    });

    it('should follow links to files and skip broken links', async () => {
      const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const outside = path.join(tempDir, 'outside');
      const source = path.join(tempDir, 'source');
      await fs.promises.mkdir(outside);
      await fs.promises.mkdir(source);
      await fs.promises.writeFile(path.join(outside, 'real.txt'), 'real');
      await fs.promises.symlink(path.join(outside, 'real.txt'), path.join(source, 'linked.txt'));
      await fs.promises.symlink(path.join(outside, 'missing.txt'), path.join(source, 'broken.txt'));
      await fs.promises.symlink(outside, path.join(source, 'linked-dir'));

      const tasks = await enumerateLocalDirectory('test-container', source);

      expect(tasks.map((t) => t.objectName)).toEqual(['linked.txt']);
      expect(warnSpy).toHaveBeenCalledTimes(1);
    });

    it('should return no tasks for an empty directory', async () => {
      await expect(enumerateLocalDirectory('test-container', tempDir)).resolves.toEqual([]);
    });

    it('should throw EnumerationError when the directory does not exist', async () => {
      const missing = path.join(tempDir, 'does-not-exist');

      await expect(enumerateLocalDirectory('test-container', missing)).rejects.toBeInstanceOf(EnumerationError);
    });

    it('should throw EnumerationError when the path is a file', async () => {
      const filePath = path.join(tempDir, 'plain.txt');
      await fs.promises.writeFile(filePath, 'x');

      await expect(enumerateLocalDirectory('test-container', filePath)).rejects.toThrow(
        `Path '${filePath}' is not a directory`
      );
    });
  });

  describe('enumerateRemoteContainer', () => {
    let storage: InMemoryStorageClient;

    beforeEach(() => {
      storage = new InMemoryStorageClient();
    });

    it('should map every object to a download task under the destination', async () => {
      storage.seedObject('test-container', 'z', 'z');
      storage.seedObject('test-container', 'x', 'x');
      storage.seedObject('test-container', 'y', 'y');

      const tasks = await enumerateRemoteContainer(storage, 'test-container', tempDir);

      expect(tasks.map((t) => t.objectName)).toEqual(['x', 'y', 'z']);
      expect(tasks[1]).toEqual({
        container: 'test-container',
        objectName: 'y',
        localPath: path.join(tempDir, 'y'),
        direction: 'download',
      });
    });

    it('should strip the key prefix from local paths', async () => {
      storage.seedObject('test-container', 'backups/a.txt', 'a');
      storage.seedObject('test-container', 'backups/deep/b.txt', 'b');
      storage.seedObject('test-container', 'other/c.txt', 'c');

      const tasks = await enumerateRemoteContainer(storage, 'test-container', tempDir, '/backups');

      expect(tasks.map((t) => t.objectName)).toEqual(['backups/a.txt', 'backups/deep/b.txt']);
      expect(tasks.map((t) => t.localPath)).toEqual([
        path.join(tempDir, 'a.txt'),
        path.join(tempDir, 'deep', 'b.txt'),
      ]);
    });

    it('should collapse duplicate names from the listing', async () => {
      const listing = vi.spyOn(storage, 'listObjects').mockResolvedValue(['b', 'a', 'b']);

      const tasks = await enumerateRemoteContainer(storage, 'test-container', tempDir);

      expect(listing).toHaveBeenCalledWith('test-container', undefined);
      expect(tasks.map((t) => t.objectName)).toEqual(['a', 'b']);
    });

    it('should skip folder marker keys', async () => {
      vi.spyOn(storage, 'listObjects').mockResolvedValue(['backups/', 'backups/a.txt', 'backups/logs/']);

      const tasks = await enumerateRemoteContainer(storage, 'test-container', tempDir, 'backups');

      expect(tasks.map((t) => t.objectName)).toEqual(['backups/a.txt']);
      expect(tasks[0].localPath).toBe(path.join(tempDir, 'a.txt'));
    });

    it('should throw EnumerationError when listing fails', async () => {
      storage.failListing(new StorageError("Container 'test-container' does not exist"));

      const attempt = enumerateRemoteContainer(storage, 'test-container', tempDir);

      await expect(attempt).rejects.toBeInstanceOf(EnumerationError);
      await expect(attempt).rejects.toThrow(
        "Cannot list objects in container 'test-container': Container 'test-container' does not exist"
      );
    });
  });

  describe('findLocalPathCollisions', () => {
    it('should map later tasks to the object that claimed their path first', () => {
      const tasks = ['a/../b', 'b', 'c//d', 'c/d', 'e'].map((name) =>
        createTaskDescriptor('test-container', name, path.join('/srv/downloads', name), 'download')
      );

      const collisions = findLocalPathCollisions(tasks);

      expect(Array.from(collisions.entries())).toEqual([
        ['b', 'a/../b'],
        ['c/d', 'c//d'],
      ]);
    });

    it('should report nothing when every path is distinct', () => {
      const tasks = ['x', 'y'].map((name) =>
        createTaskDescriptor('test-container', name, path.join('/srv/downloads', name), 'download')
      );

      expect(findLocalPathCollisions(tasks).size).toBe(0);
    });
  });

  describe('Key prefixes', () => {
    it('should normalize prefixes', () => {
      expect(normalizePrefix(undefined)).toBe('');
      expect(normalizePrefix('   ')).toBe('');
      expect(normalizePrefix('logs')).toBe('logs/');
      expect(normalizePrefix('/logs/')).toBe('logs/');
      expect(normalizePrefix(' logs/2024 ')).toBe('logs/2024/');
    });

    it('should construct keys from prefix and filename', () => {
      expect(constructKey(undefined, 'a.txt')).toBe('a.txt');
      expect(constructKey('logs', 'a.txt')).toBe('logs/a.txt');
    });
  });
});
