import fs from 'fs';
import path from 'path';
import { StorageClient } from '../types/storage.js';
import { TaskDescriptor, TransferDirection } from '../types/transfer.js';
import { EnumerationError, ErrorHandler } from '../utils/errorHandler.js';

/**
 * Normalizes a key prefix: no leading slash, trailing slash when non-empty
 */
export function normalizePrefix(prefix?: string): string {
  if (!prefix || prefix.trim() === '') {
    return '';
  }

  let cleanPrefix = prefix.trim();
  if (cleanPrefix.startsWith('/')) {
    cleanPrefix = cleanPrefix.slice(1);
  }

  if (cleanPrefix && !cleanPrefix.endsWith('/')) {
    cleanPrefix += '/';
  }

  return cleanPrefix;
}

/**
 * Builds an object key from an optional prefix and a file name
 */
export function constructKey(prefix: string | undefined, filename: string): string {
  return normalizePrefix(prefix) + filename;
}

export function createTaskDescriptor(
  container: string,
  objectName: string,
  localPath: string,
  direction: TransferDirection
): TaskDescriptor {
  return Object.freeze({ container, objectName, localPath, direction });
}

function byObjectName(a: TaskDescriptor, b: TaskDescriptor): number {
  if (a.objectName < b.objectName) return -1;
  if (a.objectName > b.objectName) return 1;
  return 0;
}

/**
 * Lists the regular files directly under a directory as upload tasks.
 * Sub-directories are skipped, not traversed.
 */
export async function enumerateLocalDirectory(
  container: string,
  directoryPath: string,
  keyPrefix?: string
): Promise<TaskDescriptor[]> {
  const absoluteDir = path.resolve(directoryPath);

  let entries: fs.Dirent[];
  try {
    const stats = await fs.promises.stat(absoluteDir);
    if (!stats.isDirectory()) {
      throw new EnumerationError(`Path '${directoryPath}' is not a directory`);
    }
    entries = await fs.promises.readdir(absoluteDir, { withFileTypes: true });
  } catch (error) {
    if (error instanceof EnumerationError) {
      throw error;
    }
    throw new EnumerationError(
      `Cannot list directory '${directoryPath}': ${ErrorHandler.formatErrorMessage(error)}`,
      error
    );
  }

  const tasks: TaskDescriptor[] = [];
  for (const entry of entries) {
    const filePath = path.join(absoluteDir, entry.name);

    if (entry.isSymbolicLink()) {
      try {
        const target = await fs.promises.stat(filePath);
        if (!target.isFile()) {
          continue;
        }
      } catch (error) {
        console.warn(`Skipping unreadable link ${filePath}: ${ErrorHandler.formatErrorMessage(error)}`);
        continue;
      }
    } else if (!entry.isFile()) {
      continue;
    }

    tasks.push(createTaskDescriptor(container, constructKey(keyPrefix, entry.name), filePath, 'upload'));
  }

  return tasks.sort(byObjectName);
}

/**
 * Lists every object in a container as download tasks rooted at destinationDir.
 * With a key prefix, only keys under it are listed and the prefix is stripped locally.
 * Folder marker keys (ending in '/') carry no data and are skipped.
 */
export async function enumerateRemoteContainer(
  storageClient: StorageClient,
  container: string,
  destinationDir: string,
  keyPrefix?: string
): Promise<TaskDescriptor[]> {
  const prefix = normalizePrefix(keyPrefix);

  let objectNames: string[];
  try {
    objectNames = await storageClient.listObjects(container, prefix || undefined);
  } catch (error) {
    throw new EnumerationError(
      `Cannot list objects in container '${container}': ${ErrorHandler.formatErrorMessage(error)}`,
      error
    );
  }

  const absoluteDir = path.resolve(destinationDir);
  const tasks: TaskDescriptor[] = [];
  for (const objectName of new Set(objectNames)) {
    if (objectName.endsWith('/')) {
      continue;
    }
    const relativeName = prefix && objectName.startsWith(prefix) ? objectName.slice(prefix.length) : objectName;
    tasks.push(createTaskDescriptor(container, objectName, path.join(absoluteDir, relativeName), 'download'));
  }

  return tasks.sort(byObjectName);
}

/**
 * Maps each task whose localPath was already claimed by an earlier task
 * (object names such as `a/../b` and `b` resolve to the same file)
 * to the object name that claimed it first.
 */
export function findLocalPathCollisions(tasks: readonly TaskDescriptor[]): Map<string, string> {
  const claimedBy = new Map<string, string>();
  const collisions = new Map<string, string>();

  for (const task of tasks) {
    const resolvedPath = path.resolve(task.localPath);
    const owner = claimedBy.get(resolvedPath);
    if (owner === undefined) {
      claimedBy.set(resolvedPath, task.objectName);
    } else {
      collisions.set(task.objectName, owner);
    }
  }

  return collisions;
}
