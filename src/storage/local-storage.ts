import { createReadStream } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import type { Readable } from 'stream';
import { v4 as uuidv4 } from 'uuid';
import type { Logger } from '../logging/logger.js';
import type { ResourceInfo, StorageLayer } from './types.js';

export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * StorageLayer over the local disk.
 */
export class LocalStorage implements StorageLayer {
  constructor(private logger: Logger) {}

  async stat(target: string): Promise<ResourceInfo | null> {
    try {
      const stats = await fs.stat(target);
      return {
        kind: stats.isDirectory() ? 'collection' : 'file',
        size: stats.isDirectory() ? 0 : stats.size,
        lastModified: stats.mtime,
        created: stats.birthtimeMs > 0 ? stats.birthtime : null,
      };
    } catch (error) {
      const code = errorCode(error);
      if (code === 'ENOENT' || code === 'ENOTDIR') {
        return null;
      }
      throw error;
    }
  }

  async list(target: string): Promise<string[]> {
    return fs.readdir(target);
  }

  async realpath(target: string): Promise<string> {
    return fs.realpath(target);
  }

  async createDirectory(target: string): Promise<void> {
    this.logger.trace('filesystem', `mkdir ${target}`);
    await fs.mkdir(target);
  }

  async remove(target: string): Promise<void> {
    this.logger.trace('filesystem', `rm -r ${target}`);
    await fs.rm(target, { recursive: true });
  }

  async copy(from: string, to: string): Promise<void> {
    this.logger.trace('filesystem', `cp -r ${from} ${to}`);
    await fs.cp(from, to, { recursive: true, errorOnExist: true, force: false, preserveTimestamps: true });
  }

  async move(from: string, to: string): Promise<void> {
    this.logger.trace('filesystem', `mv ${from} ${to}`);
    try {
      await fs.rename(from, to);
    } catch (error) {
      if (errorCode(error) !== 'EXDEV') {
        throw error;
      }
      // Different volumes: the source is only removed once the copy is complete
      await fs.cp(from, to, { recursive: true, errorOnExist: true, force: false, preserveTimestamps: true });
      await fs.rm(from, { recursive: true });
    }
  }

  async commitUpload(temporaryPath: string, destination: string): Promise<void> {
    this.logger.trace('filesystem', `commit upload ${temporaryPath} -> ${destination}`);
    try {
      await fs.rename(temporaryPath, destination);
    } catch (error) {
      if (errorCode(error) !== 'EXDEV') {
        throw error;
      }
      // Stage next to the destination so the final step is still a same-volume rename
      const staged = path.join(path.dirname(destination), `.${path.basename(destination)}.${uuidv4()}.upload`);
      try {
        await fs.copyFile(temporaryPath, staged);
        await fs.rename(staged, destination);
      } catch (copyError) {
        await fs.rm(staged, { force: true });
        throw copyError;
      }
      await fs.rm(temporaryPath, { force: true });
    }
  }

  async discard(temporaryPath: string): Promise<void> {
    this.logger.trace('filesystem', `discard ${temporaryPath}`);
    await fs.rm(temporaryPath, { force: true });
  }

  createReadStream(target: string, range?: { start: number; end: number }): Readable {
    return range ? createReadStream(target, { start: range.start, end: range.end }) : createReadStream(target);
  }
}
