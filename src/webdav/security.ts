import path from 'path';
import { errorCode } from '../storage/local-storage.js';
import type { StorageLayer } from '../storage/types.js';
import { BadRequestError, PathRejectedError } from './errors.js';
import type { AuthorizedPath } from './types.js';

export interface SecurityGateOptions {
  uploadDirectory: string;
  allowedFileExtensions: string[];
  allowHiddenItems: boolean;
}

/**
 * Decides whether a request path may be served at all. The lexical checks
 * (decoding, traversal, hidden components) run before the storage is touched;
 * the symlink check only reads.
 */
export class SecurityGate {
  readonly root: string;
  private allowedExtensions: Set<string>;
  private allowHiddenItems: boolean;
  private realRoot: Promise<string> | null = null;

  constructor(
    private storage: StorageLayer,
    options: SecurityGateOptions
  ) {
    this.root = path.resolve(options.uploadDirectory);
    this.allowedExtensions = new Set(options.allowedFileExtensions.map(extension => extension.toLowerCase()));
    this.allowHiddenItems = options.allowHiddenItems;
  }

  async authorize(encodedPath: string): Promise<AuthorizedPath> {
    const authorized = this.resolve(encodedPath);
    await this.assertRealPathContained(authorized.absolute);
    return authorized;
  }

  /** Lexical part of {@link authorize}: no filesystem access. */
  resolve(encodedPath: string): AuthorizedPath {
    let decoded: string;
    try {
      decoded = decodeURIComponent(encodedPath);
    } catch {
      throw new BadRequestError('Malformed path encoding');
    }

    if (decoded.includes('\0')) {
      throw new PathRejectedError();
    }

    const segments = decoded.split('/').filter(segment => segment.length > 0 && segment !== '.');
    if (segments.some(segment => segment === '..')) {
      throw new PathRejectedError('Path traversal is not allowed');
    }
    if (!this.allowHiddenItems && segments.some(segment => segment.startsWith('.'))) {
      throw new PathRejectedError('Hidden items are not allowed');
    }

    const relative = path.posix.normalize('/' + segments.join('/'));
    const absolute = path.join(this.root, ...relative.split('/').filter(segment => segment.length > 0));
    if (!this.contains(this.root, absolute)) {
      throw new PathRejectedError('Path escapes the upload directory');
    }

    return { relative, absolute };
  }

  isFileExtensionAllowed(name: string): boolean {
    if (this.allowedExtensions.size === 0) {
      return true;
    }
    const extension = path.extname(name).slice(1).toLowerCase();
    return this.allowedExtensions.has(extension);
  }

  checkFileExtension(target: AuthorizedPath): void {
    if (!this.isFileExtensionAllowed(path.basename(target.absolute))) {
      throw new PathRejectedError('File extension not allowed');
    }
  }

  /** Listing filter: children a client may see inside an authorized collection. */
  isVisibleChild(name: string, kind: 'file' | 'collection'): boolean {
    if (!this.allowHiddenItems && name.startsWith('.')) {
      return false;
    }
    return kind === 'collection' || this.isFileExtensionAllowed(name);
  }

  /** Whether a listed entry, with symlinks followed, still lives under the root. */
  async isContainedChild(absolute: string): Promise<boolean> {
    const realRoot = await this.getRealRoot();
    try {
      return this.contains(realRoot, await this.storage.realpath(absolute));
    } catch (error) {
      const code = errorCode(error);
      if (code === 'ENOENT' || code === 'ENOTDIR') {
        return false;
      }
      throw error;
    }
  }

  private async assertRealPathContained(absolute: string): Promise<void> {
    const realRoot = await this.getRealRoot();

    // Walk up to the deepest ancestor that exists and see where it really lives
    let candidate = absolute;
    for (;;) {
      try {
        const real = await this.storage.realpath(candidate);
        if (!this.contains(realRoot, real)) {
          throw new PathRejectedError('Path escapes the upload directory');
        }
        return;
      } catch (error) {
        const code = errorCode(error);
        if (code !== 'ENOENT' && code !== 'ENOTDIR') {
          throw error;
        }
        const parent = path.dirname(candidate);
        if (parent === candidate || !this.contains(this.root, parent)) {
          return;
        }
        candidate = parent;
      }
    }
  }

  private getRealRoot(): Promise<string> {
    if (!this.realRoot) {
      this.realRoot = this.storage.realpath(this.root).catch(() => this.root);
    }
    return this.realRoot;
  }

  private contains(root: string, candidate: string): boolean {
    return candidate === root || candidate.startsWith(root.endsWith(path.sep) ? root : root + path.sep);
  }
}
