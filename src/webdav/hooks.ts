import type { Logger } from '../logging/logger.js';

/**
 * Lets the embedding application veto mutations. Paths are absolute
 * filesystem paths inside the upload directory. May be called concurrently.
 */
export interface AuthorizationHooks {
  /** The upload is complete and can be inspected at `temporaryPath`. */
  shouldUploadFileAtPath(path: string, temporaryPath: string): boolean | Promise<boolean>;
  shouldMoveItem(fromPath: string, toPath: string): boolean | Promise<boolean>;
  shouldCopyItem(fromPath: string, toPath: string): boolean | Promise<boolean>;
  shouldDeleteItemAtPath(path: string): boolean | Promise<boolean>;
  shouldCreateDirectoryAtPath(path: string): boolean | Promise<boolean>;
}

/**
 * Told about completed operations, one call at a time, in completion order.
 */
export interface NotificationHooks {
  didDownloadFileAtPath(path: string): void | Promise<void>;
  didUploadFileAtPath(path: string): void | Promise<void>;
  didMoveItem(fromPath: string, toPath: string): void | Promise<void>;
  didCopyItem(fromPath: string, toPath: string): void | Promise<void>;
  didDeleteItemAtPath(path: string): void | Promise<void>;
  didCreateDirectoryAtPath(path: string): void | Promise<void>;
}

export const allowAll: AuthorizationHooks = {
  shouldUploadFileAtPath: () => true,
  shouldMoveItem: () => true,
  shouldCopyItem: () => true,
  shouldDeleteItemAtPath: () => true,
  shouldCreateDirectoryAtPath: () => true,
};

export const ignoreNotifications: NotificationHooks = {
  didDownloadFileAtPath: () => {},
  didUploadFileAtPath: () => {},
  didMoveItem: () => {},
  didCopyItem: () => {},
  didDeleteItemAtPath: () => {},
  didCreateDirectoryAtPath: () => {},
};

export function resolveAuthorizationHooks(hooks: Partial<AuthorizationHooks> = {}): AuthorizationHooks {
  return { ...allowAll, ...hooks };
}

export type Notification =
  | { type: 'download'; path: string }
  | { type: 'upload'; path: string }
  | { type: 'move'; fromPath: string; toPath: string }
  | { type: 'copy'; fromPath: string; toPath: string }
  | { type: 'delete'; path: string }
  | { type: 'create-directory'; path: string };

/**
 * Delivers notifications strictly one after another even though the handlers
 * that produce them run concurrently.
 */
export class NotificationDispatcher {
  private hooks: NotificationHooks;
  private queue: Promise<void> = Promise.resolve();

  constructor(
    hooks: Partial<NotificationHooks>,
    private logger: Logger
  ) {
    this.hooks = { ...ignoreNotifications, ...hooks };
  }

  notify(notification: Notification): void {
    this.queue = this.queue.then(async () => {
      try {
        await this.deliver(notification);
      } catch (error) {
        this.logger.error(`Notification ${notification.type} failed`, error);
      }
    });
  }

  /** Resolves once every queued notification has been delivered. */
  idle(): Promise<void> {
    return this.queue;
  }

  private deliver(notification: Notification): void | Promise<void> {
    switch (notification.type) {
      case 'download':
        return this.hooks.didDownloadFileAtPath(notification.path);
      case 'upload':
        return this.hooks.didUploadFileAtPath(notification.path);
      case 'move':
        return this.hooks.didMoveItem(notification.fromPath, notification.toPath);
      case 'copy':
        return this.hooks.didCopyItem(notification.fromPath, notification.toPath);
      case 'delete':
        return this.hooks.didDeleteItemAtPath(notification.path);
      case 'create-directory':
        return this.hooks.didCreateDirectoryAtPath(notification.path);
    }
  }
}
