/**
 * @fileoverview folderdav - WebDAV access to a local directory for Express applications
 * @license MIT
 *
 * Serves one upload directory over WebDAV class 1 with advisory class 2
 * locking, so that Finder, Windows Explorer and other file-manager clients can
 * mount it.
 */

// Core exports for library usage
export { createWebDAVMiddleware, StandaloneWebDAVServer } from './src/server/embeddable.js';
export type { WebDAVMiddlewareOptions } from './src/server/embeddable.js';
export { WebDAVServer } from './src/webdav/server.js';
export type { WebDAVServerOptions } from './src/webdav/server.js';
export type { AuthorizationHooks, NotificationHooks } from './src/webdav/hooks.js';
export type { DavRequest, DavResponse, WebDAVLock } from './src/webdav/types.js';
export { DavError } from './src/webdav/errors.js';
export { LocalStorage } from './src/storage/local-storage.js';
export type { StorageLayer, ResourceInfo } from './src/storage/types.js';
export type { WebDAVConfig, WebDAVConfigOverrides, TimeoutConfig, StorageConfig } from './src/config/types.js';
export { defaultConfig, configPresets, mergeConfig, validateConfig } from './src/config/types.js';
export { Logger } from './src/logging/logger.js';
