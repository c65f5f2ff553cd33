// Configuration types and presets for the folderdav server

export interface ServerConfig {
  port: number;
  host: string;
}

export interface TimeoutConfig {
  request: number;        // General request timeout (ms)
  upload: number;         // PUT body timeout (ms)
}

export interface StorageConfig {
  /** Lower-case extensions without the leading dot. Empty means every extension is allowed. */
  allowedFileExtensions: string[];
  allowHiddenItems: boolean;
  /** Where PUT bodies are spooled before being renamed into place. Defaults to the OS temp directory. */
  temporaryDirectory?: string;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggingConfig {
  enabled: boolean;
  level: LogLevel;
  requests: boolean;
  responses: boolean;
  filesystem: boolean;
  xml: boolean;
  locks: boolean;
}

export interface WebDAVFeatureConfig {
  defaultLockTimeout: number; // seconds
  maxLockTimeout: number;     // seconds
  lockSweepInterval: number;  // ms
}

export interface ResponseConfig {
  customHeaders: Record<string, string>;
  enableDirectoryListing: boolean;
}

export interface PerformanceConfig {
  maxRequestSize: string;
}

export interface WebDAVConfig {
  server: ServerConfig;
  timeouts: TimeoutConfig;
  storage: StorageConfig;
  logging: LoggingConfig;
  webdav: WebDAVFeatureConfig;
  response: ResponseConfig;
  performance: PerformanceConfig;
}

/** Every section may be given partially; missing keys come from the defaults. */
export type WebDAVConfigOverrides = {
  [K in keyof WebDAVConfig]?: Partial<WebDAVConfig[K]>;
};

export const defaultConfig: WebDAVConfig = {
  server: {
    port: 8080,
    host: 'localhost',
  },
  timeouts: {
    request: 30000,     // 30 seconds for general requests
    upload: 300000,     // 5 minutes for file uploads
  },
  storage: {
    allowedFileExtensions: [],
    allowHiddenItems: false,
  },
  logging: {
    enabled: true,
    level: 'info',
    requests: false,
    responses: false,
    filesystem: false,
    xml: false,
    locks: false,
  },
  webdav: {
    defaultLockTimeout: 600,
    maxLockTimeout: 3600,
    lockSweepInterval: 60000,
  },
  response: {
    customHeaders: {},
    enableDirectoryListing: true,
  },
  performance: {
    maxRequestSize: '10mb',
  },
};

export const configPresets = {
  production: (port: number = 80): WebDAVConfigOverrides => ({
    server: {
      port,
      host: '0.0.0.0',
    },
    timeouts: {
      request: 60000,      // 1 minute for general requests
      upload: 1800000,     // 30 minutes for large file uploads
    },
    logging: {
      enabled: true,
      level: 'warn',
      requests: false,
      responses: false,
      filesystem: false,
      xml: false,
      locks: true,
    },
    response: {
      enableDirectoryListing: false,
    },
  }),

  // Development configuration with full logging
  development: (port: number = 8080): WebDAVConfigOverrides => ({
    server: {
      port,
      host: 'localhost',
    },
    timeouts: {
      request: 30000,
      upload: 600000,      // 10 minutes for file uploads
    },
    logging: {
      enabled: true,
      level: 'debug',
      requests: true,
      responses: false,
      filesystem: true,
      xml: false,
      locks: true,
    },
    response: {
      customHeaders: {
        'X-WebDAV-Server': 'Development Mode',
      },
      enableDirectoryListing: true,
    },
  }),
};

// Section-wise merge: later layers win key by key
export function mergeConfig(...layers: WebDAVConfigOverrides[]): WebDAVConfig {
  const result: WebDAVConfig = {
    server: { ...defaultConfig.server },
    timeouts: { ...defaultConfig.timeouts },
    storage: { ...defaultConfig.storage },
    logging: { ...defaultConfig.logging },
    webdav: { ...defaultConfig.webdav },
    response: { ...defaultConfig.response },
    performance: { ...defaultConfig.performance },
  };

  for (const layer of layers) {
    if (layer.server) result.server = { ...result.server, ...layer.server };
    if (layer.timeouts) result.timeouts = { ...result.timeouts, ...layer.timeouts };
    if (layer.storage) result.storage = { ...result.storage, ...layer.storage };
    if (layer.logging) result.logging = { ...result.logging, ...layer.logging };
    if (layer.webdav) result.webdav = { ...result.webdav, ...layer.webdav };
    if (layer.response) result.response = { ...result.response, ...layer.response };
    if (layer.performance) result.performance = { ...result.performance, ...layer.performance };
  }

  result.storage.allowedFileExtensions = normalizeExtensions(result.storage.allowedFileExtensions);
  return result;
}

export function normalizeExtensions(extensions: string[]): string[] {
  return extensions
    .map(extension => extension.trim().replace(/^\.+/, '').toLowerCase())
    .filter(extension => extension.length > 0);
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

// Validation functions
export function validateConfig(config: WebDAVConfigOverrides): string[] {
  const errors: string[] = [];

  if (config.server?.port !== undefined && (!Number.isInteger(config.server.port) || config.server.port < 0 || config.server.port > 65535)) {
    errors.push('Server port must be between 0 and 65535');
  }

  if (config.timeouts?.request !== undefined && config.timeouts.request < 1000) {
    errors.push('Request timeout must be at least 1000ms');
  }

  if (config.timeouts?.upload !== undefined && config.timeouts.upload < 1000) {
    errors.push('Upload timeout must be at least 1000ms');
  }

  if (config.logging?.level !== undefined && !isLogLevel(config.logging.level)) {
    errors.push('Logging level must be one of: debug, info, warn, error');
  }

  const { defaultLockTimeout, maxLockTimeout } = config.webdav ?? {};
  if (defaultLockTimeout !== undefined && defaultLockTimeout < 1) {
    errors.push('Default lock timeout must be at least 1 second');
  }
  if (maxLockTimeout !== undefined && maxLockTimeout < 1) {
    errors.push('Maximum lock timeout must be at least 1 second');
  }
  if (defaultLockTimeout !== undefined && maxLockTimeout !== undefined && defaultLockTimeout > maxLockTimeout) {
    errors.push('Default lock timeout cannot exceed the maximum lock timeout');
  }

  for (const extension of config.storage?.allowedFileExtensions ?? []) {
    if (/[\\/]/.test(extension)) {
      errors.push(`Invalid file extension: ${extension}`);
    }
  }

  return errors;
}
