#!/usr/bin/env node
import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { StandaloneWebDAVServer } from './src/server/embeddable.js';
import {
  configPresets,
  isLogLevel,
  mergeConfig,
  validateConfig,
  type WebDAVConfigOverrides,
} from './src/config/types.js';

type ServerMode = 'production' | 'development';

interface MainOptions {
  mode?: ServerMode;
  root?: string;
  port?: number;
  host?: string;
  extensions?: string[];
  allowHidden?: boolean;
  debug?: boolean;
}

const USAGE = `
folderdav - serve a directory over WebDAV

USAGE:
  folderdav --root <directory> [options]

MODES:
  production  - Listens on all interfaces (port 80, minimal logging)
  development - Full development features (port 8080, enhanced logging)

COMMAND LINE OPTIONS:
  --root, -r <dir>         Directory to serve (required)
  --mode, -m <mode>        Server mode (default: development)
  --port, -p <port>        Port number (default: mode-specific)
  --host, -h <host>        Host address (default: mode-specific)
  --extensions, -e <list>  Comma separated allowed file extensions (default: all)
  --allow-hidden           Serve files and directories starting with a period
  --debug, -d              Enable debug logging
  --help                   Show this help

ENVIRONMENT VARIABLES:
  FOLDERDAV_ROOT=<dir>          Directory to serve
  FOLDERDAV_MODE=<mode>         Server mode
  FOLDERDAV_PORT=<port>         Port number
  FOLDERDAV_HOST=<host>         Host address
  FOLDERDAV_EXTENSIONS=<list>   Allowed file extensions
  FOLDERDAV_ALLOW_HIDDEN=true   Serve hidden items
  FOLDERDAV_LOG_LEVEL=<level>   debug, info, warn or error

EXAMPLES:
  folderdav --root ./share                          # Development mode
  folderdav --root /srv/dav --mode production       # Production
  folderdav -r ./share -p 9000 -e txt,md --debug    # Custom port, text files only
`;

function parseList(value: string): string[] {
  return value.split(',').map(entry => entry.trim()).filter(entry => entry.length > 0);
}

function parseMode(value: string | undefined): ServerMode | undefined {
  if (value === undefined) return undefined;
  if (value === 'production' || value === 'development') return value;
  throw new Error(`Unknown mode: ${value}`);
}

// Parse command line arguments, then let environment variables fill the gaps
export function parseArgs(args: string[], env: NodeJS.ProcessEnv = {}): MainOptions | 'help' {
  const options: MainOptions = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--root':
      case '-r':
        options.root = args[++i];
        break;
      case '--mode':
      case '-m':
        options.mode = parseMode(args[++i]);
        break;
      case '--port':
      case '-p': {
        const portArg = args[++i];
        if (portArg) options.port = parseInt(portArg, 10);
        break;
      }
      case '--host':
      case '-h': {
        const hostArg = args[++i];
        if (hostArg) options.host = hostArg;
        break;
      }
      case '--extensions':
      case '-e': {
        const listArg = args[++i];
        if (listArg !== undefined) options.extensions = parseList(listArg);
        break;
      }
      case '--allow-hidden':
        options.allowHidden = true;
        break;
      case '--debug':
      case '-d':
        options.debug = true;
        break;
      case '--help':
        return 'help';
      default:
        throw new Error(`Unknown argument: ${arg}`);
    }
  }

  options.root ??= env.FOLDERDAV_ROOT;
  options.mode ??= parseMode(env.FOLDERDAV_MODE);
  if (options.port === undefined && env.FOLDERDAV_PORT) options.port = parseInt(env.FOLDERDAV_PORT, 10);
  options.host ??= env.FOLDERDAV_HOST;
  if (options.extensions === undefined && env.FOLDERDAV_EXTENSIONS) options.extensions = parseList(env.FOLDERDAV_EXTENSIONS);
  options.allowHidden ??= env.FOLDERDAV_ALLOW_HIDDEN === 'true' ? true : undefined;

  return options;
}

export function getServerConfig(options: MainOptions, env: NodeJS.ProcessEnv = {}): WebDAVConfigOverrides {
  const { mode = 'development' } = options;
  const preset = mode === 'production' ? configPresets.production(options.port) : configPresets.development(options.port);
  const base = mergeConfig(preset);

  const envLevel = env.FOLDERDAV_LOG_LEVEL;
  const level = options.debug ? 'debug' : envLevel !== undefined && isLogLevel(envLevel) ? envLevel : base.logging.level;

  return {
    ...preset,
    server: {
      ...base.server,
      ...(options.port !== undefined ? { port: options.port } : {}),
      ...(options.host !== undefined ? { host: options.host } : {}),
    },
    storage: {
      ...base.storage,
      ...(options.extensions !== undefined ? { allowedFileExtensions: options.extensions } : {}),
      ...(options.allowHidden !== undefined ? { allowHiddenItems: options.allowHidden } : {}),
    },
    logging: {
      ...base.logging,
      level,
      requests: options.debug || base.logging.requests,
    },
  };
}

async function startServer(options: MainOptions, env: NodeJS.ProcessEnv): Promise<StandaloneWebDAVServer> {
  if (!options.root) {
    throw new Error('No directory to serve: pass --root or set FOLDERDAV_ROOT');
  }
  const mode = options.mode ?? 'development';
  const config = getServerConfig(options, env);
  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new Error(`Invalid configuration:\n  ${errors.join('\n  ')}`);
  }

  console.log(`🚀 Starting folderdav in ${mode.toUpperCase()} mode...\n`);

  const server = new StandaloneWebDAVServer({ uploadDirectory: options.root, config });
  await server.start();

  const { port, host } = server.dav.config.server;
  const { allowedFileExtensions, allowHiddenItems } = server.dav.config.storage;
  console.log(`🌐 WebDAV server listening on http://${host}:${port}`);
  console.log('📋 Server Configuration:');
  console.log(`   • Directory: ${server.dav.uploadDirectory}`);
  console.log(`   • Extensions: ${allowedFileExtensions.length > 0 ? allowedFileExtensions.join(', ') : 'all'}`);
  console.log(`   • Hidden items: ${allowHiddenItems ? 'served' : 'hidden'}`);
  console.log(`   • Logging level: ${server.dav.config.logging.level}`);
  console.log('\n🛑 Press Ctrl+C to stop the server');

  // Graceful shutdown
  process.once('SIGINT', () => {
    console.log('\n🛑 Shutting down WebDAV server...');
    server.stop().then(
      () => {
        console.log('✅ Server stopped successfully');
        process.exit(0);
      },
      (error: unknown) => {
        console.error('❌ Shutdown failed:', error);
        process.exit(1);
      }
    );
  });

  return server;
}

// True when the script node was started with is this module, also through the symlink npm installs for `bin`
export function isMainModule(scriptPath: string | undefined, moduleUrl: string): boolean {
  if (scriptPath === undefined) return false;
  try {
    return realpathSync(scriptPath) === realpathSync(fileURLToPath(moduleUrl));
  } catch (error) {
    // node -e or a script that was removed since
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return false;
    throw error;
  }
}

// Main execution
if (isMainModule(process.argv[1], import.meta.url)) {
  try {
    const options = parseArgs(process.argv.slice(2), process.env);
    if (options === 'help') {
      console.log(USAGE);
    } else {
      startServer(options, process.env).catch((error: unknown) => {
        console.error('❌', error instanceof Error ? error.message : error);
        process.exit(1);
      });
    }
  } catch (error) {
    console.error('❌', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

export { startServer, type MainOptions, type ServerMode };
