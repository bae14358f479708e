import * as dotenv from 'dotenv';
import { z } from 'zod';

export interface Config {
  server: {
    name: string;
    version: string;
    debug: boolean;
  };
  http: {
    host: string;
    port: number;
  };
  auth: {
    apiKey: string;
  };
  database: {
    path: string;
  };
  pagination: {
    defaultPageSize: number;
  };
}

// Zod validation schema
const ConfigSchema = z.object({
  server: z.object({
    name: z.string().min(1, 'Server name must not be empty'),
    version: z.string().min(1, 'Version must not be empty'),
    debug: z.boolean(),
  }),
  http: z.object({
    host: z.string().min(1, 'Host must not be empty'),
    port: z.number().int().min(0).max(65535),
  }),
  auth: z.object({
    apiKey: z.string().min(1, 'API_KEY must be set'),
  }),
  database: z.object({
    path: z.string().min(1, 'Database path must not be empty'),
  }),
  pagination: z.object({
    defaultPageSize: z.number().int().min(1).max(1000),
  }),
});

type Env = Record<string, string | undefined>;

/**
 * Parse command line arguments
 * Usage: node dist/src/index.js --port 8000 --database-path data/conversations.db --debug
 */
export function parseArgs(argv: string[]): Record<string, string | boolean> {
  const args: Record<string, string | boolean> = {};

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith('--')) {
      const key = arg.slice(2);

      // Check if next arg is a value or another flag
      if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
        args[key] = argv[++i];
      } else {
        args[key] = true;
      }
    }
  }

  return args;
}

/**
 * Build configuration from CLI arguments, then environment, then defaults.
 * Throws a ZodError when the result is invalid.
 */
export function loadConfig(argv: string[] = process.argv, env: Env = process.env): Config {
  const cliArgs = parseArgs(argv);

  const getString = (cliKey: string, envKey: string, defaultValue: string): string => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return cliValue;
    return env[envKey] || defaultValue;
  };

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    if (cliArgs[cliKey] !== undefined) return cliArgs[cliKey] === true || cliArgs[cliKey] === 'true';
    const envValue = env[envKey];
    return envValue === 'true' ? true : envValue === 'false' ? false : defaultValue;
  };

  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return Number(cliValue);
    const envValue = env[envKey];
    return envValue ? Number(envValue) : defaultValue;
  };

  const rawConfig: Config = {
    server: {
      name: getString('server-name', 'SERVER_NAME', 'conversation-service'),
      version: getString('server-version', 'SERVER_VERSION', '1.0.0'),
      debug: getBoolean('debug', 'DEBUG', false),
    },
    http: {
      host: getString('host', 'HOST', '0.0.0.0'),
      port: getNumber('port', 'PORT', 8000),
    },
    auth: {
      apiKey: getString('api-key', 'API_KEY', ''),
    },
    database: {
      path: getString('database-path', 'DATABASE_PATH', 'data/conversations.db'),
    },
    pagination: {
      defaultPageSize: getNumber('default-page-size', 'DEFAULT_PAGE_SIZE', 10),
    },
  };

  return ConfigSchema.parse(rawConfig);
}

/**
 * Get configuration from .env, environment variables and CLI arguments.
 * Exits the process when the configuration is invalid.
 */
export function getConfig(): Config {
  dotenv.config();

  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('\nConfiguration validation failed:\n');
      error.errors.forEach((err) => {
        const path = err.path.join('.');
        console.error(`  - ${path || 'root'}: ${err.message}`);
      });
      console.error('\nCheck your .env file and CLI arguments (API_KEY is required).\n');
      process.exit(1);
    }
    throw error;
  }
}

/**
 * Print configuration summary. The API key is never printed.
 */
export function printConfigInfo(config: Config): void {
  console.error('='.repeat(68));
  console.error(`  ${config.server.name} v${config.server.version}${config.server.debug ? ' (Debug Mode)' : ''}`);
  console.error('='.repeat(68));
  console.error(`  HTTP:       http://${config.http.host}:${config.http.port}`);
  console.error(`  Database:   ${config.database.path}`);
  console.error(`  Page size:  ${config.pagination.defaultPageSize} (default)`);
  console.error(`  Auth:       X-API-Key header required for POST, PATCH and DELETE`);
  console.error('-'.repeat(68));
}
