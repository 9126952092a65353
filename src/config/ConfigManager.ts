/**
 * Configuration Manager
 * Loads settings from the environment and validates them
 */
import type { z } from 'zod';
import { ConfigError } from '../core/errors.js';
import {
  appConfigSchema,
  dnsConfigSchema,
  dockerConfigSchema,
  type AppConfig,
  type DnsConfig,
  type DockerConfig,
  type StaticRecord,
} from './schema.js';

type Env = Record<string, string | undefined>;

/**
 * Read environment variable as boolean
 */
function getEnvBool(env: Env, key: string, defaultValue: boolean): boolean {
  const value = env[key];
  if (value === undefined || value === '') return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Split a comma separated environment variable
 */
function getEnvList(env: Env, key: string): string[] | undefined {
  const value = env[key];
  if (value === undefined || value.trim() === '') return undefined;
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Parse "name:address" pairs. Malformed entries are kept as-is so the
 * schema reports them.
 */
export function parseStaticRecords(entries: string[]): Partial<StaticRecord>[] {
  return entries.map((entry) => {
    const separator = entry.indexOf(':');
    if (separator < 0) {
      return { name: entry };
    }
    return {
      name: entry.slice(0, separator).trim(),
      address: entry.slice(separator + 1).trim(),
    };
  });
}

function parseSection<T extends z.ZodTypeAny>(section: string, schema: T, input: unknown): z.infer<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw ConfigError.fromZod(section, result.error);
  }
  return result.data;
}

export class ConfigManager {
  private _app: AppConfig;
  private _dns: DnsConfig;
  private _docker: DockerConfig;

  constructor(env: Env = process.env) {
    this._app = parseSection('app', appConfigSchema, {
      logLevel: env['LOG_LEVEL']?.toLowerCase() || undefined,
      logPretty: getEnvBool(env, 'LOG_PRETTY', true),
    });

    const records = getEnvList(env, 'DNS_RECORDS');

    this._dns = parseSection('dns', dnsConfigSchema, {
      bindAddress: env['DNS_BIND'] || undefined,
      port: env['DNS_PORT'] || undefined,
      domain: env['DNS_DOMAIN'] || undefined,
      ttl: env['DNS_TTL'] || undefined,
      recursion: getEnvBool(env, 'DNS_RECURSION', true),
      resolvers: getEnvList(env, 'DNS_RESOLVERS'),
      resolverTimeout: env['DNS_RESOLVER_TIMEOUT'] || undefined,
      records: records ? parseStaticRecords(records) : undefined,
    });

    this._docker = parseSection('docker', dockerConfigSchema, {
      socketPath: env['DOCKER_SOCKET'] || undefined,
      network: env['DOCKER_NETWORK'] || undefined,
    });
  }

  get app(): Readonly<AppConfig> {
    return this._app;
  }

  get dns(): Readonly<DnsConfig> {
    return this._dns;
  }

  get docker(): Readonly<DockerConfig> {
    return this._docker;
  }

  /**
   * Upstream servers to use, empty when recursion is disabled
   */
  get upstreamServers(): readonly string[] {
    return this._dns.recursion ? this._dns.resolvers : [];
  }
}

let configInstance: ConfigManager | null = null;

export function getConfig(): ConfigManager {
  if (!configInstance) {
    configInstance = new ConfigManager();
  }
  return configInstance;
}
