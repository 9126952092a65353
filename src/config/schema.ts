/**
 * Zod schemas for configuration validation
 */
import { isIPv4, isIP } from 'net';
import { z } from 'zod';

export const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']);

export type LogLevel = z.infer<typeof logLevelSchema>;

/**
 * Upstream server: bare IP, "ipv4:port" or "[ipv6]:port"
 */
export function isResolverAddress(value: string): boolean {
  if (isIP(value) !== 0) return true;

  const bracketed = /^\[([^\]]+)\]:(\d{1,5})$/.exec(value);
  if (bracketed) {
    return isIP(bracketed[1] ?? '') === 6 && Number(bracketed[2]) <= 65535;
  }

  const hostPort = /^([^:]+):(\d{1,5})$/.exec(value);
  if (hostPort) {
    return isIPv4(hostPort[1] ?? '') && Number(hostPort[2]) <= 65535;
  }

  return false;
}

export const staticRecordSchema = z.object({
  name: z.string().min(1, 'Record name is required'),
  address: z.string().refine((value) => isIPv4(value), 'Record address must be an IPv4 address'),
});

export const appConfigSchema = z.object({
  logLevel: logLevelSchema.default('info'),
  logPretty: z.boolean().default(true),
});

export const dnsConfigSchema = z.object({
  bindAddress: z.string().refine((value) => isIP(value) !== 0, 'Bind address must be an IP address').default('0.0.0.0'),
  port: z.coerce.number().int().min(0).max(65535).default(53),
  domain: z
    .string()
    .transform((value) => value.trim().replace(/^\.+|\.+$/g, ''))
    .pipe(z.string().min(1, 'Domain is required'))
    .default('docker'),
  ttl: z.coerce.number().int().min(0).default(0),
  recursion: z.boolean().default(true),
  resolvers: z
    .array(z.string().refine(isResolverAddress, (value) => ({ message: `Invalid resolver address: ${value}` })))
    .default(['8.8.8.8', '8.8.4.4']),
  resolverTimeout: z.coerce.number().int().min(1).default(3000),
  records: z.array(staticRecordSchema).default([]),
});

export const dockerConfigSchema = z.object({
  socketPath: z.string().min(1).default('/var/run/docker.sock'),
  network: z.string().min(1).optional(),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type DnsConfig = z.infer<typeof dnsConfigSchema>;
export type DockerConfig = z.infer<typeof dockerConfigSchema>;
export type StaticRecord = z.infer<typeof staticRecordSchema>;
