/**
 * ConfigManager unit tests
 */
import { describe, it, expect } from 'vitest';
import { ConfigManager, parseStaticRecords } from '../../../src/config/ConfigManager.js';
import { isResolverAddress } from '../../../src/config/schema.js';
import { ConfigError } from '../../../src/core/errors.js';

function configError(env: Record<string, string>): ConfigError {
  try {
    new ConfigManager(env);
  } catch (error) {
    if (error instanceof ConfigError) return error;
    throw error;
  }
  throw new Error('Expected a ConfigError');
}

describe('ConfigManager', () => {
  it('should apply defaults', () => {
    const config = new ConfigManager({});

    expect(config.dns).toEqual({
      bindAddress: '0.0.0.0',
      port: 53,
      domain: 'docker',
      ttl: 0,
      recursion: true,
      resolvers: ['8.8.8.8', '8.8.4.4'],
      resolverTimeout: 3000,
      records: [],
    });
    expect(config.docker).toEqual({ socketPath: '/var/run/docker.sock', network: undefined });
    expect(config.app).toEqual({ logLevel: 'info', logPretty: true });
    expect(config.upstreamServers).toEqual(['8.8.8.8', '8.8.4.4']);
  });

  it('should read values from the environment', () => {
    const config = new ConfigManager({
      DNS_BIND: '127.0.0.1',
      DNS_PORT: '5353',
      DNS_DOMAIN: '.local.',
      DNS_TTL: '30',
      DNS_RESOLVERS: '1.1.1.1, 9.9.9.9:5353',
      DNS_RECORDS: 'web:10.0.0.5,db:10.0.0.6',
      DOCKER_NETWORK: 'backend',
      LOG_LEVEL: 'DEBUG',
      LOG_PRETTY: 'false',
    });

    expect(config.dns.bindAddress).toBe('127.0.0.1');
    expect(config.dns.port).toBe(5353);
    expect(config.dns.domain).toBe('local');
    expect(config.dns.ttl).toBe(30);
    expect(config.dns.resolvers).toEqual(['1.1.1.1', '9.9.9.9:5353']);
    expect(config.dns.records).toEqual([
      { name: 'web', address: '10.0.0.5' },
      { name: 'db', address: '10.0.0.6' },
    ]);
    expect(config.docker.network).toBe('backend');
    expect(config.app).toEqual({ logLevel: 'debug', logPretty: false });
  });

  it('should disable upstream servers when recursion is off', () => {
    const config = new ConfigManager({ DNS_RECURSION: 'false' });

    expect(config.dns.recursion).toBe(false);
    expect(config.upstreamServers).toEqual([]);
  });

  it('should reject static records with an invalid address', () => {
    const error = configError({ DNS_RECORDS: 'web:999.0.0.1' });

    expect(error.message).toBe(
      'Invalid configuration: dns.records.0.address: Record address must be an IPv4 address'
    );
    expect(error.details).toEqual([
      { field: 'dns.records.0.address', message: 'Record address must be an IPv4 address' },
    ]);
  });

  it('should reject static records without an address', () => {
    const error = configError({ DNS_RECORDS: 'web' });

    expect(error.details?.[0]?.field).toBe('dns.records.0.address');
  });

  it('should reject invalid resolvers', () => {
    const error = configError({ DNS_RESOLVERS: 'dns.example' });

    expect(error.message).toBe('Invalid configuration: dns.resolvers.0: Invalid resolver address: dns.example');
  });

  it('should reject an invalid port', () => {
    expect(() => new ConfigManager({ DNS_PORT: '70000' })).toThrow(ConfigError);
  });
});

describe('parseStaticRecords', () => {
  it('should split on the first colon', () => {
    expect(parseStaticRecords(['web:10.0.0.5', ' db : 10.0.0.6 '])).toEqual([
      { name: 'web', address: '10.0.0.5' },
      { name: 'db', address: '10.0.0.6' },
    ]);
  });

  it('should keep entries without a colon for validation', () => {
    expect(parseStaticRecords(['web'])).toEqual([{ name: 'web' }]);
  });
});

describe('isResolverAddress', () => {
  it.each(['8.8.8.8', '8.8.8.8:53', '2001:db8::1', '[2001:db8::1]:53'])('should accept %s', (value) => {
    expect(isResolverAddress(value)).toBe(true);
  });

  it.each(['dns.example', '8.8.8.8:99999', '[8.8.8.8]:53', ''])('should reject %s', (value) => {
    expect(isResolverAddress(value)).toBe(false);
  });
});
