/**
 * Upstream Resolver
 * Recursive lookups for names the table does not own
 */
import { promises as dns } from 'dns';
import { createChildLogger, type Logger } from '../core/Logger.js';
import type { UpstreamResolver } from '../types/index.js';

// Outcomes that simply mean "no answer"
const EXPECTED_FAILURES = new Set(['ETIMEOUT', 'ENOTFOUND', 'ENODATA', 'ENONAME']);

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export interface NodeUpstreamResolverOptions {
  servers: readonly string[];
  timeout: number;
  logger?: Logger;
}

export class NodeUpstreamResolver implements UpstreamResolver {
  private logger: Logger;
  private resolver: dns.Resolver;

  constructor(options: NodeUpstreamResolverOptions) {
    this.logger = options.logger ?? createChildLogger({ service: 'UpstreamResolver' });
    this.resolver = new dns.Resolver({ timeout: options.timeout, tries: 1 });
    this.resolver.setServers([...options.servers]);
  }

  async resolve4(name: string): Promise<string | undefined> {
    try {
      const addresses = await this.resolver.resolve4(name);
      return addresses[0];
    } catch (error) {
      const code = errorCode(error);
      if (code && EXPECTED_FAILURES.has(code)) {
        this.logger.debug({ name, code }, 'No upstream answer');
      } else {
        this.logger.error({ error, name }, 'Upstream resolution failed');
      }
      return undefined;
    }
  }
}
