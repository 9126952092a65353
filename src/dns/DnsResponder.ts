/**
 * DNS Responder
 * Answers UDP queries from the name table, or from the upstream resolver
 * for names the table does not own
 */
import * as dgram from 'dgram';
import * as dnsPacket from 'dns-packet';
import { createChildLogger, type Logger } from '../core/Logger.js';
import type { NameTable } from '../table/NameTable.js';
import type { UpstreamResolver } from '../types/index.js';

// Types answered from the table; anything else gets an empty reply
const LOOKUP_TYPES = new Set<string>(['A', 'AAAA', 'ANY']);

export interface DnsResponderOptions {
  bindAddress: string;
  port: number;
  ttl: number;
  resolver?: UpstreamResolver;
  logger?: Logger;
}

interface Resolution {
  authoritative: boolean;
  address?: string;
}

export class DnsResponder {
  private logger: Logger;
  private socket: dgram.Socket | null = null;
  private table: NameTable;
  private resolver?: UpstreamResolver;
  private bindAddress: string;
  private port: number;
  private ttl: number;

  constructor(table: NameTable, options: DnsResponderOptions) {
    this.table = table;
    this.resolver = options.resolver;
    this.bindAddress = options.bindAddress;
    this.port = options.port;
    this.ttl = options.ttl;
    this.logger = options.logger ?? createChildLogger({ service: 'DnsResponder' });
  }

  /**
   * Bind the UDP socket
   */
  start(): Promise<void> {
    if (this.socket) {
      this.logger.warn('DNS responder already started');
      return Promise.resolve();
    }

    const socket = dgram.createSocket('udp4');
    socket.on('message', (msg, rinfo) => {
      void this.respond(socket, msg, rinfo);
    });

    return new Promise<void>((resolve, reject) => {
      socket.once('error', reject);
      socket.bind(this.port, this.bindAddress, () => {
        socket.removeListener('error', reject);
        socket.on('error', (error) => {
          this.logger.error({ error }, 'DNS socket error');
        });
        this.socket = socket;

        const { address, port } = socket.address();
        this.logger.info({ address, port, recursion: this.resolver !== undefined }, 'DNS responder listening');
        resolve();
      });
    });
  }

  /**
   * Close the socket; no further datagrams are accepted
   */
  stop(): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      return Promise.resolve();
    }
    this.socket = null;

    return new Promise<void>((resolve) => {
      socket.close(() => {
        this.logger.info('DNS responder stopped');
        resolve();
      });
    });
  }

  address(): { address: string; port: number } | null {
    if (!this.socket) return null;
    const { address, port } = this.socket.address();
    return { address, port };
  }

  private async respond(socket: dgram.Socket, msg: Buffer, rinfo: dgram.RemoteInfo): Promise<void> {
    const peer = `${rinfo.address}:${rinfo.port}`;
    try {
      const reply = await this.handleQuery(msg);
      if (!reply) return;

      socket.send(reply, rinfo.port, rinfo.address, (error) => {
        if (error) {
          this.logger.warn({ error, peer }, 'Failed to send DNS reply');
        }
      });
    } catch (error) {
      this.logger.error({ error, peer }, 'Failed to handle DNS query');
    }
  }

  /**
   * Build the reply for one query datagram, or null when it cannot be decoded
   */
  async handleQuery(msg: Buffer): Promise<Buffer | null> {
    let query: ReturnType<typeof dnsPacket.decode>;
    try {
      query = dnsPacket.decode(msg);
    } catch (error) {
      this.logger.debug({ error }, 'Dropping malformed DNS datagram');
      return null;
    }

    const question = query.questions?.[0];
    if (!question) {
      this.logger.debug({ id: query.id }, 'Dropping DNS query without question');
      return null;
    }

    const { authoritative, address } = await this.resolve(question);

    this.logger.debug(
      { name: question.name, type: question.type, address, authoritative },
      'DNS query answered'
    );

    let flags = query.flags ? query.flags & dnsPacket.RECURSION_DESIRED : 0;
    if (authoritative) flags |= dnsPacket.AUTHORITATIVE_ANSWER;
    if (this.resolver) flags |= dnsPacket.RECURSION_AVAILABLE;

    const answers: dnsPacket.Answer[] = address
      ? [{ type: 'A', class: 'IN', name: question.name, ttl: this.ttl, data: address }]
      : [];

    return dnsPacket.encode({
      type: 'response',
      id: query.id,
      flags,
      questions: [question],
      answers,
    });
  }

  private async resolve(question: dnsPacket.Question): Promise<Resolution> {
    if (!LOOKUP_TYPES.has(question.type)) {
      return { authoritative: false };
    }

    const local = this.table.get(question.name);
    if (local !== undefined) {
      // Never answer AAAA with an A record
      return { authoritative: true, address: question.type === 'AAAA' ? undefined : local };
    }

    // No IPv6 upstream lookups
    if (!this.resolver || question.type === 'AAAA') {
      return { authoritative: false };
    }

    const upstream = await this.resolver.resolve4(question.name);
    return { authoritative: false, address: upstream };
  }
}
