/**
 * Name Table
 * In-memory mapping from canonical name to IPv4 address
 *
 * Every operation runs to completion without yielding to the event loop,
 * so readers see a rename either fully applied or not at all.
 */
import { createChildLogger, type Logger } from '../core/Logger.js';
import { canonicalizeName } from './names.js';

export class NameTable {
  private logger: Logger;
  private storage: Map<string, string> = new Map();

  constructor(logger?: Logger) {
    this.logger = logger ?? createChildLogger({ service: 'NameTable' });
  }

  /**
   * Insert or replace the address for a name
   */
  add(name: string, address: string): void {
    const key = canonicalizeName(name);
    if (!key) {
      this.logger.warn({ name }, 'Ignoring invalid name');
      return;
    }
    if (!address || address.trim() === '') {
      this.logger.warn({ name }, 'Ignoring name without address');
      return;
    }

    this.storage.set(key, address);
    this.logger.info({ name: key, address }, 'Record added');
  }

  get(name: string): string | undefined {
    const key = canonicalizeName(name);
    if (!key) return undefined;
    return this.storage.get(key);
  }

  has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  /**
   * Move an entry to a new name, keeping its address
   */
  rename(oldName: string, newName: string): void {
    if (!oldName || !newName || oldName === newName) {
      return;
    }

    const oldKey = canonicalizeName(oldName);
    const newKey = canonicalizeName(newName);
    if (!oldKey) return;

    const address = this.storage.get(oldKey);
    if (address === undefined) {
      this.logger.debug({ oldName, newName }, 'Rename of unknown name ignored');
      return;
    }
    if (!newKey) {
      this.logger.warn({ oldName, newName }, 'Ignoring rename to invalid name');
      return;
    }

    this.storage.delete(oldKey);
    this.storage.set(newKey, address);
    this.logger.info({ oldName: oldKey, newName: newKey, address }, 'Record renamed');
  }

  remove(name: string): void {
    const key = canonicalizeName(name);
    if (!key) return;

    if (this.storage.delete(key)) {
      this.logger.info({ name: key }, 'Record removed');
    }
  }

  get size(): number {
    return this.storage.size;
  }

  /**
   * Snapshot of all entries
   */
  entries(): [string, string][] {
    return Array.from(this.storage.entries());
  }
}
