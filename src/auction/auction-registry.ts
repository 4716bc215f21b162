import { Injectable } from '@nestjs/common';
import type { AuctionEngine } from './engine';

export interface RegistryEntry {
  engine: AuctionEngine;
}

/**
 * Process-wide map guild → live auction. Every read-modify-write of an entry
 * goes through {@link withGuildLock}; only one mutation per guild is in flight.
 */
@Injectable()
export class AuctionRegistry {
  private readonly entries = new Map<string, RegistryEntry>();
  private readonly locks = new Map<string, Promise<void>>();

  get(guildId: string): RegistryEntry | undefined {
    return this.entries.get(guildId);
  }

  /** Call only while holding the guild's lock. */
  register(guildId: string, engine: AuctionEngine): RegistryEntry {
    if (this.entries.has(guildId)) {
      throw new Error(`Guild ${guildId} already has a live auction`);
    }
    const entry: RegistryEntry = { engine };
    this.entries.set(guildId, entry);
    return entry;
  }

  /** Call only while holding the guild's lock. */
  deregister(guildId: string): void {
    this.entries.delete(guildId);
  }

  guildIds(): string[] {
    return [...this.entries.keys()];
  }

  get size(): number {
    return this.entries.size;
  }

  isLocked(guildId: string): boolean {
    return this.locks.has(guildId);
  }

  /**
   * Run `fn` once every earlier holder of the guild's lock has finished.
   * Locks are per guild; other guilds are never waited on.
   */
  async withGuildLock<T>(guildId: string, fn: () => Promise<T> | T): Promise<T> {
    const prev = this.locks.get(guildId) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = prev.then(() => current);
    this.locks.set(guildId, tail);

    await prev;
    try {
      return await fn();
    } finally {
      release();
      if (this.locks.get(guildId) === tail) {
        this.locks.delete(guildId);
      }
    }
  }
}
