import type { ClientHandle } from '../types.js';

/**
 * The set of clients that should receive audio. Mutated by the acceptor from
 * socket events and read by the broadcast loop through snapshots; a snapshot is
 * a copy, so membership changes made while it is being iterated only show up
 * in the next one.
 */
export class ClientRegistry {
  readonly #clients = new Set<ClientHandle>();

  get size(): number {
    return this.#clients.size;
  }

  /** Returns false for a duplicate or an already-closed handle. */
  add(handle: ClientHandle): boolean {
    if (handle.closed || this.#clients.has(handle)) {
      return false;
    }
    this.#clients.add(handle);
    return true;
  }

  remove(handle: ClientHandle): boolean {
    return this.#clients.delete(handle);
  }

  has(handle: ClientHandle): boolean {
    return this.#clients.has(handle);
  }

  snapshot(): readonly ClientHandle[] {
    return Array.from(this.#clients);
  }

  /** Empties the registry and hands back what it held. */
  clear(): ClientHandle[] {
    const removed = Array.from(this.#clients);
    this.#clients.clear();
    return removed;
  }
}
