import { EventEmitter } from 'eventemitter3';

import { RegistryConflictError } from '../core/errors.js';
import { deepFreeze, stableStringify } from '../core/fingerprint.js';
import { Logger } from '../core/logger.js';

export interface Snapshot<T> {
  readonly version: number;
  readonly items: ReadonlyMap<string, T>;
}

export interface RegistryChange {
  registry: string;
  version: number;
  ids: string[];
}

export interface RegistryEvents {
  changed: (change: RegistryChange) => void;
}

/**
 * Holds an immutable snapshot of entities keyed by id. Every write builds a new
 * map, swaps the reference, bumps the version and emits `changed`; readers
 * holding an older snapshot never observe a partial update.
 */
export class SnapshotRegistry<T extends { id: string }> extends EventEmitter<RegistryEvents> {
  private current: Snapshot<T> = { version: 0, items: new Map() };

  constructor(
    protected readonly kind: string,
    protected readonly logger: Logger = new Logger('info')
  ) {
    super();
  }

  snapshot(): Snapshot<T> {
    return this.current;
  }

  get version(): number {
    return this.current.version;
  }

  get(id: string): T | undefined {
    return this.current.items.get(id);
  }

  has(id: string): boolean {
    return this.current.items.has(id);
  }

  count(): number {
    return this.current.items.size;
  }

  /** All entities ordered by id. */
  all(): T[] {
    return [...this.current.items.values()].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  }

  /**
   * Idempotent for identical content. Reusing an id with different content
   * throws RegistryConflictError.
   */
  register(entity: T): T {
    const existing = this.current.items.get(entity.id);
    if (existing) {
      if (stableStringify(existing) === stableStringify(entity)) {
        return existing;
      }
      throw new RegistryConflictError(this.kind, entity.id);
    }
    const frozen = freezeCopy(entity);
    this.publish([[entity.id, frozen]], false);
    this.logger.debug(`Registered ${this.kind} ${entity.id}`);
    return frozen;
  }

  /** Swap in a complete new entity set, e.g. after a config reload. */
  replaceAll(entities: T[]): void {
    const seen = new Set<string>();
    for (const entity of entities) {
      if (seen.has(entity.id)) {
        throw new RegistryConflictError(this.kind, entity.id);
      }
      seen.add(entity.id);
    }
    this.publish(
      entities.map((entity) => [entity.id, freezeCopy(entity)]),
      true
    );
    this.logger.info(`Replaced ${this.kind} registry with ${entities.length} entries`);
  }

  protected update(entity: T): T {
    const frozen = freezeCopy(entity);
    this.publish([[entity.id, frozen]], false);
    return frozen;
  }

  private publish(entries: Array<[string, T]>, replace: boolean): void {
    const items = replace ? new Map<string, T>() : new Map(this.current.items);
    for (const [id, entity] of entries) {
      items.set(id, entity);
    }
    const version = this.current.version + 1;
    this.current = Object.freeze({ version, items });
    this.emit('changed', {
      registry: this.kind,
      version,
      ids: entries.map(([id]) => id),
    });
  }
}

function freezeCopy<T>(entity: T): T {
  return deepFreeze(structuredClone(entity));
}
