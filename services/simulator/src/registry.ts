import { DuplicateRegistrationError, LookupError } from '@edge-sim/common';
import { EntityByKind, EntityKind } from './model.js';

type Partitions = { [K in EntityKind]: Map<number, EntityByKind[K]> };

/**
 * Indexed collection of every simulated entity, owned by one engine instance.
 * Ids are dense and monotonically increasing within each kind, and iteration
 * follows insertion order so that the step loop visits entities the same way
 * on every run.
 */
export class ObjectRegistry {
  private partitions: Partitions = {
    baseStation: new Map(),
    edgeServer: new Map(),
    link: new Map(),
    containerRegistry: new Map(),
    application: new Map(),
    service: new Map(),
    user: new Map(),
  };
  private registered = new WeakSet<object>();

  register<K extends EntityKind>(kind: K, entity: EntityByKind[K]): number {
    if (this.registered.has(entity)) {
      throw new DuplicateRegistrationError(`${kind} ${entity.id} is already registered`, {
        kind,
        id: entity.id,
      });
    }

    const partition: Map<number, EntityByKind[K]> = this.partitions[kind];
    const id = partition.size + 1;
    entity.id = id;
    partition.set(id, entity);
    this.registered.add(entity);

    return id;
  }

  find<K extends EntityKind>(kind: K, id: number): EntityByKind[K] {
    const partition: Map<number, EntityByKind[K]> = this.partitions[kind];
    const entity = partition.get(id);
    if (entity === undefined) {
      throw new LookupError(`No ${kind} with id ${id}`, { kind, id });
    }
    return entity;
  }

  all<K extends EntityKind>(kind: K): EntityByKind[K][] {
    const partition: Map<number, EntityByKind[K]> = this.partitions[kind];
    return Array.from(partition.values());
  }

  count(kind: EntityKind): number {
    return this.partitions[kind].size;
  }
}
