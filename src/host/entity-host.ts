import type { EntityDescriptor, EntityState } from "../types/content.js";

/** An entity the host drives: it is registered once, then asked for a state on every tick. */
export interface HostEntity {
  readonly descriptor: EntityDescriptor;
  onUpdateTick(): Promise<EntityState>;
}

/** What the hub needs from the host platform. */
export interface EntityHost {
  registerEntity(descriptor: EntityDescriptor): void;
  publish(state: EntityState): void;
  onTeardown(): void;
}

export interface PublishedEntity {
  descriptor: EntityDescriptor;
  current?: EntityState;
}

export class InMemoryEntityHost implements EntityHost {
  protected readonly entities = new Map<string, PublishedEntity>();

  registerEntity(descriptor: EntityDescriptor): void {
    const existing = this.entities.get(descriptor.entityId);
    this.entities.set(descriptor.entityId, { descriptor, current: existing?.current });
  }

  publish(state: EntityState): void {
    const entity = this.entities.get(state.entityId);
    if (!entity) {
      throw new Error(`Entity ${state.entityId} is not registered`);
    }
    entity.current = state;
  }

  onTeardown(): void {
    this.entities.clear();
  }

  has(entityId: string): boolean {
    return this.entities.has(entityId);
  }

  getEntity(entityId: string): PublishedEntity | undefined {
    return this.entities.get(entityId);
  }

  listEntities(): PublishedEntity[] {
    return Array.from(this.entities.values());
  }
}
