import { getCategory, type CategoryId } from "../domain/categories.js";
import type { HostEntity } from "../host/entity-host.js";
import type { EntityDescriptor, EntityState } from "../types/content.js";
import { logger, type Logger } from "../utils/logger.js";
import type { ContentCache } from "./content-cache.js";
import { buildCategoryFailedState, buildCategoryState, categoryEntityId } from "./entity-state.js";
import type { ContentFetcher } from "./tian-client.js";

interface CategorySensorOptions {
  category: CategoryId;
  apiKey: string;
  cache: ContentCache;
  fetcher: ContentFetcher;
  nowFn?: () => number;
}

/** Pass-through from the cache to the entity surface; every update resolves to a state. */
export class CategorySensor implements HostEntity {
  readonly descriptor: EntityDescriptor;

  private readonly category: CategoryId;

  private readonly apiKey: string;

  private readonly cache: ContentCache;

  private readonly fetcher: ContentFetcher;

  private readonly nowFn: () => number;

  private readonly log: Logger;

  constructor(options: CategorySensorOptions) {
    const definition = getCategory(options.category);
    this.category = options.category;
    this.apiKey = options.apiKey;
    this.cache = options.cache;
    this.fetcher = options.fetcher;
    this.nowFn = options.nowFn ?? (() => Date.now());
    this.log = logger.child({ category: options.category });
    this.descriptor = {
      entityId: categoryEntityId(options.category),
      name: definition.title,
      icon: definition.icon,
      kind: "category",
    };
  }

  async onUpdateTick(): Promise<EntityState> {
    const startedAt = this.nowFn();
    try {
      const lookup = await this.cache.getOrFetch(this.category, () => this.fetcher.fetch(this.category, this.apiKey));
      if (lookup.origin === "network") {
        this.log.info("category_fetch_ok", { durationMs: this.nowFn() - startedAt });
      }
      return buildCategoryState(lookup, this.nowFn());
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      this.log.error("category_fetch_failed", {
        durationMs: this.nowFn() - startedAt,
        error: cause.message,
      });
      return buildCategoryFailedState(this.category, cause, this.nowFn());
    }
  }
}
