import { clampRotationInterval } from "../config/hub-config.js";
import type { OptionalCategoryId } from "../domain/categories.js";
import type { HostEntity } from "../host/entity-host.js";
import type { EntityDescriptor, EntityState } from "../types/content.js";
import { logger } from "../utils/logger.js";
import { formatLocalDateTime } from "../utils/time.js";
import type { ContentCache } from "./content-cache.js";
import { ROTATION_ENTITY_ID, buildDisplayState, buildWaitingState } from "./entity-state.js";

export interface RotationState {
  currentIndex: number;
  lastSwitchAt: number;
}

interface RotationSelectorOptions {
  categories: readonly OptionalCategoryId[];
  intervalMinutes: number;
  cache: ContentCache;
  nowFn?: () => number;
}

const TITLE = "滚动内容";

export class RotationSelector implements HostEntity {
  readonly descriptor: EntityDescriptor = {
    entityId: ROTATION_ENTITY_ID,
    name: TITLE,
    icon: "mdi:message-text",
    kind: "rotation",
  };

  private readonly categories: readonly OptionalCategoryId[];

  /** Time between two switches, after clamping. */
  readonly intervalMs: number;

  private readonly cache: ContentCache;

  private readonly nowFn: () => number;

  private state: RotationState;

  constructor(options: RotationSelectorOptions) {
    this.categories = [...options.categories];
    this.intervalMs = clampRotationInterval(options.intervalMinutes) * 60 * 1000;
    this.cache = options.cache;
    this.nowFn = options.nowFn ?? (() => Date.now());
    this.state = { currentIndex: 0, lastSwitchAt: this.nowFn() };
  }

  snapshot(): Readonly<RotationState> {
    return { ...this.state };
  }

  current(): OptionalCategoryId | undefined {
    return this.categories[this.state.currentIndex];
  }

  /**
   * Moves one position per full interval elapsed since the last switch. Switch times stay on
   * the interval grid, so late or sparse ticks catch up instead of drifting.
   */
  advance(now = this.nowFn()): void {
    if (this.categories.length === 0) {
      return;
    }
    const steps = Math.floor((now - this.state.lastSwitchAt) / this.intervalMs);
    if (steps < 1) {
      return;
    }
    const currentIndex = (this.state.currentIndex + steps) % this.categories.length;
    this.state = { currentIndex, lastSwitchAt: this.state.lastSwitchAt + steps * this.intervalMs };
    logger.debug("rotation_advanced", { category: this.categories[currentIndex], index: currentIndex, steps });
  }

  async onUpdateTick(): Promise<EntityState> {
    const now = this.nowFn();
    this.advance(now);

    const category = this.current();
    const entry = category ? this.cache.peek(category) : undefined;
    if (!category || !entry) {
      return buildWaitingState(ROTATION_ENTITY_ID, TITLE, { content_type: "unknown" }, now);
    }

    return buildDisplayState(
      ROTATION_ENTITY_ID,
      entry.payload,
      { content_type: category },
      formatLocalDateTime(this.state.lastSwitchAt),
      now,
    );
  }
}
