import { getCategory, type CategoryId } from "../domain/categories.js";
import type { HostEntity } from "../host/entity-host.js";
import type { EntityDescriptor, EntityState } from "../types/content.js";
import { logger } from "../utils/logger.js";
import { formatLocalDateTime, minuteOfDay } from "../utils/time.js";
import type { ContentCache } from "./content-cache.js";
import { TIME_SLOT_ENTITY_ID, buildDisplayState, buildWaitingState } from "./entity-state.js";
import { findBucket, type TimeBucket, type TimeBucketTable } from "./time-buckets.js";

interface TimeSlotSelectorOptions {
  table: TimeBucketTable;
  cache: ContentCache;
  nowFn?: () => number;
}

const TITLE = "时段内容";

export class TimeSlotSelector implements HostEntity {
  readonly descriptor: EntityDescriptor = {
    entityId: TIME_SLOT_ENTITY_ID,
    name: TITLE,
    icon: "mdi:calendar-clock",
    kind: "time_slot",
  };

  private readonly table: TimeBucketTable;

  private readonly cache: ContentCache;

  private readonly nowFn: () => number;

  private active?: { bucket: TimeBucket; enteredAt: number };

  constructor(options: TimeSlotSelectorOptions) {
    this.table = options.table;
    this.cache = options.cache;
    this.nowFn = options.nowFn ?? (() => Date.now());
  }

  select(now = this.nowFn()): CategoryId | undefined {
    return findBucket(this.table, minuteOfDay(now))?.category;
  }

  async onUpdateTick(): Promise<EntityState> {
    const now = this.nowFn();
    const bucket = findBucket(this.table, minuteOfDay(now));
    if (!bucket) {
      return buildWaitingState(TIME_SLOT_ENTITY_ID, TITLE, { time_slot: "默认时段" }, now);
    }

    if (this.active?.bucket !== bucket) {
      this.active = { bucket, enteredAt: now };
      logger.debug("time_slot_entered", { category: bucket.category });
    }

    const definition = getCategory(bucket.category);
    const entry = this.cache.peek(bucket.category);
    if (!entry) {
      return buildWaitingState(TIME_SLOT_ENTITY_ID, TITLE, { time_slot: definition.slotLabel }, now);
    }

    return buildDisplayState(
      TIME_SLOT_ENTITY_ID,
      entry.payload,
      { time_slot: definition.slotLabel },
      formatLocalDateTime(this.active.enteredAt),
      now,
    );
  }
}
