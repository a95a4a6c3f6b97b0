import { env } from "../config/env.js";
import type { HubConfig } from "../config/hub-config.js";
import {
  CATEGORY_DEFINITIONS,
  buildCategoryRegistry,
  type CategoryId,
  type CategoryRegistry,
} from "../domain/categories.js";
import type { EntityHost, HostEntity } from "../host/entity-host.js";
import { AppError } from "../middleware/error-handler.js";
import type { EntityState } from "../types/content.js";
import { errorMessage, logger } from "../utils/logger.js";
import { msUntilNextDailyRun, parseTimeOfDay } from "../utils/time.js";
import { CategorySensor } from "./category-sensor.js";
import { ContentCache } from "./content-cache.js";
import { RotationSelector } from "./rotation-selector.js";
import { TianApiClient, type ContentFetcher } from "./tian-client.js";
import { TimeSlotSelector } from "./time-slot-selector.js";
import { buildTimeBucketTable, describeTable, type TimeBucketTable } from "./time-buckets.js";

type RunReason = "startup" | "daily" | "selector_tick" | "rotation_tick" | "manual";

interface ContentHubOptions {
  config: HubConfig;
  host: EntityHost;
  fetcher?: ContentFetcher;
  cache?: ContentCache;
  nowFn?: () => number;
  schedulerEnabled?: boolean;
  selectorTickSeconds?: number;
  dailyRefreshAt?: string;
}

interface EntityRunRecord {
  at: string;
  reason: RunReason;
  state: string;
  available: boolean;
}

/**
 * Owns one configuration entry: its cache, its registry and every entity built from them.
 * Each entity runs at most once at a time; a manual refresh that lands while a tick is
 * running shares that run.
 */
export class ContentHub {
  readonly registry: CategoryRegistry;

  readonly table: TimeBucketTable;

  private readonly config: HubConfig;

  private readonly host: EntityHost;

  private readonly cache: ContentCache;

  private readonly nowFn: () => number;

  private readonly schedulerEnabled: boolean;

  private readonly selectorTickMs: number;

  private readonly dailyRefreshAt: string;

  private readonly dailyRefreshMinute: number;

  private readonly sensors: CategorySensor[];

  private readonly rotation: RotationSelector;

  private readonly selectors: HostEntity[];

  private readonly entities = new Map<string, HostEntity>();

  private readonly running = new Map<string, Promise<EntityState>>();

  private readonly lastRuns = new Map<string, EntityRunRecord>();

  private dailyTimer: ReturnType<typeof setTimeout> | null = null;

  private selectorTimer: ReturnType<typeof setInterval> | null = null;

  private rotationTimer: ReturnType<typeof setInterval> | null = null;

  private registered = false;

  private started = false;

  constructor(options: ContentHubOptions) {
    this.config = options.config;
    this.host = options.host;
    this.nowFn = options.nowFn ?? (() => Date.now());
    this.cache = options.cache ?? new ContentCache({ nowFn: this.nowFn });
    this.schedulerEnabled = options.schedulerEnabled ?? env.NODE_ENV !== "test";
    this.selectorTickMs = (options.selectorTickSeconds ?? env.SELECTOR_TICK_SECONDS) * 1000;
    this.dailyRefreshAt = options.dailyRefreshAt ?? env.DAILY_REFRESH_AT;
    this.dailyRefreshMinute = parseTimeOfDay(this.dailyRefreshAt);

    const fetcher = options.fetcher ?? new TianApiClient({ nowFn: this.nowFn });

    this.registry = buildCategoryRegistry(this.config.enabledCategories);
    this.table = buildTimeBucketTable(this.registry);

    this.sensors = this.registry.all.map(
      (category) =>
        new CategorySensor({
          category,
          apiKey: this.config.apiKey,
          cache: this.cache,
          fetcher,
          nowFn: this.nowFn,
        }),
    );
    this.rotation = new RotationSelector({
      categories: this.registry.enabled,
      intervalMinutes: this.config.rotationIntervalMinutes,
      cache: this.cache,
      nowFn: this.nowFn,
    });
    this.selectors = [
      this.rotation,
      new TimeSlotSelector({ table: this.table, cache: this.cache, nowFn: this.nowFn }),
    ];

    for (const entity of [...this.sensors, ...this.selectors]) {
      this.entities.set(entity.descriptor.entityId, entity);
    }
  }

  setup(): void {
    if (this.registered) return;
    for (const entity of this.entities.values()) {
      this.host.registerEntity(entity.descriptor);
    }
    this.registered = true;
    logger.info("hub_setup", {
      entities: this.entities.size,
      enabledCategories: this.registry.enabled,
      rotationIntervalMinutes: this.config.rotationIntervalMinutes,
    });
  }

  async start(): Promise<void> {
    this.setup();
    if (this.started) return;
    this.started = true;

    const restored = await this.cache.hydrate();
    if (restored > 0) {
      logger.info("cache_hydrated", { entries: restored });
    }

    await this.refreshAll("startup");

    if (this.schedulerEnabled) {
      this.scheduleDailyRefresh();
      this.selectorTimer = setInterval(() => {
        this.tickSelectors("selector_tick").catch((error: unknown) => {
          logger.error("selector_tick_failed", { error: errorMessage(error) });
        });
      }, this.selectorTickMs);
      if (typeof this.selectorTimer.unref === "function") this.selectorTimer.unref();

      // Rotation runs on its own interval, independent of the selector tick.
      this.rotationTimer = setInterval(() => {
        this.runEntity(this.rotation, "rotation_tick").catch((error: unknown) => {
          logger.error("rotation_tick_failed", { error: errorMessage(error) });
        });
      }, this.rotation.intervalMs);
      if (typeof this.rotationTimer.unref === "function") this.rotationTimer.unref();
    }
  }

  async stop(): Promise<void> {
    this.started = false;
    if (this.dailyTimer) {
      clearTimeout(this.dailyTimer);
      this.dailyTimer = null;
    }
    if (this.selectorTimer) {
      clearInterval(this.selectorTimer);
      this.selectorTimer = null;
    }
    if (this.rotationTimer) {
      clearInterval(this.rotationTimer);
      this.rotationTimer = null;
    }
    if (this.registered) {
      this.host.onTeardown();
      this.registered = false;
    }
    await this.cache.close();
    logger.info("hub_stopped");
  }

  private scheduleDailyRefresh(): void {
    const delayMs = msUntilNextDailyRun(this.nowFn(), this.dailyRefreshMinute);
    this.dailyTimer = setTimeout(() => {
      this.dailyTimer = null;
      void this.runDailyRefresh();
    }, delayMs);
    if (typeof this.dailyTimer.unref === "function") this.dailyTimer.unref();
    logger.info("daily_refresh_scheduled", {
      nextRunAt: new Date(this.nowFn() + delayMs).toISOString(),
    });
  }

  private async runDailyRefresh(): Promise<void> {
    try {
      await this.refreshSensors("daily");
      await this.tickSelectors("daily");
    } catch (error) {
      logger.error("daily_refresh_failed", { error: errorMessage(error) });
    } finally {
      if (this.started && this.schedulerEnabled) {
        this.scheduleDailyRefresh();
      }
    }
  }

  private runEntity(entity: HostEntity, reason: RunReason): Promise<EntityState> {
    const entityId = entity.descriptor.entityId;
    const existing = this.running.get(entityId);
    if (existing) {
      return existing;
    }

    const run = entity
      .onUpdateTick()
      .then((state) => {
        if (this.registered) {
          this.host.publish(state);
        }
        this.lastRuns.set(entityId, {
          at: new Date(this.nowFn()).toISOString(),
          reason,
          state: state.state,
          available: state.available,
        });
        return state;
      })
      .finally(() => {
        this.running.delete(entityId);
      });

    this.running.set(entityId, run);
    return run;
  }

  async refreshSensors(reason: RunReason): Promise<EntityState[]> {
    return Promise.all(this.sensors.map((sensor) => this.runEntity(sensor, reason)));
  }

  async tickSelectors(reason: RunReason): Promise<EntityState[]> {
    const states: EntityState[] = [];
    for (const selector of this.selectors) {
      states.push(await this.runEntity(selector, reason));
    }
    return states;
  }

  /** Sensors first so that the selectors mirror what was just cached. */
  async refreshAll(reason: RunReason = "manual"): Promise<EntityState[]> {
    const sensorStates = await this.refreshSensors(reason);
    const selectorStates = await this.tickSelectors(reason);
    return [...sensorStates, ...selectorStates];
  }

  async refreshEntity(entityId: string): Promise<EntityState> {
    const entity = this.entities.get(entityId);
    if (!entity) {
      throw new AppError("Entity Not Found", 404);
    }
    return this.runEntity(entity, "manual");
  }

  listCategories(): Array<{
    id: CategoryId;
    kind: "greeting" | "optional";
    title: string;
    icon: string;
    enabled: boolean;
  }> {
    const enabled = new Set<CategoryId>(this.registry.all);
    return CATEGORY_DEFINITIONS.map((category) => ({
      id: category.id,
      kind: category.kind,
      title: category.title,
      icon: category.icon,
      enabled: enabled.has(category.id),
    }));
  }

  describeTimeBuckets() {
    return describeTable(this.table);
  }

  health() {
    return {
      status: "ok" as const,
      scheduler: {
        enabled: this.schedulerEnabled,
        started: this.started,
        selectorTickMs: this.selectorTickMs,
        rotationTickMs: this.rotation.intervalMs,
        dailyRefreshAt: this.dailyRefreshAt,
      },
      enabledCategories: this.registry.enabled,
      rotationIntervalMinutes: this.config.rotationIntervalMinutes,
      entities: Array.from(this.entities.keys()).map((entityId) => ({
        entityId,
        lastRun: this.lastRuns.get(entityId),
      })),
      cache: this.cache.health(),
    };
  }
}
