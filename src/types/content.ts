import type { CategoryId } from "../domain/categories.js";

export type Alignment = "left" | "center";

export interface DisplayFields {
  title2: string;
  subtitle: string;
  content1: string;
  content2: string;
  align: Alignment;
  subalign: Alignment;
}

/** Normalized result of one category fetch; replaced wholesale on every successful fetch. */
export interface ContentPayload {
  readonly category: CategoryId;
  readonly title: string;
  readonly statusCode: number;
  /** Local wall-clock fetch time, `YYYY-MM-DD HH:mm:ss`. */
  readonly updateTime: string;
  readonly fetchedAt: number;
  readonly primary: string;
  readonly fields: Readonly<Record<string, string>>;
  readonly display: Readonly<DisplayFields>;
}

export interface CacheEntry {
  payload: ContentPayload;
  fetchedAt: number;
}

export type CacheOrigin = "cache" | "network" | "stale";

export interface CacheLookup {
  payload: ContentPayload;
  origin: CacheOrigin;
  /** Set when a refetch failed and a stale payload was served instead. */
  error?: Error;
}

export interface TianEnvelope {
  code: number;
  msg: string;
  result?: unknown;
}

export type AttributeValue = string | number;

export interface EntityDescriptor {
  entityId: string;
  name: string;
  icon: string;
  kind: "category" | "rotation" | "time_slot";
}

export interface EntityState {
  entityId: string;
  state: string;
  available: boolean;
  attributes: Record<string, AttributeValue>;
  lastUpdated: string;
}

export interface ApiResponse<T> {
  code: number;
  message: string;
  data: T;
}
