import { getCategory, type CategoryId } from "../domain/categories.js";
import type { AttributeValue, CacheLookup, ContentPayload, EntityState } from "../types/content.js";
import { truncate } from "../utils/text.js";
import { formatLocalDate, formatLocalDateTime } from "../utils/time.js";
import { ApiError } from "./tian-client.js";

export const STATE_REQUEST_FAILED = "API请求失败";
export const STATE_WAITING = "等待数据加载";
export const WAITING_MESSAGE = "等待数据加载，请稍后查看";
export const MAX_STATE_LENGTH = 255;

export const ROTATION_ENTITY_ID = "scrolling_content";
export const TIME_SLOT_ENTITY_ID = "time_slot_content";

export function categoryEntityId(category: CategoryId): string {
  return category;
}

export function buildCategoryState(lookup: CacheLookup, nowMs: number): EntityState {
  const { payload } = lookup;
  const attributes: Record<string, AttributeValue> = {
    title: payload.title,
    code: payload.statusCode,
    ...payload.fields,
    title2: payload.display.title2,
    subtitle: payload.display.subtitle,
    content1: payload.display.content1,
    content2: payload.display.content2,
    align: payload.display.align,
    subalign: payload.display.subalign,
    update_time: payload.updateTime,
    update_date: formatLocalDate(nowMs),
  };
  if (lookup.error) {
    attributes.last_error = lookup.error.message;
  }

  return {
    entityId: categoryEntityId(payload.category),
    state: truncate(payload.primary, MAX_STATE_LENGTH),
    available: true,
    attributes,
    lastUpdated: new Date(nowMs).toISOString(),
  };
}

export function buildCategoryFailedState(category: CategoryId, error: Error, nowMs: number): EntityState {
  const root = error.cause instanceof Error ? error.cause : error;
  return {
    entityId: categoryEntityId(category),
    state: STATE_REQUEST_FAILED,
    available: false,
    attributes: {
      title: getCategory(category).title,
      code: root instanceof ApiError ? root.code : 0,
      error: root.message,
      update_time: formatLocalDateTime(nowMs),
      update_date: formatLocalDate(nowMs),
    },
    lastUpdated: new Date(nowMs).toISOString(),
  };
}

/** Mirrors a cached payload into a selector entity, using the emoji display title. */
export function buildDisplayState(
  entityId: string,
  payload: ContentPayload,
  marker: Record<string, string>,
  updateTime: string,
  nowMs: number,
): EntityState {
  return {
    entityId,
    state: truncate(payload.primary, MAX_STATE_LENGTH),
    available: true,
    attributes: {
      title: getCategory(payload.category).displayTitle,
      title2: payload.display.title2,
      subtitle: payload.display.subtitle,
      content1: payload.display.content1,
      content2: payload.display.content2,
      align: payload.display.align,
      subalign: payload.display.subalign,
      ...marker,
      code: payload.statusCode,
      update_time: updateTime,
      update_date: formatLocalDate(nowMs),
    },
    lastUpdated: new Date(nowMs).toISOString(),
  };
}

export function buildWaitingState(
  entityId: string,
  title: string,
  marker: Record<string, string>,
  nowMs: number,
): EntityState {
  return {
    entityId,
    state: STATE_WAITING,
    available: true,
    attributes: {
      title,
      title2: title,
      subtitle: "",
      content1: WAITING_MESSAGE,
      content2: WAITING_MESSAGE,
      align: "center",
      subalign: "center",
      ...marker,
      update_time: formatLocalDateTime(nowMs),
      update_date: formatLocalDate(nowMs),
    },
    lastUpdated: new Date(nowMs).toISOString(),
  };
}
