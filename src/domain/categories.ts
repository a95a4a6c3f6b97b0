export type GreetingCategoryId = "morning" | "evening";

export type OptionalCategoryId =
  | "maxim"
  | "joke"
  | "sentence"
  | "couplet"
  | "history"
  | "poetry"
  | "songci"
  | "yuanqu";

export type CategoryId = GreetingCategoryId | OptionalCategoryId;

export interface CategoryDefinition {
  id: CategoryId;
  kind: "greeting" | "optional";
  /** Plain title, published by the category's own sensor. */
  title: string;
  /** Title with a leading emoji, published by the selectors. */
  displayTitle: string;
  path: string;
  query: Readonly<Record<string, string>>;
  icon: string;
  slotLabel: string;
}

export const GREETING_CATEGORY_IDS: readonly GreetingCategoryId[] = ["morning", "evening"];

// Canonical order: rotation sequence and daytime bucket sequence both follow it.
export const OPTIONAL_CATEGORY_IDS: readonly OptionalCategoryId[] = [
  "maxim",
  "joke",
  "sentence",
  "couplet",
  "history",
  "poetry",
  "songci",
  "yuanqu",
];

export const CATEGORY_DEFINITIONS: readonly CategoryDefinition[] = [
  {
    id: "morning",
    kind: "greeting",
    title: "早安心语",
    displayTitle: "🌅早安问候",
    path: "/zaoan/index",
    query: {},
    icon: "mdi:weather-sunny",
    slotLabel: "早安时段",
  },
  {
    id: "evening",
    kind: "greeting",
    title: "晚安心语",
    displayTitle: "🌃晚安问候",
    path: "/wanan/index",
    query: {},
    icon: "mdi:weather-night",
    slotLabel: "晚安时段",
  },
  {
    id: "maxim",
    kind: "optional",
    title: "英文格言",
    displayTitle: "☘️英文格言",
    path: "/enmaxim/index",
    query: {},
    icon: "mdi:translate",
    slotLabel: "格言时段",
  },
  {
    id: "joke",
    kind: "optional",
    title: "每日笑话",
    displayTitle: "🌻每日笑话",
    path: "/joke/index",
    query: { num: "1" },
    icon: "mdi:emoticon-lol",
    slotLabel: "笑话时段",
  },
  {
    id: "sentence",
    kind: "optional",
    title: "古籍名句",
    displayTitle: "🌻古籍名句",
    path: "/gjmj/index",
    query: {},
    icon: "mdi:format-quote-close",
    slotLabel: "名句时段",
  },
  {
    id: "couplet",
    kind: "optional",
    title: "经典对联",
    displayTitle: "🔖经典对联",
    path: "/duilian/index",
    query: {},
    icon: "mdi:brush",
    slotLabel: "对联时段",
  },
  {
    id: "history",
    kind: "optional",
    title: "简说历史",
    displayTitle: "🏷️简说历史",
    path: "/pitlishi/index",
    query: {},
    icon: "mdi:calendar-clock",
    slotLabel: "历史时段",
  },
  {
    id: "poetry",
    kind: "optional",
    title: "唐诗鉴赏",
    displayTitle: "🔖唐诗鉴赏",
    path: "/poetry/index",
    query: {},
    icon: "mdi:book-open-variant",
    slotLabel: "唐诗时段",
  },
  {
    id: "songci",
    kind: "optional",
    title: "最美宋词",
    displayTitle: "🌼最美宋词",
    path: "/zmsc/index",
    query: {},
    icon: "mdi:book-music",
    slotLabel: "宋词时段",
  },
  {
    id: "yuanqu",
    kind: "optional",
    title: "精选元曲",
    displayTitle: "🔖精选元曲",
    path: "/yuanqu/index",
    query: { num: "1", page: "1" },
    icon: "mdi:music",
    slotLabel: "元曲时段",
  },
];

export const CATEGORY_MAP = new Map<CategoryId, CategoryDefinition>(
  CATEGORY_DEFINITIONS.map((category) => [category.id, category]),
);

export function isCategoryId(value: string): value is CategoryId {
  return CATEGORY_MAP.has(value as CategoryId);
}

export function isOptionalCategoryId(value: string): value is OptionalCategoryId {
  return (OPTIONAL_CATEGORY_IDS as readonly string[]).includes(value);
}

export function getCategory(id: CategoryId): CategoryDefinition {
  const category = CATEGORY_MAP.get(id);
  if (!category) {
    throw new Error(`Unknown category ${id}`);
  }
  return category;
}

/** Fixed greetings plus the enabled optional categories, for one configuration entry. */
export interface CategoryRegistry {
  readonly greetings: readonly GreetingCategoryId[];
  readonly enabled: readonly OptionalCategoryId[];
  readonly all: readonly CategoryId[];
}

export function buildCategoryRegistry(enabled: readonly OptionalCategoryId[]): CategoryRegistry {
  const wanted = new Set(enabled);
  const ordered = OPTIONAL_CATEGORY_IDS.filter((id) => wanted.has(id));
  return Object.freeze({
    greetings: GREETING_CATEGORY_IDS,
    enabled: Object.freeze(ordered),
    all: Object.freeze([...GREETING_CATEGORY_IDS, ...ordered]),
  });
}
