import { getCategory, type CategoryId } from "../domain/categories.js";
import type { ContentPayload, DisplayFields, TianEnvelope } from "../types/content.js";
import { formatHtmlBreaks, formatPlainBreaks, toText } from "../utils/text.js";
import { formatLocalDateTime } from "../utils/time.js";

type Row = Record<string, unknown>;

interface Extracted {
  primary: string;
  fields: Record<string, string>;
  display: Omit<DisplayFields, "title2">;
}

function isRecord(value: unknown): value is Row {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Picks the content row out of `result`, which arrives as an object, an object wrapping a
 * `list` array, or a bare array depending on the endpoint.
 */
export function extractResultRow(result: unknown): Row | null {
  if (Array.isArray(result)) {
    const first: unknown = result[0];
    return isRecord(first) ? first : {};
  }
  if (!isRecord(result)) {
    return null;
  }
  const list = result["list"];
  if (Array.isArray(list)) {
    const first: unknown = list[0];
    return isRecord(first) ? first : {};
  }
  return result;
}

function pick(row: Row, key: string, fallback: string): string {
  const value = toText(row[key]);
  return value ? value : fallback;
}

function authorTitle(author: string, title: string): string {
  return `${author} · 《${title}》`;
}

const EXTRACTORS: Record<CategoryId, (row: Row) => Extracted> = {
  morning: (row) => {
    let content = pick(row, "content", "早安！新的一天开始了！");
    if (!content.includes("早安")) {
      content = `早安！${content}`;
    }
    return {
      primary: content,
      fields: { content },
      display: { subtitle: "", content1: content, content2: content, align: "left", subalign: "center" },
    };
  },
  evening: (row) => {
    let content = pick(row, "content", "晚安！好梦！");
    if (!content.includes("晚安")) {
      content = `${content}晚安！`;
    }
    return {
      primary: content,
      fields: { content },
      display: { subtitle: "", content1: content, content2: content, align: "left", subalign: "center" },
    };
  },
  maxim: (row) => {
    const en = pick(row, "en", "No maxim available");
    const zh = pick(row, "zh", "暂无格言");
    return {
      primary: en,
      fields: { en, zh },
      display: {
        subtitle: "",
        content1: `【英文】${en}<br>【中文】${zh}`,
        content2: `【英文】${en}\n【中文】${zh}`,
        align: "left",
        subalign: "center",
      },
    };
  },
  joke: (row) => {
    const name = pick(row, "title", "今日笑话");
    const content = pick(row, "content", "暂无笑话内容");
    return {
      primary: content,
      fields: { name, content },
      display: {
        subtitle: name,
        content1: content,
        content2: `${name}\n${content}`,
        align: "left",
        subalign: "center",
      },
    };
  },
  sentence: (row) => {
    const source = pick(row, "source", "未知来源");
    const content = pick(row, "content", "暂无名句内容");
    const subtitle = `《${pick(row, "source", "古籍")}》`;
    return {
      primary: content,
      fields: { content, source },
      display: {
        subtitle,
        content1: formatHtmlBreaks(content),
        content2: `${subtitle}\n${formatPlainBreaks(content)}`,
        align: "center",
        subalign: "center",
      },
    };
  },
  couplet: (row) => {
    const content = pick(row, "content", "暂无对联内容");
    return {
      primary: content,
      fields: { content },
      display: { subtitle: "", content1: content, content2: content, align: "center", subalign: "center" },
    };
  },
  history: (row) => {
    const content = pick(row, "content", "暂无历史内容");
    return {
      primary: content,
      fields: { content },
      display: { subtitle: "", content1: content, content2: content, align: "left", subalign: "center" },
    };
  },
  poetry: (row) => {
    const content = pick(row, "content", "暂无唐诗内容");
    const source = pick(row, "title", "无题");
    const author = pick(row, "author", "未知作者");
    const subtitle = authorTitle(author, source);
    return {
      primary: content,
      fields: {
        content,
        source,
        author,
        intro: pick(row, "intro", ""),
        kind: pick(row, "kind", ""),
      },
      display: {
        subtitle,
        content1: formatHtmlBreaks(content),
        content2: `${subtitle}\n${formatPlainBreaks(content)}`,
        align: "center",
        subalign: "center",
      },
    };
  },
  songci: (row) => {
    const content = pick(row, "content", "暂无宋词内容");
    const source = pick(row, "source", "宋词");
    return {
      primary: content,
      fields: { content, source, author: pick(row, "author", "") },
      display: {
        subtitle: source,
        content1: formatHtmlBreaks(content),
        content2: `${source}\n${formatPlainBreaks(content)}`,
        align: "center",
        subalign: "center",
      },
    };
  },
  yuanqu: (row) => {
    const content = pick(row, "content", "暂无元曲内容");
    const source = pick(row, "title", "无题");
    const author = pick(row, "author", "未知作者");
    const subtitle = authorTitle(author, source);
    return {
      primary: content,
      fields: {
        content,
        source,
        author,
        note: pick(row, "note", ""),
        translation: pick(row, "translation", ""),
      },
      display: {
        subtitle,
        content1: formatHtmlBreaks(content),
        content2: `${subtitle}\n${formatPlainBreaks(content)}`,
        align: "center",
        subalign: "center",
      },
    };
  },
};

export function normalizeContent(category: CategoryId, envelope: TianEnvelope, nowMs: number): ContentPayload | null {
  const row = extractResultRow(envelope.result);
  if (!row) {
    return null;
  }

  const definition = getCategory(category);
  const extracted = EXTRACTORS[category](row);
  const display: DisplayFields = { title2: definition.title, ...extracted.display };

  return Object.freeze({
    category,
    title: definition.title,
    statusCode: envelope.code,
    updateTime: formatLocalDateTime(nowMs),
    fetchedAt: nowMs,
    primary: extracted.primary,
    fields: Object.freeze({ ...extracted.fields }),
    display: Object.freeze(display),
  });
}
