const SENTENCE_END = /([。？！])/g;

export function formatHtmlBreaks(text: string | undefined): string {
  if (!text) {
    return "";
  }
  return text
    .replace(SENTENCE_END, "$1<br>")
    .replace(/(?:<br>)+/g, "<br>")
    .replace(/(?:<br>)+$/, "");
}

export function formatPlainBreaks(text: string | undefined): string {
  if (!text) {
    return "";
  }
  return text
    .replace(SENTENCE_END, "$1\n")
    .replace(/\n+/g, "\n")
    .replace(/\n+$/, "");
}

export function toText(value: unknown): string | undefined {
  if (typeof value === "string") {
    return value.trim();
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return undefined;
}

export function truncate(text: string, maxLength: number): string {
  const chars = Array.from(text);
  if (chars.length <= maxLength) {
    return text;
  }
  return `${chars.slice(0, maxLength - 1).join("")}…`;
}
