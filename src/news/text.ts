import { DOMParser } from "linkedom";

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/** Strips markup and decodes entities from feed-supplied text. */
export function toPlainText(raw: string): string {
  if (!/[<&]/.test(raw)) {
    return collapseWhitespace(raw);
  }
  const parser = new DOMParser();
  const doc = parser.parseFromString(`<!doctype html><html><body>${raw}</body></html>`, "text/html");
  return collapseWhitespace(doc.body?.textContent ?? "");
}

/**
 * Description passed to the model: the plain-text description, or the
 * placeholder when it is empty or only repeats the headline.
 */
export function resolvePromptDescription(
  headline: string,
  description: string,
  placeholder: string,
): string {
  const plain = toPlainText(description);
  if (!plain || plain === collapseWhitespace(headline)) {
    return placeholder;
  }
  return plain;
}

/** Cuts to `max` code points so a surrogate pair is never split. */
export function truncate(text: string, max: number): string {
  if (text.length <= max) {
    return text;
  }
  return Array.from(text).slice(0, max).join("");
}
