import { slugify } from "../content/slug";

export interface TocItem {
  id: string;
  level: number;
  /** Heading text, HTML-escaped */
  text: string;
}

const ENTITIES: Record<string, string> = {
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": '"',
  "&#39;": "'",
};

function decodeEntities(value: string): string {
  return value.replace(/&(?:amp|lt|gt|quot|#39);/g, (entity) => ENTITIES[entity] ?? entity);
}

/** Give h1-h3 headings stable ids and collect h1-h2 as table of contents entries. */
export function enrichHeadings(contentHtml: string): { html: string; toc: TocItem[] } {
  const counts = new Map<string, number>();
  const toc: TocItem[] = [];

  const html = contentHtml.replace(
    /<h([1-3])>([\s\S]*?)<\/h\1>/g,
    (_match, levelRaw: string, innerHtml: string) => {
      const level = parseInt(levelRaw, 10);
      const text = innerHtml.replace(/<[^>]+>/g, "").trim();
      const base = slugify(decodeEntities(text)) || "section";
      const count = (counts.get(base) ?? 0) + 1;
      counts.set(base, count);
      const id = count === 1 ? base : `${base}-${count}`;

      if (level <= 2 && text) {
        toc.push({ id, level, text });
      }

      return `<h${level} id="${id}">${innerHtml}</h${level}>`;
    }
  );

  return { html, toc };
}
