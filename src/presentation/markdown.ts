import { Marked } from "marked";
import { enrichHeadings, type TocItem } from "./structured-content";

export interface RenderedMarkdown {
  html: string;
  toc: TocItem[];
}

// Not the global `marked`: extensions registered there do not apply here.
const markdown = new Marked({ gfm: true, breaks: false });

/** Render a Markdown body to an HTML fragment with heading anchors. */
export function renderMarkdown(body: string): RenderedMarkdown {
  const rawHtml = markdown.parse(body, { async: false });
  return enrichHeadings(rawHtml);
}
