import { describe, expect, test } from "vitest";
import {
  findMissingTemplateVariables,
  findTemplateSyntaxError,
  formatDate,
  getValueAtPath,
  renderTemplateString,
} from "./variables";

const date = new Date("2026-02-12T00:00:00Z");

describe("formatDate", () => {
  test("formats tokens in UTC", () => {
    expect(formatDate(date, "YYYY/MM/DD")).toBe("2026/02/12");
    expect(formatDate(date, "YY-M-D")).toBe("26-2-12");
    expect(formatDate(date, "D MMMM YYYY")).toBe("12 February 2026");
    expect(formatDate(date, "D MMM")).toBe("12 Feb");
  });

  test("uses the locale for month names", () => {
    expect(formatDate(date, "D MMMM YYYY", "nl")).toBe("12 februari 2026");
  });
});

describe("renderTemplateString", () => {
  test("format filter reads ISO strings and passes other values through", () => {
    expect(renderTemplateString('{{ d | format("DD.MM.YYYY") }}', { d: "2024-03-05" })).toBe("05.03.2024");
    expect(renderTemplateString("{{ d | format }}", { d: "soon" })).toBe("soon");
  });

  test("does not escape by default", () => {
    expect(renderTemplateString("{{ v }}", { v: "a & b" })).toBe("a & b");
  });
});

describe("template variables", () => {
  test("reads nested values", () => {
    expect(getValueAtPath({ site: { title: "T" } }, "site.title")).toBe("T");
    expect(getValueAtPath({ site: { title: "T" } }, "site.author")).toBeUndefined();
  });

  test("reports unbound variables", () => {
    expect(findMissingTemplateVariables("{{ year }}/{{ slug }}/{{ missing }}.html", { year: "2024", slug: "a" })).toEqual([
      "missing",
    ]);
    expect(findMissingTemplateVariables('{{ slug | replace("x", "y") }}', { slug: "a" })).toEqual([]);
  });
});

describe("findTemplateSyntaxError", () => {
  test("returns null for a template that compiles", () => {
    expect(findTemplateSyntaxError("{{ year }}/{{ slug }}/index.html")).toBeNull();
  });

  test("describes an unclosed tag without the placeholder path", () => {
    const problem = findTemplateSyntaxError("{{ slug");
    expect(problem).not.toBeNull();
    expect(problem).not.toContain("(unknown path)");
  });
});
