import { describe, expect, test } from "vitest";
import { CollisionError, ConfigError } from "../errors";
import { OutputPlan, normalizeOutputPath } from "./output-plan";

describe("normalizeOutputPath", () => {
  test("normalises separators and dot segments", () => {
    expect(normalizeOutputPath("a/./b/../c.html")).toBe("a/c.html");
    expect(normalizeOutputPath("a\\b.html")).toBe("a/b.html");
  });

  test("rejects paths outside the output directory", () => {
    expect(() => normalizeOutputPath("/abs.html")).toThrow(ConfigError);
    expect(() => normalizeOutputPath("../up.html")).toThrow(ConfigError);
    expect(() => normalizeOutputPath("dir/")).toThrow(ConfigError);
  });
});

describe("OutputPlan", () => {
  test("returns claimed paths in order", () => {
    const plan = new OutputPlan();
    plan.claim("posts/b/index.html", "posts/b.md");
    plan.claim("index.html", "(site index)");
    plan.claim("posts/a/index.html", "posts/a.md");

    expect(plan.paths()).toEqual(["index.html", "posts/a/index.html", "posts/b/index.html"]);
  });

  test("a second claim is a collision naming both sources", () => {
    const plan = new OutputPlan();
    plan.claim("same/index.html", "a.md");

    let error: unknown;
    try {
      plan.claim("same/./index.html", "b.md");
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(CollisionError);
    if (error instanceof CollisionError) {
      expect(error.outputPath).toBe("same/index.html");
      expect(error.sources).toEqual(["a.md", "b.md"]);
      expect(error.message).toBe('Multiple source files resolve to the same output "same/index.html": a.md, b.md');
    }
  });

  test("a file cannot take the place of a directory another claim needs", () => {
    const plan = new OutputPlan();
    plan.claim("hello/index.html", "hello.md");

    let error: unknown;
    try {
      plan.claim("hello", "static/hello");
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(CollisionError);
    if (error instanceof CollisionError) {
      expect(error.outputPath).toBe("hello");
      expect(error.sources).toEqual(["hello.md", "static/hello"]);
    }
  });

  test("a path cannot sit below a claimed file", () => {
    const plan = new OutputPlan();
    plan.claim("notes", "static/notes");

    let error: unknown;
    try {
      plan.claim("notes/today/index.html", "notes/today.md");
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(CollisionError);
    if (error instanceof CollisionError) {
      expect(error.outputPath).toBe("notes");
      expect(error.sources).toEqual(["static/notes", "notes/today.md"]);
    }
  });

  test("siblings in a shared directory do not collide", () => {
    const plan = new OutputPlan();
    plan.claim("posts/a/index.html", "posts/a.md");
    plan.claim("posts/b/index.html", "posts/b.md");
    plan.claim("posts/index.html", "posts/index.md");

    expect(plan.paths()).toEqual(["posts/a/index.html", "posts/b/index.html", "posts/index.html"]);
  });
});
