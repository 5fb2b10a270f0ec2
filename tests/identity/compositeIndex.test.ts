/**
 * Tests for content-addressed ids and the composite image index
 */

import { describe, it, expect, beforeEach } from "@jest/globals";
import { CompositeIndex } from "../../src/identity/compositeIndex.js";
import { canonicalizePath, imageId, noteId } from "../../src/identity/ids.js";

describe("ids", () => {
  it("should canonicalize separators and leading ./", () => {
    expect(canonicalizePath("./projects\\alpha.md")).toBe("projects/alpha.md");
  });

  it("should derive note ids from the canonical path only", () => {
    const id = noteId("projects/alpha.md");
    expect(id).toMatch(/^note_[0-9a-f]{16}$/);
    expect(noteId("./projects/alpha.md")).toBe(id);
    expect(noteId("projects/beta.md")).not.toBe(id);
  });

  it("should give the same image a different id per referencing note", () => {
    const fromA = imageId(noteId("a.md"), "shared.png");
    const fromB = imageId(noteId("b.md"), "shared.png");

    expect(fromA).toMatch(/^img_[0-9a-f]{16}$/);
    expect(fromA).not.toBe(fromB);
    expect(imageId(noteId("a.md"), "shared.png")).toBe(fromA);
  });

  it("should key images by the path as written", () => {
    const source = noteId("a.md");
    expect(imageId(source, "./shared.png")).not.toBe(imageId(source, "shared.png"));
  });
});

describe("CompositeIndex", () => {
  let index: CompositeIndex;
  const source = noteId("a.md");

  beforeEach(() => {
    index = new CompositeIndex();
  });

  it("should return the content-addressed id", () => {
    expect(index.lookup(source, "x.png")).toBe(imageId(source, "x.png"));
    expect(index.has(source, "x.png")).toBe(true);
    expect(index.has(source, "y.png")).toBe(false);
  });

  it("should count cache hits and misses", () => {
    index.lookup(source, "x.png");
    index.lookup(source, "x.png");
    index.lookup(source, "y.png");

    expect(index.stats()).toEqual({ size: 2, hits: 1, misses: 2, hitRate: 1 / 3 });
  });

  it("should reset on clear", () => {
    index.lookup(source, "x.png");
    index.clear();

    expect(index.size).toBe(0);
    expect(index.stats()).toEqual({ size: 0, hits: 0, misses: 0, hitRate: 0 });
  });
});
