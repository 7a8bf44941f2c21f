import { describe, it, expect } from "vitest";
import { FieldResolutionError } from "./errors.js";
import { createPathResolver, selectResolver, walkPath } from "./resolver.js";

class Author {
  constructor(
    public first: string,
    public last: string
  ) {}

  fullName(): string {
    return `${this.first} ${this.last}`;
  }

  get initials(): string {
    return `${this.first[0]}${this.last[0]}`;
  }
}

describe("walkPath", () => {
  it("should read nested attributes", () => {
    expect(walkPath({ author: { name: "Ann" } }, "author.name")).toBe("Ann");
  });

  it("should call zero-argument accessors", () => {
    const record = { author: new Author("Ada", "Lovelace") };
    expect(walkPath(record, "author.fullName")).toBe("Ada Lovelace");
  });

  it("should read getters as attributes", () => {
    const record = { author: new Author("Ada", "Lovelace") };
    expect(walkPath(record, "author.initials")).toBe("AL");
  });

  it("should read map entries", () => {
    const record = { labels: new Map([["lang", "en"]]) };
    expect(walkPath(record, "labels.lang")).toBe("en");
  });

  it("should resolve methods and properties of primitives", () => {
    expect(walkPath({ title: "abc" }, "title.toUpperCase")).toBe("ABC");
    expect(walkPath({ title: "abc" }, "title.length")).toBe(3);
  });

  it("should fail on an absent intermediate value", () => {
    const record = { author: null };
    try {
      walkPath(record, "author.name");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(FieldResolutionError);
      const error = err as FieldResolutionError;
      expect(error.path).toBe("author.name");
      expect(error.segment).toBe("name");
      expect(error.message).toBe(
        "Record: { author: null } does not contain: author.name currently trying to get: name"
      );
    }
  });

  it("should fail on a missing attribute", () => {
    expect(() => walkPath({ id: 1 }, "title")).toThrow(
      "Record: { id: 1 } does not contain: title currently trying to get: title"
    );
  });

  it("should fail when the path ends on null", () => {
    expect(() => walkPath({ id: 2, title: null }, "title")).toThrow(FieldResolutionError);
  });

  it("should keep falsy but present values", () => {
    expect(walkPath({ count: 0 }, "count")).toBe(0);
    expect(walkPath({ title: "" }, "title")).toBe("");
  });
});

describe("selectResolver", () => {
  it("should prefer map entries, then accessors, then attributes", () => {
    expect(selectResolver(new Map([["size", 1]]), "size")?.kind).toBe("entry");
    expect(selectResolver(new Author("a", "b"), "fullName")?.kind).toBe("accessor");
    expect(selectResolver(new Author("a", "b"), "first")?.kind).toBe("attribute");
    expect(selectResolver({}, "missing")).toBeUndefined();
  });
});

describe("createPathResolver", () => {
  it("should reuse a compiled path across records", () => {
    const resolve = createPathResolver("meta.slug");
    expect(resolve({ meta: { slug: "one" } })).toBe("one");
    expect(resolve({ meta: { slug: "two" } })).toBe("two");
  });
});
