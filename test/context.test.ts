/**
 * seplist - Build Context Tests
 */

import { describe, it, expect } from "vitest";
import { createBuildContext } from "../src/context";
import { DEFAULT_CLASS_PREFIX } from "../src/constants";

describe("createBuildContext", () => {
  it("should default to the global document and prefix", () => {
    const ctx = createBuildContext();

    expect(ctx.document).toBe(document);
    expect(ctx.classPrefix).toBe(DEFAULT_CLASS_PREFIX);
    expect(ctx.classPrefix).toBe("seplist");
  });

  it("should accept a custom document and prefix", () => {
    const doc = document.implementation.createHTMLDocument("other");
    const ctx = createBuildContext({ document: doc, classPrefix: "feed" });

    expect(ctx.document).toBe(doc);
    expect(ctx.classPrefix).toBe("feed");
  });
});
