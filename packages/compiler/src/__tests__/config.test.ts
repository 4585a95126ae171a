import { describe, expect, it } from "vitest";
import { DEFAULT_FILE_EXTENSION, resolveCompilerOptions } from "../config.js";

describe("resolveCompilerOptions", () => {
  it("defaults the source extension", () => {
    expect(resolveCompilerOptions()).toEqual({ fileExtension: DEFAULT_FILE_EXTENSION });
    expect(DEFAULT_FILE_EXTENSION).toBe(".brk");
  });

  it("accepts another extension", () => {
    expect(resolveCompilerOptions({ fileExtension: ".bk" })).toEqual({
      fileExtension: ".bk",
    });
  });

  it.each(["brk", ".", ".a/b", ".a.b"])("rejects %j", (fileExtension) => {
    expect(() => resolveCompilerOptions({ fileExtension })).toThrow(
      `fileExtension must be a dot followed by at least one character, got "${fileExtension}"`
    );
  });
});
