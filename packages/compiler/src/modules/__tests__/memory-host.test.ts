import { describe, expect, it } from "vitest";
import { resolve } from "node:path";
import { createMemoryModuleHost } from "../memory-host.js";

describe("createMemoryModuleHost", () => {
  it("follows directory links relative to the link", () => {
    const host = createMemoryModuleHost({
      files: { [resolve("/data/real/a.brk")]: "var a = 1\n" },
      symlinks: { [resolve("/data/link")]: "real" },
    });

    expect(host.realpath(resolve("/data/link/a.brk"))).toBe(resolve("/data/real/a.brk"));
    expect(host.readFile(resolve("/data/link/a.brk"))).toBe("var a = 1\n");
  });

  it("throws for files it does not hold", () => {
    const host = createMemoryModuleHost({ files: {} });
    expect(() => host.readFile(resolve("/data/nope.brk"))).toThrow(
      `File not found: ${resolve("/data/nope.brk")}`
    );
  });

  it("gives up on link loops", () => {
    const host = createMemoryModuleHost({
      files: {},
      symlinks: {
        [resolve("/data/x.brk")]: "y.brk",
        [resolve("/data/y.brk")]: "x.brk",
      },
    });
    expect(() => host.realpath(resolve("/data/x.brk"))).toThrow(
      /Too many levels of symbolic links/
    );
  });
});
