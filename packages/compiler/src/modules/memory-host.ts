import { createNodePathAdapter } from "./node-path-adapter.js";
import type { ModuleHost, ModulePathAdapter } from "./types.js";

const MAX_LINK_HOPS = 40;

/**
 * Host over an in-memory file table. `symlinks` maps a link path (a file or
 * a directory) to its target.
 */
export const createMemoryModuleHost = ({
  files,
  symlinks = {},
  pathAdapter = createNodePathAdapter(),
}: {
  files: Record<string, string>;
  symlinks?: Record<string, string>;
  pathAdapter?: ModulePathAdapter;
}): ModuleHost => {
  const normalized = new Map<string, string>();
  Object.entries(files).forEach(([path, contents]) => {
    normalized.set(pathAdapter.resolve(path), contents);
  });

  const links = Object.entries(symlinks).map(([link, target]) => {
    const from = pathAdapter.resolve(link);
    return { from, to: pathAdapter.resolve(pathAdapter.dirname(from), target) };
  });

  const followLink = (path: string): string | undefined => {
    for (const { from, to } of links) {
      if (path === from) return to;
      if (path.startsWith(pathAdapter.join(from, "/"))) {
        return pathAdapter.join(to, path.slice(from.length));
      }
    }
    return undefined;
  };

  const realpath = (path: string): string => {
    let current = pathAdapter.resolve(path);
    for (let hops = 0; hops <= MAX_LINK_HOPS; hops += 1) {
      const next = followLink(current);
      if (next === undefined) {
        if (!normalized.has(current)) {
          throw new Error(`File not found: ${current}`);
        }
        return current;
      }
      current = next;
    }
    throw new Error(`Too many levels of symbolic links: ${path}`);
  };

  return {
    path: pathAdapter,
    readFile: (path: string) => {
      const resolved = realpath(path);
      const file = normalized.get(resolved);
      if (file === undefined) {
        throw new Error(`File not found: ${resolved}`);
      }
      return file;
    },
    realpath,
  };
};
