import type { ModulePathAdapter } from "./types.js";

/** Replaces the extension of `path`, or appends one when it has none. */
export const withExtension = (
  path: string,
  extension: string,
  pathAdapter: ModulePathAdapter
): string => {
  const current = pathAdapter.extname(path);
  const stem = current ? path.slice(0, -current.length) : path;
  return `${stem}${extension}`;
};

/**
 * Target of an import, relative to the directory of the importing file. An
 * absolute explicit path is taken as is.
 */
export const importTargetPath = ({
  importerPath,
  name,
  explicitPath,
  extension,
  pathAdapter,
}: {
  importerPath: string;
  name: string;
  explicitPath?: string;
  extension: string;
  pathAdapter: ModulePathAdapter;
}): string =>
  withExtension(
    pathAdapter.resolve(pathAdapter.dirname(importerPath), explicitPath ?? name),
    extension,
    pathAdapter
  );
