import { readFileSync, realpathSync } from "node:fs";
import { TextDecoder } from "node:util";
import type { ModuleHost } from "./types.js";
import { createNodePathAdapter } from "./node-path-adapter.js";

const utf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/** Throws on malformed UTF-8 so the file is reported as unreadable. */
export const decodeSource = (bytes: Uint8Array): string => utf8.decode(bytes);

export const createFsModuleHost = (): ModuleHost => ({
  path: createNodePathAdapter(),
  readFile: (path: string) => decodeSource(readFileSync(path)),
  realpath: (path: string) => realpathSync(path),
});
