import * as fs from "node:fs";

import { silentLogger, type Logger } from "../logging/logger.js";

export const DEFAULT_MAX_ERRORS = 100;

/** The file operations the helper needs; `node:fs` satisfies it. */
export interface ParseFileSystem {
  openSync(path: string, flags: "r"): number;
  readFileSync(fd: number, encoding: "utf8"): string;
  closeSync(fd: number): void;
}

export interface ParseOptions {
  readonly logger?: Logger;
  /** Diagnostics kept per parse before the rest are dropped. */
  readonly maxErrors?: number;
  readonly fileSystem?: ParseFileSystem;
}

export interface ResolvedParseOptions {
  readonly logger: Logger;
  readonly maxErrors: number;
  readonly fileSystem: ParseFileSystem;
}

const nodeFileSystem: ParseFileSystem = {
  openSync: (path, flags) => fs.openSync(path, flags),
  readFileSync: (fd, encoding) => fs.readFileSync(fd, encoding),
  closeSync: (fd) => fs.closeSync(fd),
};

export function resolveParseOptions(options: ParseOptions = {}): ResolvedParseOptions {
  const maxErrors =
    options.maxErrors !== undefined &&
    Number.isInteger(options.maxErrors) &&
    options.maxErrors > 0
      ? options.maxErrors
      : DEFAULT_MAX_ERRORS;
  return {
    logger: options.logger ?? silentLogger,
    maxErrors,
    fileSystem: options.fileSystem ?? nodeFileSystem,
  };
}
