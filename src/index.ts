export { parseFile, parseString } from "./parser/parseCqasm.js";
export { SourceLocation } from "./parser/sourceLocation.js";
export type { ParseResult } from "./parser/parseResult.js";
export { isSuccess, requireRoot } from "./parser/parseResult.js";
export { CqasmParseError } from "./parser/errors.js";
export { DEFAULT_MAX_ERRORS } from "./parser/options.js";
export type { ParseFileSystem, ParseOptions } from "./parser/options.js";
export { ConsoleLogger, SilentLogger } from "./logging/logger.js";
export type { LogLevel, Logger } from "./logging/logger.js";
export { childrenOf, collectErroneous, forEachNode, isWellFormed } from "./ast/walk.js";
export type * from "./ast/types.js";
