export type { IParser } from "./parser.interface.js";
export { fileExtension } from "./parser.interface.js";
export { TextParser, EMPTY_CONTENT_WARNING, detectCsvDelimiter } from "./text-parser.js";
export { DoclingParser } from "./docling-parser.js";
export type { DoclingParserOptions } from "./docling-parser.js";
export { createParserRegistry, createDefaultParserRegistry } from "./factory.js";
export type { ParserRegistry } from "./factory.js";
