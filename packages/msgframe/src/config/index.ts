/**
 * Parser configuration exports
 */

export type { PrefixWidth, ByteOrder, ParserOptions, ParserConfig } from './parser-config.js';
export {
  DEFAULT_PARSER_CONFIG,
  lengthCapacity,
  createParserConfig,
  reconfigure,
  isSatisfiable,
} from './parser-config.js';
