/**
 * Parser configuration: prefix width, body length bounds and byte order.
 *
 * Configuration never throws. Out-of-range input is normalized:
 * an unsupported width falls back to 2, a zero or malformed bound keeps its
 * previous value, and each bound is clamped to what the prefix can hold.
 * `minLength > maxLength` is left as configured; see {@link isSatisfiable}.
 */

export type PrefixWidth = 1 | 2 | 4;

export type ByteOrder = 'big' | 'little';

export interface ParserOptions {
  /** Length prefix size in bytes: 1, 2 or 4 (default: 2) */
  prefixWidth?: number;
  /** Smallest accepted body length, inclusive (default: 1) */
  minLength?: number;
  /** Largest accepted body length, inclusive (default: 1024) */
  maxLength?: number;
  /** Byte order of multi-byte prefixes (default: 'big') */
  byteOrder?: ByteOrder;
  /** Shorthand for `byteOrder: 'little'`; ignored when byteOrder is set */
  littleEndian?: boolean;
}

export interface ParserConfig {
  readonly prefixWidth: PrefixWidth;
  readonly minLength: number;
  readonly maxLength: number;
  readonly byteOrder: ByteOrder;
}

export const DEFAULT_PARSER_CONFIG: ParserConfig = Object.freeze({
  prefixWidth: 2,
  minLength: 1,
  maxLength: 1024,
  byteOrder: 'big',
});

/**
 * Largest body length a prefix of the given width can express
 */
export function lengthCapacity(width: PrefixWidth): number {
  switch (width) {
    case 1:
      return 0xff;
    case 2:
      return 0xffff;
    case 4:
      return 0xffffffff;
  }
}

function normalizeWidth(width: number | undefined, previous: PrefixWidth): PrefixWidth {
  if (width === undefined) {
    return previous;
  }
  return width === 1 || width === 2 || width === 4 ? width : 2;
}

// Values above every capacity (Infinity included) pass through and are
// clamped by the caller.
function normalizeBound(value: number | undefined, previous: number): number {
  if (value === undefined || Number.isNaN(value) || value <= 0) {
    return previous;
  }
  if (value <= lengthCapacity(4) && !Number.isInteger(value)) {
    return previous;
  }
  return value;
}

function normalizeOrder(options: ParserOptions, previous: ByteOrder): ByteOrder {
  if (options.byteOrder === 'big' || options.byteOrder === 'little') {
    return options.byteOrder;
  }
  if (options.littleEndian !== undefined) {
    return options.littleEndian ? 'little' : 'big';
  }
  return previous;
}

/**
 * Apply options on top of an existing configuration.
 * Returns a new frozen object; `base` is never modified.
 */
export function reconfigure(base: ParserConfig, options: ParserOptions): ParserConfig {
  const prefixWidth = normalizeWidth(options.prefixWidth, base.prefixWidth);
  const capacity = lengthCapacity(prefixWidth);

  return Object.freeze({
    prefixWidth,
    minLength: Math.min(normalizeBound(options.minLength, base.minLength), capacity),
    maxLength: Math.min(normalizeBound(options.maxLength, base.maxLength), capacity),
    byteOrder: normalizeOrder(options, base.byteOrder),
  });
}

/**
 * Build a configuration from options over the defaults
 */
export function createParserConfig(options: ParserOptions = {}): ParserConfig {
  return reconfigure(DEFAULT_PARSER_CONFIG, options);
}

/**
 * Whether any body length passes validation under this configuration
 */
export function isSatisfiable(config: ParserConfig): boolean {
  return config.minLength <= config.maxLength;
}

