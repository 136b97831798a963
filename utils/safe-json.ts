/**
 * Safe JSON Parser - Prototype Pollution Protection
 *
 * Uses secure-json-parse so cache files, output artifacts and config files
 * read back from disk cannot smuggle in __proto__ or constructor.prototype keys.
 *
 * @see https://github.com/fastify/secure-json-parse
 */

import sjson from 'secure-json-parse';

export interface SafeParseOptions {
  protoAction?: 'remove' | 'error' | 'ignore';
  constructorAction?: 'remove' | 'error' | 'ignore';
}

const DEFAULT_OPTIONS: SafeParseOptions = {
  protoAction: 'remove',
  constructorAction: 'remove',
};

/**
 * Parses JSON with dangerous prototype keys stripped. Throws on malformed input.
 *
 * @example
 * ```typescript
 * const data = safeJsonParse('{"__proto__": {"polluted": true}, "name": "test"}');
 * // Result: { name: "test" }
 * ```
 */
export function safeJsonParse(text: string, options: SafeParseOptions = DEFAULT_OPTIONS): unknown {
  const parsed: unknown = sjson.parse(text, undefined, {
    protoAction: options.protoAction || 'remove',
    constructorAction: options.constructorAction || 'remove',
  });
  return parsed;
}
