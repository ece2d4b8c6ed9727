import {isLosslessNumber, LosslessNumber, parse, stringify} from 'lossless-json';

export {isLosslessNumber, LosslessNumber};

/**
 * Parses JSON with every number kept as a `LosslessNumber` holding its source text, so `44.0`
 * stays `44.0` and integers past 2^53 keep every digit. Throws `SyntaxError` like `JSON.parse`.
 */
export const parseJsonLossless = (text: string): unknown => parse(text);

/**
 * Serializes with `LosslessNumber` values written back as their source text.
 */
export const stringifyJsonLossless = (value: unknown): string => stringify(value) ?? 'null';
