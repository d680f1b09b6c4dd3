import { XMLParser, XMLValidator } from 'fast-xml-parser';
import type { z } from 'zod';

import { ParseError, errorMessage } from '../errors.js';

export type ResultFormat = 'json' | 'xml' | 'auto';

export interface ShapeOptions {
  /** Return the content unchanged. */
  raw?: boolean;
  format?: ResultFormat;
  /** Response content type, used when `format` is `auto`. */
  contentType?: string;
}

/** Attributes are kept with this prefix, e.g. `Task['@_status']`. */
export const XML_ATTRIBUTE_PREFIX = '@_';

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: XML_ATTRIBUTE_PREFIX,
  removeNSPrefix: true,
  ignoreDeclaration: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
});

/** Pick json or xml from the content type, falling back to the first non-blank character. */
export function detectFormat(content: string, contentType?: string): 'json' | 'xml' {
  const type = contentType?.toLowerCase() ?? '';
  if (type.includes('json')) return 'json';
  if (type.includes('xml')) return 'xml';
  return content.trimStart().startsWith('<') ? 'xml' : 'json';
}

export function parseJson(content: string): unknown {
  try {
    return JSON.parse(content) as unknown;
  } catch (e: unknown) {
    throw new ParseError(`Malformed JSON response: ${errorMessage(e)}`, e);
  }
}

export function parseXml(content: string): Record<string, unknown> {
  const valid = XMLValidator.validate(content);
  if (valid !== true) {
    throw new ParseError(
      `Malformed XML response: ${valid.err.msg} (line ${valid.err.line}, column ${valid.err.col})`,
    );
  }
  const parsed: unknown = xmlParser.parse(content);
  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ParseError('Malformed XML response: no root element');
  }
  return Object.fromEntries(Object.entries(parsed));
}

/**
 * Return `content` unchanged (`raw`) or parsed into a navigable object.
 * An empty body parses to `null`.
 *
 * @throws ParseError on malformed content.
 */
export function shapeResult(content: string, options: ShapeOptions = {}): unknown {
  if (options.raw) return content;
  if (content.trim() === '') return null;

  const format =
    options.format === undefined || options.format === 'auto'
      ? detectFormat(content, options.contentType)
      : options.format;

  return format === 'xml' ? parseXml(content) : parseJson(content);
}

/**
 * Validate `value` against `schema`.
 *
 * @throws ParseError naming `what` and every mismatching path.
 */
export function decodeResult<S extends z.ZodTypeAny>(schema: S, value: unknown, what: string): z.output<S> {
  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }
  const issues = result.error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
  throw new ParseError(`Unexpected ${what} response shape: ${issues}`, result.error);
}
