/**
 * XML Metadata Parser
 *
 * Flattens the `Attribute` elements of the first series-level and the first
 * image-level section of a Philips XML file. Failures degrade to an empty
 * map and never abort a conversion.
 */

import * as fs from 'fs';
import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { toError } from './errors.js';
import type { XmlMetadata } from './types.js';
import { silentLogger, type Logger } from '../utils/logger.js';

const SERIES_SECTION = 'Series_Info';
const IMAGE_SECTION = 'Image_Info';
const ATTRIBUTE_ELEMENT = 'Attribute';
const NAME_ATTRIBUTE = '@_Name';
const TEXT_NODE = '#text';

export const IMAGE_ATTRIBUTE_PREFIX = 'Image_';

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: TEXT_NODE,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
});

/**
 * Parse XML text into flat metadata. Throws on malformed XML.
 * A name repeated within a section keeps its last value.
 */
export function parseXmlMetadata(xml: string): XmlMetadata {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line } = validation.err;
    throw new Error(`${msg} (line ${line})`);
  }

  const document: unknown = parser.parse(xml);
  const metadata: XmlMetadata = {};

  const series = findFirst(document, SERIES_SECTION);
  if (series !== undefined) {
    collectAttributes(series, metadata, '');
  }

  const image = findFirst(document, IMAGE_SECTION);
  if (image !== undefined) {
    collectAttributes(image, metadata, IMAGE_ATTRIBUTE_PREFIX);
  }

  return metadata;
}

/**
 * Read XML metadata from disk; absent or malformed files yield `{}`
 */
export function readXmlMetadata(filePath: string, logger: Logger = silentLogger): XmlMetadata {
  if (!fs.existsSync(filePath)) {
    logger.debug(`No XML file at ${filePath}`);
    return {};
  }

  try {
    return parseXmlMetadata(fs.readFileSync(filePath, 'utf8'));
  } catch (e) {
    logger.warn(`Warning: Could not parse XML file ${filePath}: ${toError(e).message}`);
    return {};
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Depth-first search in document order for the first element named `tag`
 */
function findFirst(node: unknown, tag: string): unknown {
  if (Array.isArray(node)) {
    for (const item of node) {
      const found = findFirst(item, tag);
      if (found !== undefined) return found;
    }
    return undefined;
  }
  if (!isRecord(node)) return undefined;

  for (const [key, value] of Object.entries(node)) {
    if (key === tag) {
      return Array.isArray(value) ? value[0] : value;
    }
    const found = findFirst(value, tag);
    if (found !== undefined) return found;
  }
  return undefined;
}

function collectAttributes(node: unknown, out: XmlMetadata, prefix: string): void {
  if (Array.isArray(node)) {
    for (const item of node) collectAttributes(item, out, prefix);
    return;
  }
  if (!isRecord(node)) return;

  for (const [key, value] of Object.entries(node)) {
    if (key.startsWith('@_') || key === TEXT_NODE) continue;
    if (key === ATTRIBUTE_ELEMENT) {
      const items = Array.isArray(value) ? value : [value];
      for (const item of items) addAttribute(item, out, prefix);
    } else {
      collectAttributes(value, out, prefix);
    }
  }
}

function addAttribute(item: unknown, out: XmlMetadata, prefix: string): void {
  if (!isRecord(item)) return;
  const name = item[NAME_ATTRIBUTE];
  const text = item[TEXT_NODE];
  if (typeof name !== 'string' || typeof text !== 'string' || !name || !text) return;

  out[`${prefix}${name}`] = text;
}
