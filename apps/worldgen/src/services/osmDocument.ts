import { XMLParser, XMLValidator } from 'fast-xml-parser';
import type { OsmDocument, OsmNode, OsmTag, OsmWay } from '../types/osm';

export class OsmParseError extends Error {
  constructor(message: string, readonly line?: number) {
    super(message);
    this.name = 'OsmParseError';
  }
}

const ARRAY_PATHS = new Set(['osm.node', 'osm.way', 'osm.node.tag', 'osm.way.tag', 'osm.way.nd']);

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  parseAttributeValue: false,
  parseTagValue: false,
  isArray: (_name, jpath) => ARRAY_PATHS.has(jpath),
});

type XmlElement = Record<string, unknown>;

const isElement = (value: unknown): value is XmlElement =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const elements = (value: unknown): XmlElement[] =>
  Array.isArray(value) ? value.filter(isElement) : [];

const attr = (el: XmlElement, name: string): string | undefined => {
  const value = el[`@_${name}`];
  return typeof value === 'string' ? value : undefined;
};

const coord = (el: XmlElement, name: string): number | undefined => {
  const raw = attr(el, name)?.trim();
  if (!raw) return undefined;
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
};

function readTags(el: XmlElement): OsmTag[] {
  const tags: OsmTag[] = [];
  for (const tag of elements(el.tag)) {
    const k = attr(tag, 'k');
    if (k === undefined) continue;
    tags.push({ k, v: attr(tag, 'v') ?? '' });
  }
  return tags;
}

/**
 * Parse OSM XML into nodes and ways, both in document order.
 * Relations and anything else under <osm> are ignored.
 */
export function parseOsmDocument(xml: string): OsmDocument {
  const valid = XMLValidator.validate(xml);
  if (valid !== true) {
    throw new OsmParseError(`${valid.err.msg} (line ${valid.err.line}, col ${valid.err.col})`, valid.err.line);
  }

  const parsed: unknown = parser.parse(xml);
  const root = isElement(parsed) && isElement(parsed.osm) ? parsed.osm : {};

  const nodes: OsmNode[] = [];
  let skippedNodes = 0;
  for (const el of elements(root.node)) {
    const lat = coord(el, 'lat');
    const lon = coord(el, 'lon');
    if (lat === undefined || lon === undefined) {
      skippedNodes++;
      continue;
    }
    nodes.push({ id: attr(el, 'id') ?? '', lat, lon, tags: readTags(el) });
  }

  const ways: OsmWay[] = elements(root.way).map(el => ({
    id: attr(el, 'id') ?? '',
    refs: elements(el.nd).flatMap(nd => {
      const ref = attr(nd, 'ref');
      return ref === undefined ? [] : [ref];
    }),
    tags: readTags(el),
  }));

  return { nodes, ways, skippedNodes };
}
