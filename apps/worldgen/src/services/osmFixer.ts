import fs from 'node:fs';
import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';
import { OsmParseError } from './osmDocument';

// preserveOrder output: each element is { [tagName]: children[], ':@'?: attributes }
type OrderedElement = Record<string, unknown>;

const ATTRS = ':@';

const xmlOptions = {
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
} as const;

const parser = new XMLParser({ ...xmlOptions, parseAttributeValue: false, parseTagValue: false });
const builder = new XMLBuilder({ ...xmlOptions, format: true, indentBy: '  ', suppressEmptyNode: true });

const isElement = (value: unknown): value is OrderedElement =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const nameOf = (el: OrderedElement): string | undefined => Object.keys(el).find(k => k !== ATTRS);

function childrenOf(el: OrderedElement): unknown[] {
  const name = nameOf(el);
  const children = name === undefined ? undefined : el[name];
  return Array.isArray(children) ? children : [];
}

const named = (list: unknown[], name: string): OrderedElement[] =>
  list.filter(isElement).filter(el => nameOf(el) === name);

function attrOf(el: OrderedElement, key: string): string | undefined {
  const attrs = el[ATTRS];
  if (!isElement(attrs)) return undefined;
  const value = attrs[`@_${key}`];
  return typeof value === 'string' ? value : undefined;
}

export interface OsmFixReport {
  xml: string;
  unclosedWays: number;
  missingBuildingLevels: number;
}

/**
 * Repair OSM structure that trips up mesh generation: building ways are
 * closed by repeating their first node, and buildings without
 * `building:levels` get a single level.
 */
export function fixOsmStructure(xml: string): OsmFixReport {
  const valid = XMLValidator.validate(xml);
  if (valid !== true) {
    throw new OsmParseError(`${valid.err.msg} (line ${valid.err.line}, col ${valid.err.col})`, valid.err.line);
  }

  const doc: unknown = parser.parse(xml);
  const top = Array.isArray(doc) ? doc : [];
  let unclosedWays = 0;
  let missingBuildingLevels = 0;

  for (const osm of named(top, 'osm')) {
    for (const way of named(childrenOf(osm), 'way')) {
      const children = childrenOf(way);
      const tags = named(children, 'tag');
      if (!tags.some(t => attrOf(t, 'k') === 'building')) continue;

      const nds = named(children, 'nd');
      const firstRef = nds.length > 0 ? attrOf(nds[0], 'ref') : undefined;
      const lastRef = nds.length > 0 ? attrOf(nds[nds.length - 1], 'ref') : undefined;
      if (nds.length >= 3 && firstRef !== undefined && firstRef !== lastRef) {
        const after = children.indexOf(nds[nds.length - 1]) + 1;
        children.splice(after, 0, { nd: [], [ATTRS]: { '@_ref': firstRef } });
        unclosedWays++;
      }

      if (!tags.some(t => attrOf(t, 'k') === 'building:levels')) {
        children.push({ tag: [], [ATTRS]: { '@_k': 'building:levels', '@_v': '1' } });
        missingBuildingLevels++;
      }
    }
  }

  return { xml: String(builder.build(top)).trimStart(), unclosedWays, missingBuildingLevels };
}

// Rewrites the file in place
export function fixOsmFile(osmPath: string): Omit<OsmFixReport, 'xml'> {
  console.log(`[FIX] Fixing common OSM issues in: ${osmPath}`);
  const { xml, unclosedWays, missingBuildingLevels } = fixOsmStructure(fs.readFileSync(osmPath, 'utf8'));
  fs.writeFileSync(osmPath, xml);
  console.log(`[FIX] Fixed ${unclosedWays} unclosed ways`);
  console.log(`[FIX] Added ${missingBuildingLevels} missing building:levels tags`);
  return { unclosedWays, missingBuildingLevels };
}
