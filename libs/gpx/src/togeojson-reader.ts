import { DOMParser } from '@xmldom/xmldom';
import * as toGeoJSON from '@tmcw/togeojson';
import type { BoundingBox, RawGpxDocument, RawRow } from '@trackfuse/track';
import { GpxReader } from './gpx-reader.interface';

type GpxFeature = ReturnType<typeof toGeoJSON.gpx>['features'][number];
type Position = number[];

const METADATA_TAGS = ['name', 'desc', 'time', 'keywords'] as const;
const WAYPOINT_PROPERTIES = ['name', 'desc', 'time', 'sym', 'type'] as const;
const ELEMENT_NODE = 1;

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

function childElements(parent: Element, name?: string): Element[] {
  return Array.from(parent.childNodes)
    .filter(isElement)
    .filter((child) => name === undefined || child.localName === name);
}

function elementsByName(doc: Document, name: string): Element[] {
  return Array.from(doc.getElementsByTagName('*')).filter((el) => el.localName === name);
}

/** Number when the text is numeric, the raw text otherwise so the normalizer can count it. */
function numericOrText(text: string): number | string {
  const trimmed = text.trim();
  const value = Number(trimmed);
  return trimmed !== '' && Number.isFinite(value) ? value : text;
}

function isNumericText(text: string): boolean {
  return typeof numericOrText(text) === 'number';
}

/** Numeric leaves under `<extensions>`, keyed by local name (`hr`, `cad`, `atemp`, `power`). */
function collectExtensions(element: Element, row: RawRow): void {
  for (const child of childElements(element)) {
    const nested = childElements(child);
    if (nested.length > 0) {
      collectExtensions(child, row);
      continue;
    }
    const text = child.textContent ?? '';
    if (isNumericText(text)) row[child.localName] = numericOrText(text);
  }
}

/**
 * One `<trkpt>` or `<rtept>`: position attributes, `ele`, `time`, any other
 * numeric child (GPX 1.0 `speed`, `course`) and extension readings.
 */
function pointRow(point: Element): RawRow {
  const row: RawRow = {};
  for (const attr of ['lat', 'lon'] as const) {
    const value = point.getAttribute(attr);
    if (value !== null) row[attr] = numericOrText(value);
  }

  for (const child of childElements(point)) {
    const text = child.textContent ?? '';
    switch (child.localName) {
      case 'extensions':
        collectExtensions(child, row);
        break;
      case 'ele':
        row.ele = numericOrText(text);
        break;
      case 'time':
        row.time = text.trim();
        break;
      default:
        if (childElements(child).length === 0 && isNumericText(text)) {
          row[child.localName] = numericOrText(text);
        }
    }
  }
  return row;
}

export class GpxParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GpxParseError';
  }
}

/**
 * Reads GPX text into the raw document shape the track assembler consumes:
 * one entry per `<trk>`, one row list per `<trkseg>`, empty segments included.
 */
export class TogeojsonGpxReader implements GpxReader {
  read(gpxContent: string): RawGpxDocument {
    if (!gpxContent || typeof gpxContent !== 'string') {
      throw new GpxParseError('GPX content is empty or invalid');
    }

    let doc: Document;
    try {
      doc = new DOMParser().parseFromString(gpxContent, 'text/xml');
    } catch {
      throw new GpxParseError('Failed to parse GPX: invalid XML');
    }

    const parseErrors = doc.getElementsByTagName('parsererror');
    if (parseErrors.length > 0 || !doc.documentElement || doc.documentElement.nodeName !== 'gpx') {
      throw new GpxParseError('Failed to parse GPX: invalid XML structure');
    }

    let geoJson: ReturnType<typeof toGeoJSON.gpx>;
    try {
      geoJson = toGeoJSON.gpx(doc);
    } catch {
      throw new GpxParseError('Failed to parse GPX: invalid GPX format');
    }

    const waypoints: RawRow[] = [];
    for (const feature of geoJson.features) {
      if (feature.geometry?.type === 'Point') {
        waypoints.push(this.waypointRow(feature.geometry.coordinates, feature));
      }
    }

    // togeojson drops segments with fewer than two points, so tracks and
    // routes are walked on the DOM to keep every <trk> at its own index.
    const trackElements = elementsByName(doc, 'trk');
    const document: RawGpxDocument = {
      metadata: { ...this.readMetadata(doc), trackNames: trackElements.map((trk) => this.nameOf(trk)) },
      waypoints,
      tracks: trackElements.map((trk) =>
        childElements(trk, 'trkseg').map((seg) => childElements(seg, 'trkpt').map(pointRow)),
      ),
      routes: elementsByName(doc, 'rte').map((rte) => childElements(rte, 'rtept').map(pointRow)),
    };
    const bounds = this.readBounds(doc);
    if (bounds) document.bounds = bounds;
    return document;
  }

  private waypointRow(coord: Position, feature: GpxFeature): RawRow {
    const row: RawRow = { lat: coord[1], lon: coord[0] };
    if (coord[2] !== undefined) {
      row.ele = coord[2];
    }
    for (const key of WAYPOINT_PROPERTIES) {
      const value: unknown = feature.properties?.[key];
      if (typeof value === 'string') row[key] = value;
    }
    return row;
  }

  private nameOf(trk: Element): string {
    const name = childElements(trk, 'name')[0]?.textContent?.trim();
    return name ? name : 'Unnamed Track';
  }

  private readMetadata(doc: Document): Record<string, string> {
    const metadata: Record<string, string> = {};
    const node = doc.getElementsByTagName('metadata').item(0);
    if (!node) return metadata;

    for (const tag of METADATA_TAGS) {
      const text = childElements(node, tag)[0]?.textContent?.trim();
      if (text) metadata[tag] = text;
    }
    return metadata;
  }

  private readBounds(doc: Document): BoundingBox | null {
    const node = doc.getElementsByTagName('bounds').item(0);
    if (!node) return null;

    const read = (attr: string): number => parseFloat(node.getAttribute(attr) ?? '');
    const bounds = {
      minLat: read('minlat'),
      maxLat: read('maxlat'),
      minLon: read('minlon'),
      maxLon: read('maxlon'),
    };
    return Object.values(bounds).every(Number.isFinite) ? bounds : null;
  }
}
