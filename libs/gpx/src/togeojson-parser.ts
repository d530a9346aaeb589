import { DOMParser } from '@xmldom/xmldom';
import * as toGeoJSON from '@tmcw/togeojson';
import type { Position } from 'geojson';
import { GpxParser, ParsedRoute, RoutePoint } from './gpx-parser.interface';
import { trackLength } from './geo-utils';

const UNNAMED_ROUTE = 'Unnamed Route';

export class GpxParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GpxParseError';
  }
}

function toRoutePoint([lon, lat, ele]: Position): RoutePoint {
  return ele === undefined ? { lat, lon } : { lat, lon, ele };
}

/**
 * Parses a Strava GPX export. Tracks and routes are flattened into one
 * point list in document order; multi-segment tracks are concatenated.
 */
export class TogeojsonParser implements GpxParser {
  parse(gpxContent: string): ParsedRoute {
    if (!gpxContent.trim()) {
      throw new GpxParseError('GPX content is empty');
    }

    let doc: Document;
    try {
      doc = new DOMParser().parseFromString(gpxContent, 'text/xml');
    } catch {
      throw new GpxParseError('Failed to parse GPX: invalid XML');
    }

    if (!doc.documentElement || doc.getElementsByTagName('parsererror').length > 0) {
      throw new GpxParseError('Failed to parse GPX: invalid XML structure');
    }

    const geoJson = toGeoJSON.gpx(doc);
    const points: RoutePoint[] = [];
    let name = UNNAMED_ROUTE;

    for (const feature of geoJson.features) {
      const featureName: unknown = feature.properties?.name;
      if (name === UNNAMED_ROUTE && typeof featureName === 'string' && featureName) {
        name = featureName;
      }

      const geometry = feature.geometry;
      if (!geometry) continue;

      if (geometry.type === 'LineString') {
        points.push(...geometry.coordinates.map(toRoutePoint));
      } else if (geometry.type === 'MultiLineString') {
        for (const line of geometry.coordinates) {
          points.push(...line.map(toRoutePoint));
        }
      }
    }

    if (points.length === 0) {
      throw new GpxParseError('GPX file contains no track points');
    }

    return { name, points, distance: Math.round(trackLength(points)) };
  }
}
