/**
 * Map Documents
 *
 * Static, serializable descriptions of the two map kinds. A point document
 * carries the view, marker style, pre-grouped markers and the raw points; a
 * choropleth document carries the view, the `key_on` locator and a copy of the
 * geometry with each feature's value and fill colour resolved.
 *
 * Input collections are never mutated.
 */

import { bbox as turfBbox } from '@turf/bbox';
import { featureCollection, point } from '@turf/helpers';
import { extent } from 'd3-array';
import { scaleSequential } from 'd3-scale';
import { interpolateYlOrRd } from 'd3-scale-chromatic';
import type { BBox, Feature, FeatureCollection, Geometry, GeoJsonProperties, Point } from 'geojson';
import type {
  GeometryCollection,
  JoinKeyBinding,
  JoinMode,
  LatLon,
  PointPlot,
} from '../core/types.js';
import type { JoinEvaluation } from '../join/join-evaluator.js';
import { readLocator } from '../join/locator.js';
import { PointClusterIndex, type MarkerGroup } from './cluster.js';

// ============================================================================
// Types
// ============================================================================

export interface MapView {
  /** [lat, lon] */
  readonly center: LatLon;
  readonly zoom: number;
  readonly tiles: string;
}

export interface MarkerStyle {
  readonly radius: number;
  readonly color: string;
  readonly fillOpacity: number;
}

export interface PointMapDocument {
  readonly kind: 'point-cluster';
  readonly view: MapView;
  /** [minLon, minLat, maxLon, maxLat] */
  readonly bounds: BBox;
  readonly layer: {
    readonly name: string;
    readonly disableClusteringAtZoom: number;
    readonly marker: MarkerStyle;
  };
  /** Marker groups at the initial zoom */
  readonly clusters: readonly MarkerGroup[];
  readonly points: FeatureCollection<Point, { label?: string }>;
}

export interface ChoroplethDocument {
  readonly kind: 'choropleth';
  readonly view: MapView;
  readonly keyOn: string;
  readonly joinMode: JoinMode;
  readonly legend: {
    readonly name: string;
    readonly scheme: 'YlOrRd';
    /** [min, max] of matched values, null when nothing matched */
    readonly domain: readonly [number, number] | null;
  };
  readonly style: {
    readonly fillOpacity: number;
    readonly lineOpacity: number;
  };
  readonly geometry: FeatureCollection<Geometry | null, GeoJsonProperties>;
}

export interface PointDocumentOptions {
  readonly zoom?: number;
  readonly tiles?: string;
  readonly layerName?: string;
  readonly disableClusteringAtZoom?: number;
  readonly clusterRadius?: number;
  readonly marker?: Partial<MarkerStyle>;
}

export interface ChoroplethDocumentOptions {
  readonly center?: LatLon;
  readonly zoom?: number;
  readonly tiles?: string;
  readonly legendName?: string;
  readonly fillOpacity?: number;
  readonly lineOpacity?: number;
}

/** Feature properties the choropleth document adds */
export const FILL_VALUE_PROPERTY = 'fill_value';
export const FILL_COLOR_PROPERTY = 'fill_color';

export const DEFAULT_MARKER_STYLE: MarkerStyle = {
  radius: 4,
  color: '#ff7800',
  fillOpacity: 0.7,
};

// ============================================================================
// Point Maps
// ============================================================================

/**
 * Describe a clustered point map
 */
export function buildPointMapDocument(
  plot: PointPlot,
  options: PointDocumentOptions = {}
): PointMapDocument {
  const zoom = options.zoom ?? 12;
  const disableClusteringAtZoom = options.disableClusteringAtZoom ?? 16;

  const points = featureCollection(
    plot.points.map((p) =>
      point<{ label?: string }>([p.lon, p.lat], p.label !== undefined ? { label: p.label } : {})
    )
  );

  const index = new PointClusterIndex(plot.points, {
    radius: options.clusterRadius,
    maxZoom: Math.max(0, disableClusteringAtZoom - 1),
  });

  return {
    kind: 'point-cluster',
    view: { center: plot.center, zoom, tiles: options.tiles ?? 'CartoDB dark_matter' },
    bounds: turfBbox(points),
    layer: {
      name: options.layerName ?? 'Incidents',
      disableClusteringAtZoom,
      marker: { ...DEFAULT_MARKER_STYLE, ...options.marker },
    },
    clusters: index.groupsAt(zoom),
    points,
  };
}

// ============================================================================
// Choropleths
// ============================================================================

/**
 * Colour for a value, or null when the feature is unshaded
 */
export function createFillScale(
  domain: readonly [number, number] | null
): (value: number | undefined) => string | null {
  if (domain === null) {
    return () => null;
  }
  const scale = scaleSequential(interpolateYlOrRd).domain([domain[0], domain[1]]);
  return (value) => (value === undefined ? null : scale(value));
}

/**
 * Describe a choropleth from a join evaluation
 *
 * Each feature's key is read through `binding.keyOn`; features whose key has
 * no value get null value and fill.
 */
export function buildChoroplethDocument(
  collection: GeometryCollection,
  binding: JoinKeyBinding,
  evaluation: JoinEvaluation,
  options: ChoroplethDocumentOptions = {}
): ChoroplethDocument {
  const matched = evaluation.matchedKeys
    .map((key) => evaluation.valuesByKey.get(key))
    .filter((value): value is number => value !== undefined);
  const [min, max] = extent(matched);
  const domain: readonly [number, number] | null =
    min !== undefined && max !== undefined ? [min, max] : null;
  const fill = createFillScale(domain);

  const features: Feature<Geometry | null, GeoJsonProperties>[] = collection.features.map(
    (feature) => {
      const key = readLocator(feature, binding.keyOn);
      const value = key !== undefined ? evaluation.valuesByKey.get(key) : undefined;
      return {
        ...feature,
        properties: {
          ...feature.properties,
          [FILL_VALUE_PROPERTY]: value ?? null,
          [FILL_COLOR_PROPERTY]: fill(value),
        },
      };
    }
  );

  return {
    kind: 'choropleth',
    view: {
      center: options.center ?? [20, 0],
      zoom: options.zoom ?? 2,
      tiles: options.tiles ?? 'CartoDB positron',
    },
    keyOn: binding.keyOn,
    joinMode: binding.mode,
    legend: { name: options.legendName ?? 'Value', scheme: 'YlOrRd', domain },
    style: {
      fillOpacity: options.fillOpacity ?? 0.8,
      lineOpacity: options.lineOpacity ?? 0.2,
    },
    geometry: { type: 'FeatureCollection', features },
  };
}
