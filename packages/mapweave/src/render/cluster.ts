/**
 * Point Clustering
 *
 * Adapter over supercluster: the engine hands it renderable points and reads
 * back marker groups for a zoom level. Nothing else in the core knows how
 * grouping works.
 */

import Supercluster from 'supercluster';
import { point } from '@turf/helpers';
import type { BBox } from 'geojson';
import type { RenderablePoint } from '../core/types.js';

export const WORLD_BBOX: BBox = [-180, -85, 180, 85];

export interface ClusterOptions {
  /** Cluster radius in pixels (default: 60) */
  readonly radius?: number;
  /** Last zoom level that still clusters (default: 15) */
  readonly maxZoom?: number;
  /** Minimum points to form a cluster (default: 2) */
  readonly minPoints?: number;
}

/**
 * Either a cluster of points or a single point at some zoom
 */
export interface MarkerGroup {
  readonly lat: number;
  readonly lon: number;
  readonly count: number;
  readonly clusterId?: number;
  /** Zoom at which a cluster splits apart */
  readonly expansionZoom?: number;
  readonly label?: string;
}

type PointProps = {
  readonly index: number;
  readonly label?: string;
};

type IndexedFeature = Supercluster.PointFeature<PointProps>;
type GroupFeature = Supercluster.ClusterFeature<Supercluster.AnyProps> | IndexedFeature;

function isCluster(
  feature: GroupFeature
): feature is Supercluster.ClusterFeature<Supercluster.AnyProps> {
  return 'cluster' in feature.properties && feature.properties.cluster === true;
}

/**
 * Spatial index of points for marker grouping
 */
export class PointClusterIndex {
  private readonly index: Supercluster<PointProps, Supercluster.AnyProps>;
  readonly size: number;

  constructor(points: readonly RenderablePoint[], options: ClusterOptions = {}) {
    this.index = new Supercluster<PointProps, Supercluster.AnyProps>({
      radius: options.radius ?? 60,
      maxZoom: options.maxZoom ?? 15,
      minPoints: options.minPoints ?? 2,
    });

    const features: IndexedFeature[] = points.map((p, index) =>
      point<PointProps>([p.lon, p.lat], p.label !== undefined ? { index, label: p.label } : { index })
    );
    this.index.load(features);
    this.size = features.length;
  }

  /**
   * Marker groups visible in a bounding box at a zoom level
   */
  groupsAt(zoom: number, bbox: BBox = WORLD_BBOX): MarkerGroup[] {
    return this.index.getClusters(bbox, Math.floor(zoom)).map((feature: GroupFeature) => {
      const [lon = 0, lat = 0] = feature.geometry.coordinates;

      if (isCluster(feature)) {
        const clusterId = feature.properties.cluster_id;
        return {
          lat,
          lon,
          count: feature.properties.point_count,
          clusterId,
          expansionZoom: this.index.getClusterExpansionZoom(clusterId),
        };
      }

      const { label } = feature.properties;
      return label !== undefined ? { lat, lon, count: 1, label } : { lat, lon, count: 1 };
    });
  }
}

/**
 * One-shot grouping of points at a zoom level
 */
export function clusterPoints(
  points: readonly RenderablePoint[],
  zoom: number,
  options: ClusterOptions = {}
): MarkerGroup[] {
  return new PointClusterIndex(points, options).groupsAt(zoom);
}
