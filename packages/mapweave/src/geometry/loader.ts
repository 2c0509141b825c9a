/**
 * GeoJSON Loader
 *
 * Validates the shape the join needs (a top-level `features` array whose
 * entries carry a `properties` object or null) and nothing more. Geometry
 * payloads are opaque to the core and pass through unchecked.
 *
 * TYPE SAFETY: Nuclear-level strictness. All external inputs validated against schemas.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { Geometry } from 'geojson';
import { MalformedGeometryError } from '../core/errors.js';
import type { GeometryCollection, GeometryFeature } from '../core/types.js';

const GeometrySchema = z
  .object({ type: z.string() })
  .passthrough()
  .nullable()
  .optional();

const FeatureSchema = z
  .object({
    type: z.string().optional(),
    id: z.union([z.string(), z.number()]).optional(),
    properties: z.record(z.unknown()).nullable().optional(),
    geometry: GeometrySchema,
  })
  .passthrough();

const FeatureCollectionSchema = z
  .object({
    type: z.string().optional(),
    features: z.array(FeatureSchema, {
      required_error: 'Missing top-level features array',
      invalid_type_error: 'Top-level features must be an array',
    }),
  })
  .passthrough();

type ParsedFeature = z.infer<typeof FeatureSchema>;

function isGeometry(value: unknown): value is Geometry {
  return typeof value === 'object' && value !== null && 'type' in value;
}

function toFeature(parsed: ParsedFeature): GeometryFeature {
  const geometry: unknown = parsed.geometry;
  return {
    type: 'Feature',
    ...(parsed.id !== undefined ? { id: parsed.id } : {}),
    properties: parsed.properties ?? {},
    geometry: isGeometry(geometry) ? geometry : null,
  };
}

/**
 * Validate a parsed JSON document as a geometry collection
 *
 * @param document - Result of JSON.parse
 * @param source - File path or label for error messages
 * @throws MalformedGeometryError naming the first failing path
 */
export function parseGeometryCollection(document: unknown, source?: string): GeometryCollection {
  const result = FeatureCollectionSchema.safeParse(document);

  if (!result.success) {
    const issue = result.error.errors[0];
    const path = issue && issue.path.length > 0 ? issue.path.join('.') : '$';
    const message =
      typeof document !== 'object' || document === null || Array.isArray(document)
        ? 'Geometry document is not an object'
        : issue?.message ?? 'Invalid geometry document';
    throw new MalformedGeometryError(message, path, source);
  }

  return {
    type: 'FeatureCollection',
    features: result.data.features.map(toFeature),
  };
}

/**
 * Read and validate a GeoJSON file
 *
 * @throws MalformedGeometryError for invalid JSON or a missing feature list
 */
export async function loadGeometryCollection(filePath: string): Promise<GeometryCollection> {
  const content = await readFile(filePath, 'utf-8');

  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch (error) {
    throw new MalformedGeometryError(
      `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
      '$',
      filePath
    );
  }

  return parseGeometryCollection(document, filePath);
}
