/**
 * `key_on` locators
 *
 * A locator is the path the renderer follows to read a feature's join key,
 * always of the form `feature.properties.<name>`.
 */

import type { GeometryFeature } from '../core/types.js';

const LOCATOR_PREFIX = 'feature.properties.';

export function toLocator(property: string): string {
  return `${LOCATOR_PREFIX}${property}`;
}

/**
 * Property name a locator points at
 *
 * @throws Error when the locator is not a `feature.properties.<name>` path
 */
export function locatorProperty(keyOn: string): string {
  if (!keyOn.startsWith(LOCATOR_PREFIX) || keyOn.length === LOCATOR_PREFIX.length) {
    throw new Error(`Unsupported key_on locator: '${keyOn}'`);
  }
  return keyOn.slice(LOCATOR_PREFIX.length);
}

/**
 * Read a feature's key through a locator, as an opaque string
 *
 * Returns undefined for absent, null, or non-scalar property values.
 */
export function readLocator(feature: GeometryFeature, keyOn: string): string | undefined {
  const value: unknown = feature.properties?.[locatorProperty(keyOn)];
  return keyString(value);
}

/**
 * String form used on both sides of a join; no case folding or trimming
 */
export function keyString(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return undefined;
}
