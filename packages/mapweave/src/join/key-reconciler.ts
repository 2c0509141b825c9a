/**
 * Key Reconciler
 *
 * Decides which feature property identifies a geometry for joining.
 *
 * DECISION LOGIC:
 * - Caller-supplied property → used unchecked (exact-id, source 'caller')
 * - First feature carries a priority-listed property → exact-id, source 'inferred'
 * - Otherwise → name-fallback on the display-name property
 *
 * Only the first feature is inspected; the collection is assumed uniform.
 * Name-fallback compares keys as opaque strings. Rows whose key matches no
 * feature name simply go unshaded; that is a mode, not an error. Callers that
 * need stricter behaviour check `binding.mode` or use `require-all-keys`.
 */

import type { GeometryCollection, JoinKeyBinding } from '../core/types.js';
import { DEFAULT_ID_PRIORITY, DEFAULT_NAME_PROPERTY } from '../schema/candidates.js';
import { toLocator } from './locator.js';

export interface ReconcileOptions {
  /** Explicit identifier property; bypasses inference */
  readonly idProperty?: string;
  /** Ordered identifier property names (default: DEFAULT_ID_PRIORITY) */
  readonly idPriority?: readonly string[];
  /** Display-name property for fallback mode (default: 'name') */
  readonly nameProperty?: string;
}

/**
 * Choose the join identifier for a geometry collection
 */
export function reconcileJoinKey(
  collection: GeometryCollection,
  options: ReconcileOptions = {}
): JoinKeyBinding {
  if (options.idProperty !== undefined && options.idProperty !== '') {
    return {
      mode: 'exact-id',
      property: options.idProperty,
      keyOn: toLocator(options.idProperty),
      source: 'caller',
    };
  }

  const sample = collection.features[0]?.properties ?? {};
  const priority = options.idPriority ?? DEFAULT_ID_PRIORITY;
  const property = priority.find((name) => Object.prototype.hasOwnProperty.call(sample, name));

  if (property !== undefined) {
    return {
      mode: 'exact-id',
      property,
      keyOn: toLocator(property),
      source: 'inferred',
    };
  }

  const nameProperty = options.nameProperty ?? DEFAULT_NAME_PROPERTY;
  return {
    mode: 'name-fallback',
    property: nameProperty,
    keyOn: toLocator(nameProperty),
    source: 'fallback',
  };
}

/**
 * Attach the tabular key column a binding is joined against
 */
export function bindKeyColumn(binding: JoinKeyBinding, keyColumn: string): JoinKeyBinding {
  return { ...binding, keyColumn };
}
