import type { ResourceId } from '@glreporter/gitlab-client';
import { InvalidIdentifierError, type NodeKind } from './errors';

// Segments may not start with a sign, so `-5` or `+5` is never taken for a path.
const PATH_PATTERN = /^[^\s/+-][^\s/]*(\/[^\s/+-][^\s/]*)*$/;

function normalizePath(kind: NodeKind, value: string): string | null {
  const trimmed = value.trim().replace(/^\/+|\/+$/g, '');
  if (!trimmed) {
    return null;
  }
  if (!PATH_PATTERN.test(trimmed)) {
    throw new InvalidIdentifierError(kind, value);
  }
  return trimmed;
}

/**
 * Normalises an optional root. `null`, `undefined`, `0` and blank strings mean
 * "no specific root"; anything else must be a positive integer or a path.
 */
export function normalizeRootId(kind: NodeKind, value: ResourceId | null | undefined): ResourceId | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'number') {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new InvalidIdentifierError(kind, value);
    }
    return value === 0 ? null : value;
  }
  return normalizePath(kind, value);
}

/** Single-target entry points need a concrete identifier. */
export function requireResourceId(kind: NodeKind, value: ResourceId | null | undefined): ResourceId {
  const normalized = normalizeRootId(kind, value);
  if (normalized === null) {
    throw new InvalidIdentifierError(kind, value);
  }
  return normalized;
}
