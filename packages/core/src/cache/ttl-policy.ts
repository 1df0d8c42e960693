/**
 * Per-resource-type freshness
 */

import { Errors } from '../errors/index.js';

/** Seconds each resource type stays fresh */
export const DEFAULT_TTL_BY_TYPE: Readonly<Record<string, number>> = {
  projects: 300,
  metrics: 300,
  issues: 60,
  quality_gates: 600,
  security: 300,
  permissions: 1800,
};

export const RESOURCE_TYPE_PATTERN = /^[a-z][a-z0-9_]*$/;

export class TtlPolicy {
  private readonly ttlSeconds: Map<string, number>;

  constructor(ttlByType: Readonly<Record<string, number>> = DEFAULT_TTL_BY_TYPE) {
    this.ttlSeconds = new Map(Object.entries(ttlByType));
  }

  has(resourceType: string): boolean {
    return this.ttlSeconds.has(resourceType);
  }

  /**
   * TTL in milliseconds. Types without an entry are rejected, never defaulted.
   */
  ttlMsFor(resourceType: string): number {
    const seconds = this.ttlSeconds.get(resourceType);
    if (seconds === undefined) {
      throw Errors.unknownResourceType(resourceType, this.types());
    }
    return seconds * 1000;
  }

  types(): string[] {
    return [...this.ttlSeconds.keys()].sort();
  }

  toJSON(): Record<string, number> {
    return Object.fromEntries(this.ttlSeconds);
  }
}
