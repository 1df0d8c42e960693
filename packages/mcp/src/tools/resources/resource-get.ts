/**
 * sonar_resource_get - Cached SonarQube Read
 *
 * Reads one resource through the gateway: cache hit, shared in-flight fetch,
 * or a rate-limited, retried upstream call.
 */

import { z } from 'zod';

import { createResponseBuilder } from '../../infrastructure/index.js';

import type { ToolHandler } from '../types.js';

const QueryScalarSchema = z.union([z.string(), z.number(), z.boolean()]);

export const ResourceGetArgsSchema = z.object({
  resourceType: z.string().min(1),
  resourceId: z.string().min(1),
  params: z.record(z.union([QueryScalarSchema, z.array(QueryScalarSchema), z.null()])).optional(),
  waitTimeoutMs: z.number().int().positive().optional(),
});

export type ResourceGetArgs = z.infer<typeof ResourceGetArgsSchema>;

export interface ResourceGetData {
  resourceType: string;
  resourceId: string;
  result: unknown;
}

export const handleResourceGet: ToolHandler = async ({ gateway, requestId }, args) => {
  const { resourceType, resourceId, params, waitTimeoutMs } = ResourceGetArgsSchema.parse(args);
  const result = await gateway.get(resourceType, resourceId, params ?? {}, { waitTimeoutMs });

  return createResponseBuilder<ResourceGetData>(requestId)
    .withSummary(`Fetched ${resourceType} for ${resourceId.trim()}`)
    .withData({ resourceType, resourceId: resourceId.trim(), result })
    .buildContent();
};
