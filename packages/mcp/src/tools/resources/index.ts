/**
 * Resource Tools
 *
 * Cached reads of SonarQube resources.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';

export const RESOURCE_TOOLS: Tool[] = [
  {
    name: 'sonar_resource_get',
    description:
      'Read a SonarQube resource through the cache. Concurrent reads of the same resource share one upstream request. Resource types: projects, metrics, issues, quality_gates, security, permissions.',
    inputSchema: {
      type: 'object',
      properties: {
        resourceType: {
          type: 'string',
          description: 'Resource type, e.g. issues or quality_gates',
        },
        resourceId: {
          type: 'string',
          description: 'Project or component key',
        },
        params: {
          type: 'object',
          description: 'Extra SonarQube query parameters, e.g. { "severities": ["BLOCKER"], "ps": 100 }',
          additionalProperties: true,
        },
        waitTimeoutMs: {
          type: 'number',
          description: 'Stop waiting after this many milliseconds; the fetch keeps running and fills the cache',
        },
      },
      required: ['resourceType', 'resourceId'],
    },
  },
];

export { handleResourceGet, ResourceGetArgsSchema } from './resource-get.js';
export type { ResourceGetArgs, ResourceGetData } from './resource-get.js';
