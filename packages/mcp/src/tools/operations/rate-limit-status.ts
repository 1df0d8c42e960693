/**
 * sonar_rate_limit_status - Outbound Request Budget
 */

import { createResponseBuilder } from '../../infrastructure/index.js';

import type { RateLimitStatus } from 'sonargate-core';
import type { ToolHandler } from '../types.js';

export const handleRateLimitStatus: ToolHandler = async ({ gateway, requestId }) => {
  const status = gateway.rateLimitStatus();
  const available = Math.floor(status.available);

  const builder = createResponseBuilder<RateLimitStatus>(requestId)
    .withSummary(`${available}/${status.capacity} requests available, ${status.waiting} waiting`)
    .withData(status);

  if (status.pausedUntil !== null) {
    builder.addWarning(
      `SonarQube throttled requests; refill resumes at ${new Date(status.pausedUntil).toISOString()}`
    );
  }
  return builder.buildContent();
};
