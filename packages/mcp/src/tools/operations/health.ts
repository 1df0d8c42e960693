/**
 * sonar_health - Server Reachability and Token Check
 *
 * Always answers upstream; never served from the cache.
 */

import { createResponseBuilder } from '../../infrastructure/index.js';

import type { HealthReport } from 'sonargate-core';
import type { ToolHandler } from '../types.js';

export const handleHealth: ToolHandler = async ({ gateway, requestId }) => {
  const report = await gateway.checkHealth();

  const builder = createResponseBuilder<HealthReport>(requestId).withData(report);

  if (report.healthy) {
    const version = report.server.version === undefined ? '' : ` ${report.server.version}`;
    builder.withSummary(`SonarQube${version} is up and the token is valid`);
  } else if (!report.server.reachable) {
    builder
      .withSummary('SonarQube is not reachable')
      .addNextAction('Check SONARQUBE_URL and network access to the server');
  } else if (!report.authentication.valid) {
    builder
      .withSummary('SonarQube is reachable but the token was rejected')
      .addNextAction('Check that SONARQUBE_TOKEN is set and has not expired');
  } else {
    builder.withSummary(`SonarQube reports status ${report.server.status ?? 'unknown'}`);
  }
  return builder.buildContent();
};
