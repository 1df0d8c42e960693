/**
 * Resource routes
 *
 * Where each cacheable resource type is read from. The resource id is sent
 * as `idParam`; the caller's parameters are merged over `defaultParams`.
 */

export interface ResourceRoute {
  path: string;
  idParam: string;
  defaultParams?: Readonly<Record<string, string>> | undefined;
}

export const DEFAULT_RESOURCE_ROUTES: Readonly<Record<string, ResourceRoute>> = {
  projects: { path: '/components/show', idParam: 'component' },
  metrics: { path: '/measures/component', idParam: 'component' },
  issues: { path: '/issues/search', idParam: 'componentKeys' },
  quality_gates: { path: '/qualitygates/project_status', idParam: 'projectKey' },
  security: { path: '/hotspots/search', idParam: 'projectKey' },
  permissions: { path: '/permissions/users', idParam: 'projectKey' },
};
