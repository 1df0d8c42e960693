/**
 * SonarGateway
 *
 * The one object MCP tool handlers talk to. A read goes
 * cache store -> coordinator (singleflight) -> retry -> rate limiter -> transport,
 * and the result is cached for its resource type's TTL.
 */

import type { AxiosAdapter } from 'axios';

import { CacheCoordinator, CacheMaintenance, CacheStore, TtlPolicy, createCacheKey, keyReferences } from '../cache/index.js';
import { parseGatewayConfig, type GatewayConfig, type GatewayConfigInput } from '../config/index.js';
import { Errors, toSonarError } from '../errors/index.js';
import { createSilentLogger, type Logger } from '../logging/index.js';
import { TokenBucket, type RateLimitStatus } from '../rate-limit/index.js';
import { RetryOrchestrator } from '../retry/index.js';
import { HttpTransport, type HttpMethod, type RequestOptions, type Transport } from '../transport/index.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { isRecord } from '../utils/guards.js';
import { validateResourceId, type QueryParams } from '../validation/index.js';
import { DEFAULT_RESOURCE_ROUTES, type ResourceRoute } from './resources.js';

import type { CacheStats, CoordinatorStats } from '../cache/index.js';

// ============================================================================
// Types
// ============================================================================

export interface SonarGatewayOptions {
  config: GatewayConfigInput;
  /** Defaults to DEFAULT_RESOURCE_ROUTES */
  routes?: Readonly<Record<string, ResourceRoute>> | undefined;
  /** Replaces the HTTP transport entirely */
  transport?: Transport | undefined;
  /** Handed to the default HTTP transport in place of the network */
  adapter?: AxiosAdapter | undefined;
  clock?: Clock | undefined;
  random?: (() => number) | undefined;
  logger?: Logger | undefined;
}

export interface GetOptions {
  /** Abandon this caller's wait after this long; the fetch continues */
  waitTimeoutMs?: number | undefined;
}

export interface MutateOptions extends RequestOptions {
  /** Project whose cached resources the write makes stale */
  invalidates?: string | undefined;
  /** Safe to repeat; enables retries */
  idempotent?: boolean | undefined;
}

export interface CacheInfo {
  statistics: CacheStats;
  coordinator: CoordinatorStats;
  configuration: {
    maxEntries: number;
    ttlSeconds: Record<string, number>;
    resourceTypes: string[];
    cleanupIntervalMs: number;
    statsIntervalMs: number;
  };
  health: {
    status: 'healthy';
    maintenanceRunning: boolean;
  };
}

export interface CacheOptimizationReport {
  operationsPerformed: string[];
  statisticsBefore: CacheStats;
  statisticsAfter: CacheStats;
}

export interface HealthReport {
  healthy: boolean;
  checkedAt: string;
  server: { reachable: boolean; status?: string | undefined; version?: string | undefined; error?: string | undefined };
  authentication: { valid: boolean; error?: string | undefined };
}

// ============================================================================
// Gateway
// ============================================================================

export class SonarGateway {
  readonly config: GatewayConfig;

  private readonly routes: ReadonlyMap<string, ResourceRoute>;
  private readonly transport: Transport;
  private readonly limiter: TokenBucket;
  private readonly retry: RetryOrchestrator;
  private readonly store: CacheStore;
  private readonly coordinator: CacheCoordinator;
  private readonly maintenance: CacheMaintenance;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: SonarGatewayOptions) {
    this.config = parseGatewayConfig(options.config);
    this.clock = options.clock ?? systemClock;
    const logger = options.logger ?? createSilentLogger();
    this.logger = logger.child({ component: 'gateway' });

    const ttlPolicy = new TtlPolicy(this.config.cache.ttlByType);
    this.routes = new Map(Object.entries(options.routes ?? DEFAULT_RESOURCE_ROUTES));
    const untimed = [...this.routes.keys()].filter((type) => !ttlPolicy.has(type));
    if (untimed.length > 0) {
      throw Errors.invalidConfiguration(untimed.map((type) => `routes.${type}: no TTL configured for this resource type`));
    }

    this.transport =
      options.transport ??
      new HttpTransport({
        baseUrl: this.config.baseUrl,
        token: this.config.token,
        organization: this.config.organization,
        verifySsl: this.config.verifySsl,
        requestTimeoutMs: this.config.requestTimeoutMs,
        maxSockets: this.config.maxSockets,
        logger,
        clock: this.clock,
        adapter: options.adapter,
      });

    this.limiter = new TokenBucket(this.config.rateLimit, { clock: this.clock, logger });
    this.retry = new RetryOrchestrator(this.config.retry, {
      clock: this.clock,
      random: options.random,
      logger,
      onRateLimited: (retryAfterMs) => this.limiter.penalize(retryAfterMs),
    });
    this.store = new CacheStore({
      maxEntries: this.config.cache.maxEntries,
      ttlPolicy,
      clock: this.clock,
      logger,
    });
    this.coordinator = new CacheCoordinator(this.store, this.retry, { clock: this.clock, logger });
    this.maintenance = new CacheMaintenance(this.store, {
      cleanupIntervalMs: this.config.cache.cleanupIntervalMs,
      statsIntervalMs: this.config.cache.statsIntervalMs,
      logger,
    });
  }

  get resourceTypes(): string[] {
    return [...this.routes.keys()].sort();
  }

  /**
   * Read a resource through the cache. Concurrent reads of the same resource
   * share one upstream fetch.
   */
  async get(resourceType: string, resourceId: string, params: QueryParams = {}, options: GetOptions = {}): Promise<unknown> {
    const route = this.routes.get(resourceType);
    if (route === undefined) {
      throw Errors.unknownResourceType(resourceType, this.resourceTypes);
    }
    const id = validateResourceId(resourceId);
    const key = createCacheKey(resourceType, id, params);

    return this.coordinator.getOrFetch(
      key,
      () => this.send('GET', route.path, { params: { ...route.defaultParams, ...key.params, [route.idParam]: id } }),
      { waitTimeoutMs: options.waitTimeoutMs }
    );
  }

  /**
   * Drop every cached entry that references the project. Returns how many went.
   * Fetches for the project still in flight are detached and will not be stored.
   */
  invalidateProject(projectKey: string): number {
    const key = validateResourceId(projectKey, 'projectKey');
    const removed = this.store.invalidatePrefix(key);
    const detached = this.coordinator.detachWhere((cacheKey) => keyReferences(cacheKey, key));
    this.logger.info({ projectKey: key, removed, detached }, 'invalidated project cache entries');
    return removed;
  }

  cacheInfo(): CacheInfo {
    return {
      statistics: this.store.stats(),
      coordinator: this.coordinator.stats(),
      configuration: {
        maxEntries: this.store.maxEntries,
        ttlSeconds: this.store.ttlPolicy.toJSON(),
        resourceTypes: this.resourceTypes,
        cleanupIntervalMs: this.config.cache.cleanupIntervalMs,
        statsIntervalMs: this.config.cache.statsIntervalMs,
      },
      health: {
        status: 'healthy',
        maintenanceRunning: this.maintenance.running,
      },
    };
  }

  rateLimitStatus(): RateLimitStatus {
    return this.limiter.status();
  }

  /**
   * Clear one resource type, or everything. Returns how many entries went.
   */
  clearCache(resourceType?: string): number {
    if (resourceType === undefined) {
      const removed = this.store.clearAll();
      const detached = this.coordinator.detachWhere(() => true);
      this.logger.info({ removed, detached }, 'cleared all cache entries');
      return removed;
    }
    if (!this.store.ttlPolicy.has(resourceType)) {
      throw Errors.unknownResourceType(resourceType, this.store.ttlPolicy.types());
    }
    const removed = this.store.clearType(resourceType);
    const detached = this.coordinator.detachWhere((cacheKey) => cacheKey.resourceType === resourceType);
    this.logger.info({ resourceType, removed, detached }, 'cleared cache entries by type');
    return removed;
  }

  optimizeCache(): CacheOptimizationReport {
    const statisticsBefore = this.store.stats();
    const removed = this.maintenance.prune();
    return {
      operationsPerformed: [`Cleaned up ${removed} expired entries`],
      statisticsBefore,
      statisticsAfter: this.store.stats(),
    };
  }

  /**
   * Uncached write. Tried once unless marked idempotent; on success the
   * named project's cached reads are invalidated.
   */
  async mutate(method: Exclude<HttpMethod, 'GET'>, path: string, options: MutateOptions = {}): Promise<unknown> {
    const outcome = await this.retry.execute(
      () => this.send(method, path, { params: options.params, body: options.body }),
      { maxAttempts: options.idempotent ? undefined : 1, label: `${method} ${path}` }
    );
    if (!outcome.ok) {
      throw outcome.error;
    }
    if (options.invalidates !== undefined) {
      this.invalidateProject(options.invalidates);
    }
    return outcome.value;
  }

  /**
   * Probe the server status and the token, bypassing the cache. Never throws.
   */
  async checkHealth(): Promise<HealthReport> {
    const report: HealthReport = {
      healthy: false,
      checkedAt: new Date(this.clock.now()).toISOString(),
      server: { reachable: false },
      authentication: { valid: false },
    };

    try {
      const status = await this.send('GET', '/system/status');
      report.server.reachable = true;
      if (isRecord(status)) {
        const serverStatus = status['status'];
        const version = status['version'];
        if (typeof serverStatus === 'string') report.server.status = serverStatus;
        if (typeof version === 'string') report.server.version = version;
      }
    } catch (error) {
      report.server.error = toSonarError(error).message;
    }

    try {
      const validation = await this.send('GET', '/authentication/validate');
      report.authentication.valid = isRecord(validation) && validation['valid'] === true;
    } catch (error) {
      report.authentication.error = toSonarError(error).message;
    }

    report.healthy = report.server.status === 'UP' && report.authentication.valid;
    if (!report.healthy) {
      this.logger.warn({ health: report }, 'sonarqube health check failed');
    }
    return report;
  }

  start(): void {
    this.maintenance.start();
    this.logger.info({ resourceTypes: this.resourceTypes }, 'gateway started');
  }

  close(): void {
    this.maintenance.stop();
    this.limiter.dispose();
    this.transport.close();
    this.logger.info('gateway closed');
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  /** One upstream call behind the rate limiter */
  private async send(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<unknown> {
    const timeoutMs = this.config.rateLimit.acquireTimeoutMs;
    const granted = await this.limiter.acquire(1, timeoutMs);
    if (!granted) {
      throw Errors.rateLimitBudgetExhausted(timeoutMs);
    }
    const response = await this.transport.call(method, path, options);
    return response.data;
  }
}
