/**
 * Prometheus Metrics Service
 *
 * Metrics:
 * - app_jwt_renewals_total{status}: App JWT regenerations
 * - installation_token_exchanges_total{status}: access token exchanges
 * - installation_list_refreshes_total{status}: installation list refreshes
 * - installation_token_cache_hits_total: lookups served from the cache
 */

import { Registry, Counter } from 'prom-client';

type Outcome = 'SUCCESS' | 'FAILED';

export class MetricsService {
  private registry: Registry;

  public appJwtRenewalsTotal: Counter<'status'>;
  public tokenExchangesTotal: Counter<'status'>;
  public installationRefreshesTotal: Counter<'status'>;
  public tokenCacheHitsTotal: Counter;

  constructor() {
    this.registry = new Registry();

    this.registry.setDefaultLabels({
      app: 'app-token-service',
    });

    this.appJwtRenewalsTotal = new Counter({
      name: 'app_jwt_renewals_total',
      help: 'Total number of App JWT regenerations',
      labelNames: ['status'] as const,
      registers: [this.registry],
    });

    this.tokenExchangesTotal = new Counter({
      name: 'installation_token_exchanges_total',
      help: 'Total number of installation access token exchanges',
      labelNames: ['status'] as const,
      registers: [this.registry],
    });

    this.installationRefreshesTotal = new Counter({
      name: 'installation_list_refreshes_total',
      help: 'Total number of installation list refreshes',
      labelNames: ['status'] as const,
      registers: [this.registry],
    });

    this.tokenCacheHitsTotal = new Counter({
      name: 'installation_token_cache_hits_total',
      help: 'Total number of access token lookups served from the cache',
      registers: [this.registry],
    });
  }

  recordAppJwtRenewal(success: boolean) {
    this.appJwtRenewalsTotal.inc({ status: outcome(success) });
  }

  recordTokenExchange(success: boolean) {
    this.tokenExchangesTotal.inc({ status: outcome(success) });
  }

  recordInstallationRefresh(success: boolean) {
    this.installationRefreshesTotal.inc({ status: outcome(success) });
  }

  recordTokenCacheHit() {
    this.tokenCacheHitsTotal.inc();
  }

  /**
   * Gets metrics in Prometheus format
   */
  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  getRegistry(): Registry {
    return this.registry;
  }

  /**
   * Resets all metrics (for testing)
   */
  reset() {
    this.registry.resetMetrics();
  }
}

function outcome(success: boolean): Outcome {
  return success ? 'SUCCESS' : 'FAILED';
}

/**
 * Global metrics instance
 */
export const metrics = new MetricsService();
