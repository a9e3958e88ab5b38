// Lightweight metrics collection system
interface Metrics {
  requests: number;
  errors: number;
  syncRuns: number;
  marketplaceSyncs: number;
  marketplaceFailures: number;
  catalogPages: number;
  stockUpdates: number;
  priceUpdates: number;
  stockBatches: number;
  priceBatches: number;
}

const emptyMetrics = (): Metrics => ({
  requests: 0,
  errors: 0,
  syncRuns: 0,
  marketplaceSyncs: 0,
  marketplaceFailures: 0,
  catalogPages: 0,
  stockUpdates: 0,
  priceUpdates: 0,
  stockBatches: 0,
  priceBatches: 0,
});

class MetricsCollector {
  private metrics: Metrics = emptyMetrics();

  // Increment a specific metric
  increment(metric: keyof Metrics, count: number = 1): void {
    this.metrics[metric] += count;
  }

  // Get current metrics
  getMetrics(): Metrics {
    return { ...this.metrics };
  }

  // Reset all metrics (for testing)
  reset(): void {
    this.metrics = emptyMetrics();
  }
}

// Global metrics instance
export const metrics = new MetricsCollector();

// Helper functions for common metric increments
export const incrementRequests = () => metrics.increment('requests');
export const incrementErrors = () => metrics.increment('errors');
export const incrementSyncRuns = () => metrics.increment('syncRuns');
export const incrementCatalogPages = () => metrics.increment('catalogPages');
export const recordMarketplaceSync = (succeeded: boolean) =>
  metrics.increment(succeeded ? 'marketplaceSyncs' : 'marketplaceFailures');
