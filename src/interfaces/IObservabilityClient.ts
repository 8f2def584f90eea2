export type MetricTags = Record<string, string | number | boolean>;

/**
 * A pluggable metrics sink. Every method may be called from background
 * tasks; implementations must not throw.
 */
export interface IObservabilityClient {
  init(): Promise<void>;

  increment(metricName: string, value: number, tags?: MetricTags): void;

  gauge(metricName: string, value: number, tags?: MetricTags): void;

  distribution(metricName: string, value: number, tags?: MetricTags): void;

  shutdown(): Promise<void>;
}
