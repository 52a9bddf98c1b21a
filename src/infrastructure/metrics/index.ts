export { StatsdClient, createMetrics, formatMetric, parseStatsdTarget, METRIC_PREFIX } from './statsd.js';
