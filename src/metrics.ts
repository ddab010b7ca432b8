// Interfaces to make the package compatible with prom-client

export type MetricLabels = Record<string, string | number>

export interface Counter {
  inc: (value?: number) => void
}

export interface Gauge extends Counter {
  dec: (value?: number) => void
}

export interface Metric<Child> {
  labels (labels: MetricLabels): Child
}

export interface Registry {
  getSingleMetric: (name: string) => unknown
}

export interface MetricOptions {
  name: string
  help: string
  registers?: Registry[]
  labelNames?: readonly string[]
}

export interface Prometheus {
  Counter: new (options: MetricOptions) => Metric<Counter>
  Gauge: new (options: MetricOptions) => Metric<Gauge>
}

export interface Metrics {
  registry: Registry
  client: Prometheus
  labels?: MetricLabels
}

export function ensureMetric (metrics: Metrics, type: 'Counter', name: string, help: string): Counter
export function ensureMetric (metrics: Metrics, type: 'Gauge', name: string, help: string): Gauge
export function ensureMetric (metrics: Metrics, type: 'Counter' | 'Gauge', name: string, help: string): Counter | Gauge {
  const labels = metrics.labels ?? {}
  let metric = metrics.registry.getSingleMetric(name) as Metric<Counter | Gauge> | undefined

  if (!metric) {
    const options = { name, help, registers: [metrics.registry], labelNames: Object.keys(labels) }
    metric = type === 'Gauge' ? new metrics.client.Gauge(options) : new metrics.client.Counter(options)
  }

  return metric.labels(labels)
}
