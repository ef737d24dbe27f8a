import { Registry } from 'prom-client';

/**
 * Value of the sample of `name` whose labels include `labels`, or undefined
 * when no such sample has been recorded.
 */
export async function metricValue(
  registry: Registry,
  name: string,
  labels: Record<string, string>,
): Promise<number | undefined> {
  const metric = registry.getSingleMetric(name);
  if (!metric) {
    return undefined;
  }
  const { values } = await metric.get();
  return values.find((sample) =>
    Object.entries(labels).every(
      ([label, value]) => sample.labels[label] === value,
    ),
  )?.value;
}
