import { writeFile } from 'node:fs/promises'
import { registry } from './registry'

export { recordRunStart, registry } from './registry'
export * from './sync'

/**
 * Write the registry in Prometheus text format, for a node_exporter textfile collector.
 */
export async function writeMetricsFile(path: string): Promise<void> {
  await writeFile(path, await registry.metrics(), 'utf-8')
}
