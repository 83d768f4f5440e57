/**
 * Prometheus registry shared by every fanmirror metric.
 * Kept apart from the metric definitions so they can import it without cycles.
 */

import { Gauge, Registry } from 'prom-client'
import { VERSION } from '../version'

export const registry = new Registry()

export const runInfo = new Gauge({
  name: 'fanmirror_run_info',
  help: 'Tool and source of the current run, always 1',
  labelNames: ['version', 'tool', 'source'],
  registers: [registry],
})

export const runDestinations = new Gauge({
  name: 'fanmirror_run_destinations',
  help: 'Destinations configured for the current run',
  registers: [registry],
})

export const runStartTime = new Gauge({
  name: 'fanmirror_run_start_time_seconds',
  help: 'Unix timestamp when the current run started',
  registers: [registry],
})

/**
 * Record what this run mirrors, once its job has loaded.
 */
export function recordRunStart(toolPath: string, sourcePath: string, destinationCount: number): void {
  runInfo.set({ version: VERSION, tool: toolPath, source: sourcePath }, 1)
  runDestinations.set(destinationCount)
  runStartTime.set(Math.floor(Date.now() / 1000))
}
