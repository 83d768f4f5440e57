#!/usr/bin/env node
import { createProgram } from './cli'

// SIGINT/SIGTERM kill running tool processes and skip pending retries
const controller = new AbortController()
const abort = () => controller.abort(new Error('Interrupted by signal'))
process.once('SIGINT', abort)
process.once('SIGTERM', abort)

await createProgram({ signal: controller.signal }).parseAsync(process.argv)
