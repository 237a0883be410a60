/**
 * Vitest setup for the property suites: fast-check run counts from the
 * environment.
 *
 *   FUZZ_ITERATIONS  runs per property (default 50)
 *   FUZZ_VERBOSE     'true' prints failing values in full
 */
import * as fc from 'fast-check'

const requested = parseInt(process.env.FUZZ_ITERATIONS ?? '', 10)
const numRuns = Number.isNaN(requested) ? 50 : requested
const verbose = process.env.FUZZ_VERBOSE === 'true'

fc.configureGlobal({ numRuns, verbose })

if (verbose) {
  console.log(`fast-check: ${numRuns} runs per property`)
}
