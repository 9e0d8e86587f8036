/**
 * Vitest setup for the property suites.
 *
 * FUZZ_ITERATIONS sets runs per property (default 50); FUZZ_VERBOSE=true
 * prints counterexample details and the run count.
 */
import * as fc from 'fast-check'

function iterationsFromEnv(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') return 50
  const parsed = parseInt(raw, 10)
  return Number.isInteger(parsed) && parsed > 0 ? parsed : 50
}

const numRuns = iterationsFromEnv(process.env.FUZZ_ITERATIONS)
const verbose = process.env.FUZZ_VERBOSE === 'true'

fc.configureGlobal({ numRuns, verbose })

if (verbose) {
  console.info(`[fuzz] ${numRuns} runs per property`)
}
