/**
 * Vitest setup file for property tests.
 * Configures fast-check global defaults.
 */
import * as fc from 'fast-check'

// FUZZ_ITERATIONS=1000 (see `npm run test:fuzz`) for a deeper run
const fuzzIterations = process.env.FUZZ_ITERATIONS ?? ''
const parsed = fuzzIterations ? parseInt(fuzzIterations, 10) : NaN
const numRuns = isNaN(parsed) ? 200 : parsed

fc.configureGlobal({
  numRuns,
  verbose: (process.env.FUZZ_VERBOSE ?? 'false') === 'true',
})
