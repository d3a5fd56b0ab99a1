import { componentLogger } from '../logger.js'
import type { AcquiredSource, CaptureBackend } from './types.js'

const log = componentLogger('test-pattern')

export const TEST_PATTERN = 'ball'

/** Synthetic source for checking the receiver path; needs no Android session */
export const testPatternBackend: CaptureBackend = {
  kind: 'test',

  async acquire(): Promise<AcquiredSource> {
    log.info(`Streaming the "${TEST_PATTERN}" test pattern`)
    return {
      session: { backendKind: 'test', sourceHandle: TEST_PATTERN, state: 'acquired' },
      release: async () => {},
    }
  },
}
