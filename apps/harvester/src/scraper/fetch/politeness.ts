import type { Politeness } from '../types.js'

const defaultSleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms))

/**
 * Fixed inter-request pause. The only backpressure applied to storefronts:
 * it does not adapt to latency or error rate.
 */
export class PolitenessDelay implements Politeness {
  readonly delayMs: number
  private readonly sleep: (ms: number) => Promise<void>

  constructor(delayMs: number, sleep: (ms: number) => Promise<void> = defaultSleep) {
    this.delayMs = Math.max(0, delayMs)
    this.sleep = sleep
  }

  async pause(): Promise<void> {
    if (this.delayMs > 0) {
      await this.sleep(this.delayMs)
    }
  }
}

