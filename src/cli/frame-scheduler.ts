/**
 * Redraw coalescing: any number of requests within one frame produce a single
 * render call. Only the redraw is throttled; store mutations are applied as
 * they arrive.
 */

import { createLogger } from '@/helpers/logger'
import { errorMessage } from '@/helpers/errors'

const log = createLogger('frame')

export const DEFAULT_FRAME_MS = 33

export class FrameScheduler {
  private timer: ReturnType<typeof setTimeout> | null = null

  constructor(
    private readonly render: () => void,
    private readonly frameMs: number = DEFAULT_FRAME_MS
  ) {}

  get pending(): boolean {
    return this.timer !== null
  }

  request(): void {
    if (this.timer !== null) return
    this.timer = setTimeout(() => {
      this.timer = null
      this.run()
    }, this.frameMs)
  }

  /** Render now, dropping the pending frame if there is one */
  flush(): void {
    this.cancel()
    this.run()
  }

  cancel(): void {
    if (this.timer === null) return
    clearTimeout(this.timer)
    this.timer = null
  }

  private run(): void {
    try {
      this.render()
    } catch (error) {
      log.error(`Render failed: ${errorMessage(error)}`)
    }
  }
}
