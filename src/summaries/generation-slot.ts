import { GenerationInProgressError } from '../errors'

export type GenerationOutcome<T> =
  | { status: 'completed'; value: T }
  | { status: 'failed'; error: unknown }
  | { status: 'cancelled' }

export type GenerationTask<T> = {
  readonly id: number
  /** Settles once; never rejects. */
  readonly outcome: Promise<GenerationOutcome<T>>
  readonly cancelled: boolean
  cancel(): void
}

/**
 * Holds at most one in-flight generation for an interactive session. A
 * second start while one runs is rejected, not queued. Cancelling frees the
 * slot at once; the abandoned work keeps running and its result is dropped.
 */
export class GenerationSlot<T> {
  private active: GenerationTask<T> | null = null
  private nextId = 1

  get busy(): boolean {
    return this.active !== null
  }

  get current(): GenerationTask<T> | null {
    return this.active
  }

  start(run: () => Promise<T>): GenerationTask<T> {
    if (this.active) {
      throw new GenerationInProgressError()
    }

    const id = this.nextId
    this.nextId += 1
    let cancelled = false
    let resolveCancelled: (outcome: GenerationOutcome<T>) => void = () => {}
    const cancellation = new Promise<GenerationOutcome<T>>((resolve) => {
      resolveCancelled = resolve
    })

    const work = run().then(
      (value): GenerationOutcome<T> => ({ status: 'completed', value }),
      (error: unknown): GenerationOutcome<T> => ({ status: 'failed', error }),
    )

    const task: GenerationTask<T> = {
      id,
      outcome: Promise.race([work, cancellation]).then((outcome): GenerationOutcome<T> => {
        this.release(task)
        return cancelled ? { status: 'cancelled' } : outcome
      }),
      get cancelled() {
        return cancelled
      },
      cancel: () => {
        if (cancelled) return
        cancelled = true
        this.release(task)
        resolveCancelled({ status: 'cancelled' })
      },
    }

    this.active = task
    return task
  }

  /** Cancel the in-flight task, if any. Returns whether one was running. */
  cancel(): boolean {
    const task = this.active
    if (!task) return false
    task.cancel()
    return true
  }

  private release(task: GenerationTask<T>): void {
    if (this.active === task) {
      this.active = null
    }
  }
}
