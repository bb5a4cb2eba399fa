export type FrameCallback = (now: number) => void

/**
 * Source of render frames. Every timeline in the player advances on these
 * callbacks, so swapping the clock makes animation fully deterministic.
 */
export interface FrameClock {
  now(): number
  requestFrame(callback: FrameCallback): number
  cancelFrame(handle: number): void
}

const FALLBACK_FRAME_MS = 16

export function createBrowserFrameClock(): FrameClock {
  const hasAnimationFrame = typeof window !== "undefined" && typeof window.requestAnimationFrame === "function"

  if (hasAnimationFrame) {
    return {
      now: () => performance.now(),
      requestFrame: (callback) => window.requestAnimationFrame(callback),
      cancelFrame: (handle) => window.cancelAnimationFrame(handle),
    }
  }

  // Server render and non-DOM hosts.
  const timers = new Map<number, ReturnType<typeof setTimeout>>()
  let nextHandle = 1
  return {
    now: () => performance.now(),
    requestFrame: (callback) => {
      const handle = nextHandle++
      timers.set(handle, setTimeout(() => {
        timers.delete(handle)
        callback(performance.now())
      }, FALLBACK_FRAME_MS))
      return handle
    },
    cancelFrame: (handle) => {
      const timer = timers.get(handle)
      if (timer === undefined) return
      clearTimeout(timer)
      timers.delete(handle)
    },
  }
}
