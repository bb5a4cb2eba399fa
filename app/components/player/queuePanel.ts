import { QUEUE_PANEL_MS, QUEUE_REFRESH_INTERVAL_MS } from "./constants"
import { easeIn, easeOut } from "./easing"
import type { FrameClock } from "./frameClock"
import { AnimationTimeline } from "./timeline"

export interface QueuePanelOptions {
  clock: FrameClock
  onRefresh: () => void
  duration?: number
  refreshIntervalMs?: number
}

/**
 * Slide-in queue panel nested inside the expanded player. While it rests
 * fully open it asks for a queue refresh on an interval.
 */
export class QueuePanelController {
  private readonly timeline: AnimationTimeline
  private readonly onRefresh: () => void
  private readonly duration: number
  private readonly refreshIntervalMs: number
  private readonly listeners = new Set<(progress: number) => void>()
  private refreshTimer: ReturnType<typeof setInterval> | null = null
  private refreshPaused = false

  constructor(options: QueuePanelOptions) {
    this.onRefresh = options.onRefresh
    this.duration = options.duration ?? QUEUE_PANEL_MS
    this.refreshIntervalMs = options.refreshIntervalMs ?? QUEUE_REFRESH_INTERVAL_MS
    this.timeline = new AnimationTimeline({ clock: options.clock })
    this.timeline.subscribe((event) => {
      if (event.type === "tick") {
        this.listeners.forEach((listener) => listener(event.value))
        return
      }
      if (event.status === "completed") this.startRefresh()
      else if (event.status === "dismissed") this.stopRefresh()
    })
  }

  get progress(): number {
    return this.timeline.value
  }

  get isOpen(): boolean {
    return this.timeline.value > 0.5
  }

  get isAnimating(): boolean {
    return this.timeline.isAnimating
  }

  get isRefreshing(): boolean {
    return this.refreshTimer !== null
  }

  subscribe(listener: (progress: number) => void): () => void {
    this.listeners.add(listener)
    return () => this.listeners.delete(listener)
  }

  /** Returns false when the toggle was ignored because the panel is moving. */
  toggle(): boolean {
    if (this.timeline.isAnimating) return false
    if (this.timeline.value === 0) {
      this.timeline.animateTo(1, { duration: this.duration, curve: easeOut })
    } else {
      this.timeline.animateTo(0, { duration: this.duration, curve: easeIn })
    }
    return true
  }

  /** Jumps to closed without animating. */
  reset(): void {
    this.timeline.set(0)
    this.stopRefresh()
  }

  pauseRefresh(): void {
    this.refreshPaused = true
    this.stopRefresh()
  }

  resumeRefresh(): void {
    this.refreshPaused = false
    if (this.timeline.value === 1 && !this.timeline.isAnimating) this.startRefresh()
  }

  dispose(): void {
    this.stopRefresh()
    this.timeline.dispose()
    this.listeners.clear()
  }

  private startRefresh(): void {
    if (this.refreshPaused) return
    this.stopRefresh()
    this.refreshTimer = setInterval(() => this.onRefresh(), this.refreshIntervalMs)
  }

  private stopRefresh(): void {
    if (this.refreshTimer === null) return
    clearInterval(this.refreshTimer)
    this.refreshTimer = null
  }
}
