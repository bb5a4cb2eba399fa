import { COLLAPSE_MS, EXPAND_MS } from "./constants"
import { easeInCubic, easeOutCubic } from "./easing"
import type { FrameClock } from "./frameClock"
import { AnimationTimeline } from "./timeline"

export type ExpansionEvent =
  | { type: "progress"; progress: number }
  | { type: "expand-start" }
  | { type: "collapse-start" }
  | { type: "expanded" }
  | { type: "dismissed" }

export type ExpansionListener = (event: ExpansionEvent) => void

export interface ExpansionControllerOptions {
  clock: FrameClock
  expandDuration?: number
  collapseDuration?: number
}

/** Drives the 0 (mini) to 1 (full screen) morph of the player surface. */
export class ExpansionController {
  private readonly timeline: AnimationTimeline
  private readonly expandDuration: number
  private readonly collapseDuration: number
  private readonly listeners = new Set<ExpansionListener>()

  constructor(options: ExpansionControllerOptions) {
    this.expandDuration = options.expandDuration ?? EXPAND_MS
    this.collapseDuration = options.collapseDuration ?? COLLAPSE_MS
    this.timeline = new AnimationTimeline({ clock: options.clock })
    this.timeline.subscribe((event) => {
      if (event.type === "tick") {
        this.emit({ type: "progress", progress: event.value })
      } else if (event.status === "completed") {
        this.emit({ type: "expanded" })
      } else if (event.status === "dismissed") {
        this.emit({ type: "dismissed" })
      }
    })
  }

  get progress(): number {
    return this.timeline.value
  }

  get isExpanded(): boolean {
    return this.timeline.value > 0.5
  }

  get isAnimating(): boolean {
    return this.timeline.isAnimating
  }

  /** True when fully collapsed and not moving. */
  get isCollapsed(): boolean {
    return this.timeline.value === 0 && !this.timeline.isAnimating
  }

  subscribe(listener: ExpansionListener): () => void {
    this.listeners.add(listener)
    return () => this.listeners.delete(listener)
  }

  expand(): void {
    if (this.timeline.target === 1) return
    if (!this.timeline.isAnimating && this.timeline.value === 1) return
    this.emit({ type: "expand-start" })
    this.timeline.animateTo(1, { duration: this.expandDuration, curve: easeOutCubic })
  }

  collapse(): void {
    if (this.timeline.target === 0) return
    if (!this.timeline.isAnimating && this.timeline.value === 0) return
    this.emit({ type: "collapse-start" })
    this.timeline.animateTo(0, { duration: this.collapseDuration, curve: easeInCubic })
  }

  dispose(): void {
    this.timeline.dispose()
    this.listeners.clear()
  }

  private emit(event: ExpansionEvent): void {
    this.listeners.forEach((listener) => listener(event))
  }
}
