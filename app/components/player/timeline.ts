import { linear, type Curve } from "./easing"
import type { FrameClock } from "./frameClock"

export type TimelineStatus = "dismissed" | "forward" | "reverse" | "completed" | "idle"

export type TimelineEvent =
  | { type: "tick"; value: number }
  | { type: "status"; status: TimelineStatus }

export type TimelineListener = (event: TimelineEvent) => void

export interface TimelineOptions {
  clock: FrameClock
  lowerBound?: number
  upperBound?: number
  initialValue?: number
}

export interface AnimateOptions {
  duration: number
  curve?: Curve
  /** Only called when the animation reaches its target, never on stop(). */
  onComplete?: () => void
  /**
   * Scale the duration by the share of the full range left to travel, so a
   * half-finished animation reversed midway takes half the time. On by default.
   */
  scaleDuration?: boolean
}

interface ActiveRun {
  from: number
  to: number
  startedAt: number
  duration: number
  curve: Curve
  onComplete: (() => void) | undefined
  handle: number
}

/**
 * A single progress value that is either animated toward a target by the
 * frame clock or written directly by gesture input.
 */
export class AnimationTimeline {
  private readonly clock: FrameClock
  private readonly lower: number
  private readonly upper: number
  private current: number
  private currentStatus: TimelineStatus
  private run: ActiveRun | null = null
  private readonly listeners = new Set<TimelineListener>()
  private disposed = false

  constructor(options: TimelineOptions) {
    this.clock = options.clock
    this.lower = options.lowerBound ?? 0
    this.upper = options.upperBound ?? 1
    this.current = this.clamp(options.initialValue ?? this.lower)
    this.currentStatus = this.restingStatus()
  }

  get value(): number {
    return this.current
  }

  get status(): TimelineStatus {
    return this.currentStatus
  }

  get isAnimating(): boolean {
    return this.run !== null
  }

  /** Where the running animation is heading, or null when at rest. */
  get target(): number | null {
    return this.run ? this.run.to : null
  }

  subscribe(listener: TimelineListener): () => void {
    this.listeners.add(listener)
    return () => this.listeners.delete(listener)
  }

  animateTo(target: number, options: AnimateOptions): void {
    if (this.disposed) return
    const to = this.clamp(target)
    this.cancelRun()

    const distance = Math.abs(to - this.current)
    const duration = options.scaleDuration === false
      ? options.duration
      : options.duration * (distance / (this.upper - this.lower))

    if (distance === 0 || duration <= 0) {
      this.write(to)
      this.setStatus(this.restingStatus())
      options.onComplete?.()
      return
    }

    const run: ActiveRun = {
      from: this.current,
      to,
      startedAt: this.clock.now(),
      duration,
      curve: options.curve ?? linear,
      onComplete: options.onComplete,
      handle: 0,
    }
    this.run = run
    this.setStatus(to > this.current ? "forward" : "reverse")
    run.handle = this.clock.requestFrame(this.onFrame)
  }

  /** Writes a value immediately, cancelling any running animation. */
  set(value: number): void {
    if (this.disposed) return
    this.cancelRun()
    this.write(this.clamp(value))
    this.setStatus(this.restingStatus())
  }

  stop(): void {
    if (this.disposed) return
    this.cancelRun()
    this.setStatus(this.restingStatus())
  }

  dispose(): void {
    this.cancelRun()
    this.listeners.clear()
    this.disposed = true
  }

  private readonly onFrame = (now: number): void => {
    const run = this.run
    if (!run || this.disposed) return

    const elapsed = Math.max(0, now - run.startedAt)
    const fraction = Math.min(1, elapsed / run.duration)

    if (fraction >= 1) {
      this.run = null
      this.write(run.to)
      this.setStatus(this.restingStatus())
      run.onComplete?.()
      return
    }

    this.write(this.clamp(run.from + (run.to - run.from) * run.curve(fraction)))
    // A listener may have stopped or replaced the run during the tick.
    if (this.run !== run) return
    run.handle = this.clock.requestFrame(this.onFrame)
  }

  private cancelRun(): void {
    if (!this.run) return
    this.clock.cancelFrame(this.run.handle)
    this.run = null
  }

  private write(value: number): void {
    if (value === this.current) return
    this.current = value
    this.emit({ type: "tick", value })
  }

  private setStatus(status: TimelineStatus): void {
    if (status === this.currentStatus) return
    this.currentStatus = status
    this.emit({ type: "status", status })
  }

  private restingStatus(): TimelineStatus {
    if (this.current <= this.lower) return "dismissed"
    if (this.current >= this.upper) return "completed"
    return "idle"
  }

  private clamp(value: number): number {
    return Math.min(this.upper, Math.max(this.lower, value))
  }

  private emit(event: TimelineEvent): void {
    this.listeners.forEach((listener) => listener(event))
  }
}
