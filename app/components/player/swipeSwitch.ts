import {
  EDGE_DEAD_ZONE,
  SWIPE_CANCEL_MS,
  SWIPE_COMMIT_MS,
  SWIPE_COMMIT_THRESHOLD,
  SWIPE_HOLD_FRAMES_KNOWN_TRACK,
  SWIPE_HOLD_FRAMES_UNKNOWN_TRACK,
  SWIPE_VELOCITY_THRESHOLD,
} from "./constants"
import { easeOut, easeOutBack } from "./easing"
import type { FrameClock } from "./frameClock"
import { adjacentTarget, directionForOffset, isInEdgeDeadZone, type SwipeDirection } from "./targets"
import { AnimationTimeline } from "./timeline"
import type { PlaybackSource, PlaybackTarget, Track } from "./types"

export type SwipePhase = "idle" | "dragging" | "committing" | "holding" | "cancelling"

export interface SwipeSnapshot {
  phase: SwipePhase
  offset: number
  peekTarget: PlaybackTarget | null
  peekTrack: Track | null
  peekDirection: SwipeDirection | null
  isDragging: boolean
  isAnimating: boolean
}

export type SwipeSource = Pick<
  PlaybackSource,
  "getSelectedTarget" | "getAvailableTargets" | "getCachedTrackForTarget" | "getCurrentTrack" | "selectTarget"
>

export interface SwipeSwitchOptions {
  clock: FrameClock
  source: SwipeSource
  commitThreshold?: number
  velocityThreshold?: number
  commitDuration?: number
  cancelDuration?: number
  edgeDeadZone?: number
  holdFramesKnownTrack?: number
  holdFramesUnknownTrack?: number
  onSwitch?: (target: PlaybackTarget) => void
  onError?: (error: unknown) => void
}

export interface DragStartInput {
  x: number
  containerWidth: number
  screenWidth: number
}

type GestureState = "none" | "tracking" | "rejected"

/**
 * Horizontal swipe on the collapsed player that previews the neighbouring
 * playback target and switches to it on release.
 *
 * idle -> dragging -> committing -> holding -> idle
 *                  -> cancelling -> idle
 */
export class SwipeSwitchController {
  private readonly clock: FrameClock
  private readonly source: SwipeSource
  private readonly timeline: AnimationTimeline
  private readonly commitThreshold: number
  private readonly velocityThreshold: number
  private readonly commitDuration: number
  private readonly cancelDuration: number
  private readonly edgeDeadZone: number
  private readonly holdFramesKnownTrack: number
  private readonly holdFramesUnknownTrack: number
  private readonly onSwitch: ((target: PlaybackTarget) => void) | undefined
  private readonly onError: ((error: unknown) => void) | undefined
  private readonly listeners = new Set<(snapshot: SwipeSnapshot) => void>()

  private phase: SwipePhase = "idle"
  private gesture: GestureState = "none"
  private containerWidth = 0
  private peekTarget: PlaybackTarget | null = null
  private peekTrack: Track | null = null
  private peekDirection: SwipeDirection | null = null
  private holdFramesLeft = 0
  private holdHandle: number | null = null
  private disposed = false

  constructor(options: SwipeSwitchOptions) {
    this.clock = options.clock
    this.source = options.source
    this.commitThreshold = options.commitThreshold ?? SWIPE_COMMIT_THRESHOLD
    this.velocityThreshold = options.velocityThreshold ?? SWIPE_VELOCITY_THRESHOLD
    this.commitDuration = options.commitDuration ?? SWIPE_COMMIT_MS
    this.cancelDuration = options.cancelDuration ?? SWIPE_CANCEL_MS
    this.edgeDeadZone = options.edgeDeadZone ?? EDGE_DEAD_ZONE
    this.holdFramesKnownTrack = options.holdFramesKnownTrack ?? SWIPE_HOLD_FRAMES_KNOWN_TRACK
    this.holdFramesUnknownTrack = options.holdFramesUnknownTrack ?? SWIPE_HOLD_FRAMES_UNKNOWN_TRACK
    this.onSwitch = options.onSwitch
    this.onError = options.onError
    this.timeline = new AnimationTimeline({ clock: this.clock, lowerBound: -1, upperBound: 1, initialValue: 0 })
    this.timeline.subscribe((event) => {
      if (event.type === "tick") this.emit()
    })
  }

  get offset(): number {
    return this.timeline.value
  }

  get isDragging(): boolean {
    return this.phase === "dragging"
  }

  get isAnimating(): boolean {
    return this.phase === "committing" || this.phase === "holding" || this.phase === "cancelling"
  }

  get snapshot(): SwipeSnapshot {
    return {
      phase: this.phase,
      offset: this.timeline.value,
      peekTarget: this.peekTarget,
      peekTrack: this.peekTrack,
      peekDirection: this.peekDirection,
      isDragging: this.isDragging,
      isAnimating: this.isAnimating,
    }
  }

  subscribe(listener: (snapshot: SwipeSnapshot) => void): () => void {
    this.listeners.add(listener)
    return () => this.listeners.delete(listener)
  }

  /** Returns whether the gesture is being tracked. */
  dragStart(input: DragStartInput): boolean {
    if (this.disposed) return false
    // A repeated start for the drag in progress keeps tracking it.
    if (this.phase === "dragging") return this.gesture === "tracking"
    if (this.isAnimating) {
      this.gesture = "rejected"
      return false
    }
    if (input.containerWidth <= 0 || isInEdgeDeadZone(input.x, input.screenWidth, this.edgeDeadZone)) {
      this.gesture = "rejected"
      return false
    }

    this.gesture = "tracking"
    this.containerWidth = input.containerWidth
    this.phase = "dragging"
    this.clearPeek()
    this.timeline.set(0)
    this.emit()
    return true
  }

  dragUpdate(dx: number): void {
    if (this.gesture !== "tracking" || this.phase !== "dragging") return
    if (!Number.isFinite(dx)) return

    const next = Math.min(1, Math.max(-1, this.timeline.value + dx / this.containerWidth))
    if (next === this.timeline.value) return
    this.updatePeek(next)
    this.timeline.set(next)
  }

  /** `velocity` is horizontal release velocity in px/s, negative leftward. */
  dragEnd(velocity = 0): void {
    const tracked = this.gesture === "tracking"
    this.gesture = "none"
    if (!tracked || this.phase !== "dragging") return

    const speed = Number.isFinite(velocity) ? velocity : 0
    const offset = this.timeline.value
    const shouldCommit = Math.abs(offset) > this.commitThreshold || Math.abs(speed) > this.velocityThreshold
    const sign = offset !== 0 ? Math.sign(offset) : Math.sign(speed)

    if (shouldCommit && sign !== 0) {
      this.updatePeek(sign)
      const target = this.peekTarget
      if (target) {
        this.commit(target, sign)
        return
      }
    }
    this.cancel()
  }

  dispose(): void {
    this.disposed = true
    this.cancelHold()
    this.timeline.dispose()
    this.listeners.clear()
    this.phase = "idle"
    this.gesture = "none"
  }

  private commit(target: PlaybackTarget, sign: number): void {
    this.phase = "committing"
    this.emit()
    this.timeline.animateTo(sign < 0 ? -1 : 1, {
      duration: this.commitDuration,
      curve: easeOut,
      scaleDuration: false,
      onComplete: () => this.finishCommit(target),
    })
  }

  private finishCommit(target: PlaybackTarget): void {
    try {
      this.source.selectTarget(target)
    } catch (error) {
      this.onError?.(error)
    }
    this.onSwitch?.(target)

    // Without a known track the new target's content has nothing to paint
    // yet, so the peek stays on screen one frame longer.
    const trackKnown = this.source.getCurrentTrack() !== null
    this.holdFramesLeft = trackKnown ? this.holdFramesKnownTrack : this.holdFramesUnknownTrack
    this.phase = "holding"
    this.emit()
    this.scheduleHoldFrame()
  }

  private scheduleHoldFrame(): void {
    if (this.holdFramesLeft <= 0) {
      this.resetToNeutral()
      return
    }
    this.holdHandle = this.clock.requestFrame(() => {
      this.holdHandle = null
      if (this.disposed) return
      this.holdFramesLeft--
      this.scheduleHoldFrame()
    })
  }

  private cancel(): void {
    this.phase = "cancelling"
    this.emit()
    this.timeline.animateTo(0, {
      duration: this.cancelDuration,
      curve: easeOutBack,
      scaleDuration: false,
      onComplete: () => {
        this.phase = "idle"
        this.clearPeek()
        this.emit()
      },
    })
  }

  private resetToNeutral(): void {
    const moved = this.timeline.value !== 0
    this.phase = "idle"
    this.clearPeek()
    this.timeline.set(0)
    if (!moved) this.emit()
  }

  private updatePeek(offset: number): void {
    const direction = directionForOffset(offset)
    const selected = this.source.getSelectedTarget()
    const candidate = selected
      ? adjacentTarget(this.source.getAvailableTargets(), selected.id, direction)
      : null

    this.peekDirection = candidate ? direction : null
    if (candidate?.id === this.peekTarget?.id) return
    this.peekTarget = candidate
    this.peekTrack = candidate ? this.source.getCachedTrackForTarget(candidate.id) : null
  }

  private clearPeek(): void {
    this.peekTarget = null
    this.peekTrack = null
    this.peekDirection = null
  }

  private cancelHold(): void {
    if (this.holdHandle === null) return
    this.clock.cancelFrame(this.holdHandle)
    this.holdHandle = null
  }

  private emit(): void {
    const snapshot = this.snapshot
    this.listeners.forEach((listener) => listener(snapshot))
  }
}
