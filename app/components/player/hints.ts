import {
  HINT_BOUNCE_HEIGHT,
  HINT_BOUNCE_MS,
  HINT_REPEAT_MS,
  SINGLE_BOUNCE_HEIGHT,
  SINGLE_BOUNCE_MS,
  WELCOME_FADE_IN_MS,
  WELCOME_FADE_OUT_MS,
} from "./constants"
import { easeOut } from "./easing"
import type { FrameClock } from "./frameClock"
import { AnimationTimeline } from "./timeline"
import type { PlayerSettings } from "./types"

export interface HintSnapshot {
  isActive: boolean
  bounceOffset: number
  hasCompletedOnboarding: boolean
  welcomeOpacity: number
  hintsEnabled: boolean
}

export interface HintControllerOptions {
  clock: FrameClock
  settings: PlayerSettings
  singleBounceMs?: number
  hintBounceMs?: number
  hintRepeatMs?: number
}

/** Rises to `height` at the midpoint of the bounce and falls back to 0. */
export function bounceShape(t: number, height: number): number {
  const eased = easeOut(t)
  return eased < 0.5 ? height * 2 * eased : height * 2 * (1 - eased)
}

/**
 * Vertical nudges of the collapsed player: a one-off bounce after explicit
 * actions, and a repeating hint bounce until the user learns the swipe.
 */
export class BounceHintController {
  private readonly clock: FrameClock
  private readonly settings: PlayerSettings
  private readonly single: AnimationTimeline
  private readonly hint: AnimationTimeline
  private readonly welcome: AnimationTimeline
  private readonly singleBounceMs: number
  private readonly hintBounceMs: number
  private readonly hintRepeatMs: number
  private readonly listeners = new Set<() => void>()

  private hintActive = false
  private hintTriggered = false
  private learned = false
  private onboardingCompleted: boolean
  private hintsEnabled: boolean
  private hintTimer: ReturnType<typeof setInterval> | null = null
  private disposed = false

  constructor(options: HintControllerOptions) {
    this.clock = options.clock
    this.settings = options.settings
    this.singleBounceMs = options.singleBounceMs ?? SINGLE_BOUNCE_MS
    this.hintBounceMs = options.hintBounceMs ?? HINT_BOUNCE_MS
    this.hintRepeatMs = options.hintRepeatMs ?? HINT_REPEAT_MS
    this.onboardingCompleted = this.settings.readOnboardingCompleted()
    this.hintsEnabled = this.settings.readHintsEnabled()

    this.single = new AnimationTimeline({ clock: this.clock })
    this.hint = new AnimationTimeline({ clock: this.clock })
    this.welcome = new AnimationTimeline({ clock: this.clock })
    const notify = () => this.emit()
    this.single.subscribe(notify)
    this.hint.subscribe(notify)
    this.welcome.subscribe(notify)
  }

  get bounceOffset(): number {
    if (this.single.isAnimating) return bounceShape(this.single.value, SINGLE_BOUNCE_HEIGHT)
    if (this.hint.isAnimating) return bounceShape(this.hint.value, HINT_BOUNCE_HEIGHT)
    return 0
  }

  get isActive(): boolean {
    return this.hintActive
  }

  get snapshot(): HintSnapshot {
    return {
      isActive: this.hintActive,
      bounceOffset: this.bounceOffset,
      hasCompletedOnboarding: this.onboardingCompleted,
      welcomeOpacity: this.welcome.value,
      hintsEnabled: this.hintsEnabled,
    }
  }

  subscribe(listener: () => void): () => void {
    this.listeners.add(listener)
    return () => this.listeners.delete(listener)
  }

  bounce(): void {
    if (this.disposed) return
    this.hint.set(0)
    this.single.set(0)
    this.single.animateTo(1, { duration: this.singleBounceMs })
  }

  /** Enters hint mode once, if the player is ready and onboarding is pending. */
  maybeStartHints(state: { connected: boolean; hasSelectedTarget: boolean }): boolean {
    if (this.disposed || this.hintTriggered || this.learned || this.onboardingCompleted) return false
    if (!state.connected || !state.hasSelectedTarget) return false

    this.hintTriggered = true
    this.hintActive = true
    this.welcome.animateTo(1, { duration: WELCOME_FADE_IN_MS, scaleDuration: false })
    if (!this.single.isAnimating) this.runHintBounce()
    this.hintTimer = setInterval(() => {
      if (this.hintActive && !this.single.isAnimating) this.runHintBounce()
    }, this.hintRepeatMs)
    this.emit()
    return true
  }

  /** The user performed a switch; hints never come back. */
  markLearned(): void {
    this.learned = true
    this.endHintMode()
  }

  skip(): void {
    this.endHintMode()
  }

  setHintsEnabled(enabled: boolean): void {
    if (enabled === this.hintsEnabled) return
    this.hintsEnabled = enabled
    this.settings.persistHintsEnabled(enabled)
    this.emit()
  }

  dispose(): void {
    this.disposed = true
    this.stopLoop()
    this.single.dispose()
    this.hint.dispose()
    this.welcome.dispose()
    this.listeners.clear()
  }

  private runHintBounce(): void {
    this.hint.set(0)
    this.hint.animateTo(1, { duration: this.hintBounceMs })
  }

  private endHintMode(): void {
    if (!this.hintActive) return
    this.stopLoop()
    this.hintActive = false
    this.onboardingCompleted = true
    this.settings.persistOnboardingCompleted(true)
    this.welcome.animateTo(0, { duration: WELCOME_FADE_OUT_MS, scaleDuration: false })
    this.emit()
  }

  private stopLoop(): void {
    if (this.hintTimer === null) return
    clearInterval(this.hintTimer)
    this.hintTimer = null
  }

  private emit(): void {
    this.listeners.forEach((listener) => listener())
  }
}
