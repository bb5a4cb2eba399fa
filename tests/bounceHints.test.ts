import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"
import { HINTS_STORAGE_KEY, ONBOARDING_STORAGE_KEY } from "../app/components/player/constants"
import { BounceHintController, bounceShape } from "../app/components/player/hints"
import { createMemoryStorage, createPlayerSettings } from "../lib/playerSettings"
import { ManualFrameClock } from "./helpers/manualFrameClock"

const READY = { connected: true, hasSelectedTarget: true }

function setup(initial: Record<string, string> = {}) {
  const clock = new ManualFrameClock()
  const storage = createMemoryStorage(initial)
  const settings = createPlayerSettings(storage)
  const hints = new BounceHintController({ clock, settings })
  return { clock, storage, settings, hints }
}

describe("bounce shape", () => {
  it("starts and ends at rest", () => {
    expect(bounceShape(0, 10)).toBe(0)
    expect(bounceShape(1, 10)).toBe(0)
  })

  it("never exceeds its height", () => {
    for (let i = 0; i <= 100; i++) {
      expect(bounceShape(i / 100, 20)).toBeLessThanOrEqual(20)
    }
  })
})

describe("BounceHintController", () => {
  beforeEach(() => {
    vi.useFakeTimers()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it("runs a single bounce and settles back to 0", () => {
    const { clock, hints } = setup()
    hints.bounce()
    clock.advance(160)
    expect(hints.bounceOffset).toBeGreaterThan(0)
    expect(hints.bounceOffset).toBeLessThanOrEqual(10)

    clock.flush()
    expect(hints.bounceOffset).toBe(0)
  })

  it("waits for a connected source with a selected target", () => {
    const { hints } = setup()
    expect(hints.maybeStartHints({ connected: false, hasSelectedTarget: true })).toBe(false)
    expect(hints.maybeStartHints({ connected: true, hasSelectedTarget: false })).toBe(false)
    expect(hints.isActive).toBe(false)

    expect(hints.maybeStartHints(READY)).toBe(true)
    expect(hints.isActive).toBe(true)
    expect(hints.maybeStartHints(READY)).toBe(false)
  })

  it("stays quiet once onboarding is complete", () => {
    const { hints } = setup({ [ONBOARDING_STORAGE_KEY]: "1" })
    expect(hints.maybeStartHints(READY)).toBe(false)
    expect(hints.snapshot.hasCompletedOnboarding).toBe(true)
  })

  it("fades the welcome overlay in and repeats the hint bounce", () => {
    const { clock, hints } = setup()
    hints.maybeStartHints(READY)
    clock.advance(160)
    expect(hints.bounceOffset).toBeGreaterThan(0)

    clock.advance(640)
    expect(hints.snapshot.welcomeOpacity).toBe(1)
    expect(hints.bounceOffset).toBe(0)

    vi.advanceTimersByTime(2000)
    clock.advance(160)
    expect(hints.bounceOffset).toBeGreaterThan(0)
  })

  it("lets a single bounce cut off the hint bounce", () => {
    const { clock, hints } = setup()
    hints.maybeStartHints(READY)
    clock.frame(100)

    hints.bounce()
    clock.advance(400)
    expect(hints.bounceOffset).toBe(0)
    expect(clock.now()).toBe(500)
  })

  it("ends hint mode for good once the swipe is learned", () => {
    const { clock, hints, settings } = setup()
    hints.maybeStartHints(READY)
    clock.flush()

    hints.markLearned()
    expect(hints.isActive).toBe(false)
    expect(settings.readOnboardingCompleted()).toBe(true)
    clock.flush()
    expect(hints.snapshot.welcomeOpacity).toBe(0)

    vi.advanceTimersByTime(4000)
    expect(clock.pendingFrames).toBe(0)
    expect(hints.maybeStartHints(READY)).toBe(false)
  })

  it("persists completion when skipped", () => {
    const { hints, storage } = setup()
    hints.maybeStartHints(READY)
    hints.skip()
    expect(storage.getItem(ONBOARDING_STORAGE_KEY)).toBe("1")
  })

  it("only persists completion when hint mode was running", () => {
    const { hints, settings } = setup()
    hints.markLearned()
    expect(settings.readOnboardingCompleted()).toBe(false)
    expect(hints.maybeStartHints(READY)).toBe(false)
  })

  it("persists the hints toggle", () => {
    const { hints, storage } = setup()
    expect(hints.snapshot.hintsEnabled).toBe(true)
    hints.setHintsEnabled(false)
    expect(hints.snapshot.hintsEnabled).toBe(false)
    expect(storage.getItem(HINTS_STORAGE_KEY)).toBe("0")
  })

  it("stops the loop on dispose", () => {
    const { clock, hints } = setup()
    hints.maybeStartHints(READY)
    hints.dispose()
    expect(clock.pendingFrames).toBe(0)
    vi.advanceTimersByTime(4000)
    expect(clock.pendingFrames).toBe(0)
  })
})
