import { afterEach, describe, expect, it, vi } from "vitest"
import { HINTS_STORAGE_KEY, ONBOARDING_STORAGE_KEY } from "../app/components/player/constants"
import { createMemoryStorage, createPlayerSettings } from "../lib/playerSettings"

describe("player settings", () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it("defaults to onboarding pending and hints on", () => {
    const settings = createPlayerSettings(createMemoryStorage())
    expect(settings.readOnboardingCompleted()).toBe(false)
    expect(settings.readHintsEnabled()).toBe(true)
  })

  it("stores flags under their keys", () => {
    const storage = createMemoryStorage()
    const settings = createPlayerSettings(storage)
    settings.persistOnboardingCompleted(true)
    settings.persistHintsEnabled(false)

    expect(storage.getItem(ONBOARDING_STORAGE_KEY)).toBe("1")
    expect(storage.getItem(HINTS_STORAGE_KEY)).toBe("0")
    expect(settings.readOnboardingCompleted()).toBe(true)
    expect(settings.readHintsEnabled()).toBe(false)
  })

  it("reads legacy boolean strings", () => {
    const settings = createPlayerSettings(createMemoryStorage({ [ONBOARDING_STORAGE_KEY]: "true" }))
    expect(settings.readOnboardingCompleted()).toBe(true)
  })

  it("falls back to defaults when storage throws", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined)
    const settings = createPlayerSettings({
      getItem: () => {
        throw new Error("denied")
      },
      setItem: () => {
        throw new Error("quota exceeded")
      },
    })

    expect(settings.readHintsEnabled()).toBe(true)
    expect(warn).toHaveBeenCalledWith(`[player-settings] failed to read ${HINTS_STORAGE_KEY}: denied`)

    settings.persistOnboardingCompleted(true)
    expect(warn).toHaveBeenCalledWith(`[player-settings] failed to write ${ONBOARDING_STORAGE_KEY}: quota exceeded`)
  })

  it("keeps settings in memory outside the browser", () => {
    const settings = createPlayerSettings()
    settings.persistHintsEnabled(false)
    expect(settings.readHintsEnabled()).toBe(false)
  })
})
