import { HINTS_STORAGE_KEY, ONBOARDING_STORAGE_KEY } from "../app/components/player/constants"
import type { PlayerSettings } from "../app/components/player/types"

export interface KeyValueStorage {
  getItem(key: string): string | null
  setItem(key: string, value: string): void
}

export function createMemoryStorage(initial: Record<string, string> = {}): KeyValueStorage {
  const values = new Map(Object.entries(initial))
  return {
    getItem: (key) => values.get(key) ?? null,
    setItem: (key, value) => {
      values.set(key, value)
    },
  }
}

function resolveBrowserStorage(): KeyValueStorage | null {
  if (typeof window === "undefined") return null
  try {
    return window.localStorage
  } catch (error) {
    // Blocked in some privacy modes.
    const msg = error instanceof Error ? error.message : String(error)
    console.warn(`[player-settings] localStorage unavailable, keeping settings in memory: ${msg}`)
    return null
  }
}

export function createPlayerSettings(storage?: KeyValueStorage): PlayerSettings {
  const store = storage ?? resolveBrowserStorage() ?? createMemoryStorage()

  function readFlag(key: string, fallback: boolean): boolean {
    try {
      const raw = store.getItem(key)
      if (raw === null) return fallback
      return raw === "1" || raw === "true"
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error)
      console.warn(`[player-settings] failed to read ${key}: ${msg}`)
      return fallback
    }
  }

  function writeFlag(key: string, value: boolean) {
    try {
      store.setItem(key, value ? "1" : "0")
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error)
      console.warn(`[player-settings] failed to write ${key}: ${msg}`)
    }
  }

  return {
    readOnboardingCompleted: () => readFlag(ONBOARDING_STORAGE_KEY, false),
    persistOnboardingCompleted: (value) => writeFlag(ONBOARDING_STORAGE_KEY, value),
    readHintsEnabled: () => readFlag(HINTS_STORAGE_KEY, true),
    persistHintsEnabled: (value) => writeFlag(HINTS_STORAGE_KEY, value),
  }
}
