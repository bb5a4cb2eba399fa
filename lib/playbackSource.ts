import { createStore, type StoreApi } from "zustand/vanilla"
import { sortTargets } from "../app/components/player/targets"
import type {
  AdaptiveColors,
  PlaybackSource,
  PlaybackTarget,
  PlayerQueue,
  RepeatMode,
  Track,
} from "../app/components/player/types"

export class PlayerCommandError extends Error {
  command: string
  targetId: string

  constructor(command: string, targetId: string, cause: unknown) {
    const msg = cause instanceof Error ? cause.message : String(cause)
    super(`${command} failed for target ${targetId}: ${msg}`)
    this.name = "PlayerCommandError"
    this.command = command
    this.targetId = targetId
  }
}

/** Async commands understood by the playback server. */
export interface PlaybackTransport {
  fetchQueue(targetId: string): Promise<PlayerQueue | null>
  playPause(targetId: string): Promise<void>
  stop(targetId: string): Promise<void>
  next(targetId: string): Promise<void>
  previous(targetId: string): Promise<void>
  seek(targetId: string, seconds: number): Promise<void>
  setVolume(targetId: string, level: number): Promise<void>
  setShuffle(targetId: string, enabled: boolean): Promise<void>
  setRepeat(targetId: string, mode: RepeatMode): Promise<void>
}

export interface PlaybackSourceState {
  connected: boolean
  targets: PlaybackTarget[]
  selectedId: string | null
  trackCache: Record<string, Track | null>
  shuffleByTarget: Record<string, boolean>
}

export interface PlaybackSourceOptions {
  /** Target to select when the first target list arrives. */
  preferredTargetId?: string | null
  extractAdaptiveColors?: (imageUrl: string) => Promise<AdaptiveColors | null>
}

export interface PlaybackSourceHandle extends PlaybackSource {
  readonly store: Omit<StoreApi<PlaybackSourceState>, "setState">
  setConnected(connected: boolean): void
  applyTargets(targets: PlaybackTarget[]): void
  applyTrack(targetId: string, track: Track | null): void
}

const REPEAT_ORDER: RepeatMode[] = ["off", "all", "one"]

export function nextRepeatMode(current: RepeatMode): RepeatMode {
  const index = REPEAT_ORDER.indexOf(current)
  return REPEAT_ORDER[(index + 1) % REPEAT_ORDER.length]
}

export function hasArtwork(track: Track): boolean {
  return Boolean(track.imageUrl || track.album?.imageUrl)
}

export function withSizeParam(url: string, size: number): string {
  const separator = url.includes("?") ? "&" : "?"
  return `${url}${separator}size=${size}`
}

export function clampVolume(level: number): number {
  return Math.round(Math.min(100, Math.max(0, level)))
}

export function createPlaybackSource(
  transport: PlaybackTransport,
  options: PlaybackSourceOptions = {}
): PlaybackSourceHandle {
  const store = createStore<PlaybackSourceState>()(() => ({
    connected: false,
    targets: [],
    selectedId: null,
    trackCache: {},
    shuffleByTarget: {},
  }))

  async function runCommand(command: string, targetId: string, action: () => Promise<void>) {
    try {
      await action()
    } catch (error) {
      const failure = error instanceof PlayerCommandError ? error : new PlayerCommandError(command, targetId, error)
      console.warn(`[playback-source] ${failure.message}`)
      throw failure
    }
  }

  function getSelectedTarget(): PlaybackTarget | null {
    const { targets, selectedId } = store.getState()
    if (selectedId === null) return null
    return targets.find((target) => target.id === selectedId) ?? null
  }

  return {
    store,

    setConnected(connected) {
      if (store.getState().connected === connected) return
      store.setState({ connected })
    },

    applyTargets(targets) {
      const sorted = sortTargets(targets)
      store.setState((state) => {
        const stillPresent = state.selectedId !== null && sorted.some((target) => target.id === state.selectedId)
        let selectedId = stillPresent ? state.selectedId : null
        if (selectedId === null) {
          const preferred = options.preferredTargetId
          selectedId = preferred && sorted.some((target) => target.id === preferred)
            ? preferred
            : sorted[0]?.id ?? null
        }
        return { targets: sorted, selectedId }
      })
    },

    applyTrack(targetId, track) {
      const existing = store.getState().trackCache[targetId] ?? null
      // The same track re-reported without artwork keeps the cached artwork.
      if (track && existing && existing.id === track.id && hasArtwork(existing) && !hasArtwork(track)) return
      store.setState((state) => ({ trackCache: { ...state.trackCache, [targetId]: track } }))
    },

    isConnected: () => store.getState().connected,

    subscribe(listener) {
      return store.subscribe(() => listener())
    },

    getSelectedTarget,

    getCurrentTrack() {
      const { selectedId, trackCache } = store.getState()
      if (selectedId === null) return null
      return trackCache[selectedId] ?? null
    },

    getAvailableTargets: () => store.getState().targets,

    getCachedTrackForTarget: (targetId) => store.getState().trackCache[targetId] ?? null,

    selectTarget(target) {
      const { targets, selectedId } = store.getState()
      if (selectedId === target.id) return
      if (!targets.some((candidate) => candidate.id === target.id)) {
        console.warn(`[playback-source] cannot select unknown target ${target.id}`)
        return
      }
      store.setState({ selectedId: target.id })
    },

    async getQueue(targetId) {
      try {
        const queue = await transport.fetchQueue(targetId)
        if (queue) {
          store.setState((state) => ({
            shuffleByTarget: { ...state.shuffleByTarget, [targetId]: queue.shuffle },
          }))
        }
        return queue
      } catch (error) {
        throw new PlayerCommandError("fetchQueue", targetId, error)
      }
    },

    toggleShuffle(targetId) {
      const enabled = !(store.getState().shuffleByTarget[targetId] ?? false)
      return runCommand("toggleShuffle", targetId, async () => {
        await transport.setShuffle(targetId, enabled)
        store.setState((state) => ({
          shuffleByTarget: { ...state.shuffleByTarget, [targetId]: enabled },
        }))
      })
    },

    cycleRepeat: (targetId, current) =>
      runCommand("cycleRepeat", targetId, () => transport.setRepeat(targetId, nextRepeatMode(current))),

    seek: (targetId, seconds) =>
      runCommand("seek", targetId, () => transport.seek(targetId, Math.max(0, seconds))),

    setVolume: (targetId, level) =>
      runCommand("setVolume", targetId, () => transport.setVolume(targetId, clampVolume(level))),

    playPause: (targetId) => runCommand("playPause", targetId, () => transport.playPause(targetId)),

    stop: (targetId) => runCommand("stop", targetId, () => transport.stop(targetId)),

    skipNext: (targetId) => runCommand("skipNext", targetId, () => transport.next(targetId)),

    skipPrevious: (targetId) => runCommand("skipPrevious", targetId, () => transport.previous(targetId)),

    getArtworkUrl(track, size) {
      const url = track.imageUrl || track.album?.imageUrl || null
      return url ? withSizeParam(url, size) : null
    },

    async extractAdaptiveColors(imageUrl) {
      if (!options.extractAdaptiveColors) return null
      return options.extractAdaptiveColors(imageUrl)
    },
  }
}
