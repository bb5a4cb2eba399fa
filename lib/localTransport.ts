import type {
  PlaybackTarget,
  PlayerQueue,
  QueueItem,
  RepeatMode,
  TargetPlaybackState,
  Track,
} from "../app/components/player/types"
import type { PlaybackSourceHandle, PlaybackTransport } from "./playbackSource"

export interface LocalTargetSeed {
  id: string
  name: string
  available?: boolean
  state?: TargetPlaybackState
  volume?: number
  queue?: Track[]
  currentIndex?: number | null
}

export interface LocalTransport extends PlaybackTransport {
  /** Publishes the current state into the source and keeps it updated. */
  connect(source: PlaybackSourceHandle): void
  disconnect(): void
  /** Makes every command reject with `error` until cleared with null. */
  setFailure(error: Error | null): void
  getTarget(targetId: string): PlaybackTarget | null
}

interface LocalTargetRecord {
  target: PlaybackTarget
  items: QueueItem[]
  currentIndex: number | null
  shuffle: boolean
  repeatMode: RepeatMode
}

// Past this point "previous" restarts the current item instead.
const RESTART_THRESHOLD_SECONDS = 3

function currentTrack(record: LocalTargetRecord): Track | null {
  if (record.currentIndex === null) return null
  return record.items[record.currentIndex]?.track ?? null
}

/**
 * In-memory playback server. Commands resolve on the next microtask and push
 * the resulting target and track state into the connected source.
 */
export function createLocalTransport(seeds: LocalTargetSeed[]): LocalTransport {
  const records = new Map<string, LocalTargetRecord>()
  let source: PlaybackSourceHandle | null = null
  let failure: Error | null = null

  for (const seed of seeds) {
    const items = (seed.queue ?? []).map((track, index) => ({ id: `${seed.id}:${index}`, track }))
    const currentIndex = seed.currentIndex === undefined
      ? (items.length > 0 ? 0 : null)
      : seed.currentIndex
    const record: LocalTargetRecord = {
      target: {
        id: seed.id,
        name: seed.name,
        available: seed.available ?? true,
        powered: true,
        state: seed.state ?? "idle",
        currentItemId: null,
        elapsedTime: null,
        volume: seed.volume ?? 50,
      },
      items,
      currentIndex,
      shuffle: false,
      repeatMode: "off",
    }
    syncCurrentItem(record)
    records.set(seed.id, record)
  }

  function syncCurrentItem(record: LocalTargetRecord) {
    const item = record.currentIndex === null ? null : record.items[record.currentIndex] ?? null
    record.target = {
      ...record.target,
      currentItemId: item ? item.id : null,
      elapsedTime: item ? record.target.elapsedTime ?? 0 : null,
    }
  }

  function publish() {
    if (!source) return
    source.applyTargets([...records.values()].map((record) => record.target))
    for (const record of records.values()) {
      source.applyTrack(record.target.id, currentTrack(record))
    }
  }

  async function mutate(targetId: string, update: (record: LocalTargetRecord) => void) {
    await Promise.resolve()
    if (failure) throw failure
    const record = records.get(targetId)
    if (!record) throw new Error(`Unknown target ${targetId}`)
    update(record)
    publish()
  }

  function moveTo(record: LocalTargetRecord, index: number) {
    record.currentIndex = index
    record.target = { ...record.target, elapsedTime: 0 }
    syncCurrentItem(record)
  }

  return {
    connect(nextSource) {
      source = nextSource
      nextSource.setConnected(true)
      publish()
    },

    disconnect() {
      source?.setConnected(false)
      source = null
    },

    setFailure(error) {
      failure = error
    },

    getTarget: (targetId) => records.get(targetId)?.target ?? null,

    async fetchQueue(targetId) {
      await Promise.resolve()
      if (failure) throw failure
      const record = records.get(targetId)
      if (!record) return null
      const queue: PlayerQueue = {
        targetId,
        items: [...record.items],
        currentIndex: record.currentIndex,
        shuffle: record.shuffle,
        repeatMode: record.repeatMode,
      }
      return queue
    },

    playPause: (targetId) =>
      mutate(targetId, (record) => {
        if (record.currentIndex === null) return
        const state = record.target.state === "playing" ? "paused" : "playing"
        record.target = { ...record.target, state }
      }),

    stop: (targetId) =>
      mutate(targetId, (record) => {
        record.target = { ...record.target, state: "idle", elapsedTime: record.currentIndex === null ? null : 0 }
      }),

    next: (targetId) =>
      mutate(targetId, (record) => {
        if (record.currentIndex === null || record.items.length === 0) return
        if (record.repeatMode === "one") {
          moveTo(record, record.currentIndex)
          return
        }
        const nextIndex = record.currentIndex + 1
        if (nextIndex < record.items.length) moveTo(record, nextIndex)
        else if (record.repeatMode === "all") moveTo(record, 0)
      }),

    previous: (targetId) =>
      mutate(targetId, (record) => {
        if (record.currentIndex === null || record.items.length === 0) return
        const elapsed = record.target.elapsedTime ?? 0
        if (elapsed > RESTART_THRESHOLD_SECONDS || record.repeatMode === "one") {
          moveTo(record, record.currentIndex)
          return
        }
        const previousIndex = record.currentIndex - 1
        if (previousIndex >= 0) moveTo(record, previousIndex)
        else if (record.repeatMode === "all") moveTo(record, record.items.length - 1)
        else moveTo(record, 0)
      }),

    seek: (targetId, seconds) =>
      mutate(targetId, (record) => {
        const duration = currentTrack(record)?.duration ?? null
        const clamped = duration === null ? Math.max(0, seconds) : Math.min(duration, Math.max(0, seconds))
        record.target = { ...record.target, elapsedTime: clamped }
      }),

    setVolume: (targetId, level) =>
      mutate(targetId, (record) => {
        record.target = { ...record.target, volume: level }
      }),

    setShuffle: (targetId, enabled) =>
      mutate(targetId, (record) => {
        record.shuffle = enabled
      }),

    setRepeat: (targetId, mode) =>
      mutate(targetId, (record) => {
        record.repeatMode = mode
      }),
  }
}
