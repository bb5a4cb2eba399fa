import type { PlaybackTarget, Track } from "../../app/components/player/types"
import type { PlaybackTransport } from "../../lib/playbackSource"

export function makeTarget(id: string, name: string, overrides: Partial<PlaybackTarget> = {}): PlaybackTarget {
  return {
    id,
    name,
    available: true,
    powered: true,
    state: "idle",
    currentItemId: null,
    elapsedTime: null,
    volume: 50,
    ...overrides,
  }
}

export function makeTrack(id: string, overrides: Partial<Track> = {}): Track {
  return {
    id,
    title: `Track ${id}`,
    artist: `Artist ${id}`,
    album: null,
    duration: 180,
    imageUrl: null,
    ...overrides,
  }
}

export function createStubTransport(overrides: Partial<PlaybackTransport> = {}): PlaybackTransport {
  return {
    fetchQueue: async () => null,
    playPause: async () => undefined,
    stop: async () => undefined,
    next: async () => undefined,
    previous: async () => undefined,
    seek: async () => undefined,
    setVolume: async () => undefined,
    setShuffle: async () => undefined,
    setRepeat: async () => undefined,
    ...overrides,
  }
}

export async function flushPromises(rounds = 50): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await Promise.resolve()
  }
}
