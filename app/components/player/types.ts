export type TargetPlaybackState = "idle" | "playing" | "paused"

export interface PlaybackTarget {
  id: string
  name: string
  available: boolean
  powered: boolean
  state: TargetPlaybackState
  currentItemId: string | null
  /** Server-reported position of the loaded item, in seconds. */
  elapsedTime: number | null
  volume: number | null
}

export interface AlbumRef {
  id: string
  name: string
  imageUrl: string | null
}

export interface Track {
  id: string
  title: string
  artist: string
  album: AlbumRef | null
  /** Seconds. */
  duration: number | null
  imageUrl: string | null
}

export type RepeatMode = "off" | "all" | "one"

export interface QueueItem {
  id: string
  track: Track
}

export interface PlayerQueue {
  targetId: string
  items: QueueItem[]
  currentIndex: number | null
  shuffle: boolean
  repeatMode: RepeatMode
}

export interface ColorScheme {
  surface: string
  onSurface: string
  primary: string
  primaryContainer: string
  onPrimaryContainer: string
}

export interface AdaptiveColors {
  light: ColorScheme
  dark: ColorScheme
}

export type Brightness = "light" | "dark"

export type PlaybackSourceListener = () => void

/**
 * Everything the player controller reads from or sends to the playback
 * server. Reads are synchronous snapshots; commands resolve when the server
 * acknowledges them.
 */
export interface PlaybackSource {
  isConnected(): boolean
  subscribe(listener: PlaybackSourceListener): () => void
  getSelectedTarget(): PlaybackTarget | null
  getCurrentTrack(): Track | null
  /** Available targets, stably sorted by display name. */
  getAvailableTargets(): PlaybackTarget[]
  /** Last known track of a target. Never hits the network. */
  getCachedTrackForTarget(targetId: string): Track | null
  selectTarget(target: PlaybackTarget): void
  getQueue(targetId: string): Promise<PlayerQueue | null>
  toggleShuffle(targetId: string): Promise<void>
  cycleRepeat(targetId: string, current: RepeatMode): Promise<void>
  seek(targetId: string, seconds: number): Promise<void>
  /** `level` from 0 to 100. */
  setVolume(targetId: string, level: number): Promise<void>
  playPause(targetId: string): Promise<void>
  stop(targetId: string): Promise<void>
  skipNext(targetId: string): Promise<void>
  skipPrevious(targetId: string): Promise<void>
  getArtworkUrl(track: Track, size: number): string | null
  extractAdaptiveColors(imageUrl: string): Promise<AdaptiveColors | null>
}

export interface PlayerSettings {
  readOnboardingCompleted(): boolean
  persistOnboardingCompleted(value: boolean): void
  readHintsEnabled(): boolean
  persistHintsEnabled(value: boolean): void
}

export interface Viewport {
  width: number
  height: number
  topInset: number
  bottomInset: number
}
