import { createStore, type StoreApi } from "zustand/vanilla"
import { createPlayerSettings } from "../../../lib/playerSettings"
import {
  ARTWORK_SIZE,
  EDGE_DEAD_ZONE,
  ELAPSED_TICK_MS,
  FALLBACK_COLLAPSED_BG,
  FALLBACK_COLLAPSED_TEXT,
  FALLBACK_EXPANDED_BG,
  FALLBACK_EXPANDED_TEXT,
  FALLBACK_PRIMARY,
  HIDE_SLIDE_MS,
  QUEUE_FLING_VELOCITY,
  SWIPE_HINT_TEXT,
  VERTICAL_DRAG_TRIGGER,
} from "./constants"
import { easeInCubic, easeOutCubic } from "./easing"
import { ExpansionController, type ExpansionEvent } from "./expansion"
import { createBrowserFrameClock, type FrameClock } from "./frameClock"
import { BounceHintController } from "./hints"
import { computeExpansionLayout, type ExpansionLayout, type LayoutPalette } from "./layout"
import { QueuePanelController } from "./queuePanel"
import { SwipeSwitchController, type SwipeSnapshot } from "./swipeSwitch"
import { isInEdgeDeadZone } from "./targets"
import { AnimationTimeline } from "./timeline"
import type {
  AdaptiveColors,
  Brightness,
  PlaybackSource,
  PlaybackTarget,
  PlayerQueue,
  PlayerSettings,
  RepeatMode,
  Track,
  Viewport,
} from "./types"

export interface PlayerContent {
  kind: "track" | "device"
  primaryText: string
  secondaryText: string | null
  imageUrl: string | null
  targetName: string
  /** The secondary line is the swipe hint rather than track data. */
  isHint: boolean
}

export interface QueuePanelFrame {
  progress: number
  visible: boolean
  left: number
  opacity: number
  queue: PlayerQueue | null
  isLoading: boolean
}

export interface PlayerNotification {
  id: number
  message: string
}

export interface PlayerFrame {
  visible: boolean
  layout: ExpansionLayout
  swipe: SwipeSnapshot
  canSwipe: boolean
  miniContent: PlayerContent | null
  peekContent: PlayerContent | null
  target: PlaybackTarget | null
  track: Track | null
  availableTargets: PlaybackTarget[]
  deviceSelectorOpen: boolean
  queuePanel: QueuePanelFrame
  bounceOffset: number
  welcomeOpacity: number
  hintActive: boolean
  hintsEnabled: boolean
  elapsed: number | null
  duration: number | null
  isPlaying: boolean
  shuffle: boolean
  repeatMode: RepeatMode
  notification: PlayerNotification | null
}

export interface ExpansionState {
  progress: number
  backgroundColor: string | null
  isExpanded: boolean
}

export type ReadonlyStore<T> = Omit<StoreApi<T>, "setState">

export interface PlayerTimings {
  expandMs: number
  collapseMs: number
  queuePanelMs: number
  queueRefreshIntervalMs: number
  hideSlideMs: number
  elapsedTickMs: number
  swipeCommitMs: number
  swipeCancelMs: number
  swipeCommitThreshold: number
  swipeVelocityThreshold: number
  edgeDeadZone: number
  singleBounceMs: number
  hintBounceMs: number
  hintRepeatMs: number
}

export interface PlayerControllerOptions {
  source: PlaybackSource
  settings?: PlayerSettings
  clock?: FrameClock
  viewport?: Viewport
  brightness?: Brightness
  adaptiveTheme?: boolean
  timings?: Partial<PlayerTimings>
}

interface ElapsedAnchor {
  targetId: string
  itemId: string | null
  reported: number
  base: number
  at: number
  playing: boolean
}

interface PendingSeek {
  targetId: string
  seconds: number
  baseline: number | null
  failed: boolean
}

const DEFAULT_VIEWPORT: Viewport = { width: 390, height: 844, topInset: 0, bottomInset: 0 }

/**
 * Owns the expansion, queue panel, swipe and hint controllers, wires them to
 * the playback source and publishes one frame per change.
 */
export class PlayerController {
  readonly expansionStore: ReadonlyStore<ExpansionState>
  readonly frameStore: ReadonlyStore<{ frame: PlayerFrame }>

  private readonly source: PlaybackSource
  private readonly clock: FrameClock
  private readonly expansion: ExpansionController
  private readonly queuePanel: QueuePanelController
  private readonly swipe: SwipeSwitchController
  private readonly hints: BounceHintController
  private readonly hideTimeline: AnimationTimeline
  private readonly writableExpansion: StoreApi<ExpansionState>
  private readonly writableFrame: StoreApi<{ frame: PlayerFrame }>
  private readonly hideSlideMs: number
  private readonly elapsedTickMs: number
  private readonly edgeDeadZone: number
  private readonly disposers: Array<() => void> = []

  private viewport: Viewport
  private brightness: Brightness
  private adaptiveTheme: boolean
  private imageUrl: string | null = null
  private adaptiveColors: AdaptiveColors | null = null
  private expandedBackground: string | null = null
  private queue: PlayerQueue | null = null
  private queueRequestId = 0
  private queueLoading = false
  private lastTargetId: string | null = null
  private elapsedAnchor: ElapsedAnchor | null = null
  private pendingSeek: PendingSeek | null = null
  private elapsedTimer: ReturnType<typeof setInterval> | null = null
  private notification: PlayerNotification | null = null
  private notificationSeq = 0
  private horizontalMode: "swipe" | "queue" | null = null
  private deviceSelectorOpen = false
  private disposed = false

  constructor(options: PlayerControllerOptions) {
    const timings = options.timings ?? {}
    this.source = options.source
    this.clock = options.clock ?? createBrowserFrameClock()
    this.viewport = options.viewport ?? DEFAULT_VIEWPORT
    this.brightness = options.brightness ?? "dark"
    this.adaptiveTheme = options.adaptiveTheme ?? true
    this.hideSlideMs = timings.hideSlideMs ?? HIDE_SLIDE_MS
    this.elapsedTickMs = timings.elapsedTickMs ?? ELAPSED_TICK_MS
    this.edgeDeadZone = timings.edgeDeadZone ?? EDGE_DEAD_ZONE

    this.expansion = new ExpansionController({
      clock: this.clock,
      expandDuration: timings.expandMs,
      collapseDuration: timings.collapseMs,
    })
    this.queuePanel = new QueuePanelController({
      clock: this.clock,
      duration: timings.queuePanelMs,
      refreshIntervalMs: timings.queueRefreshIntervalMs,
      onRefresh: () => this.loadQueue(),
    })
    this.hints = new BounceHintController({
      clock: this.clock,
      settings: options.settings ?? createPlayerSettings(),
      singleBounceMs: timings.singleBounceMs,
      hintBounceMs: timings.hintBounceMs,
      hintRepeatMs: timings.hintRepeatMs,
    })
    this.swipe = new SwipeSwitchController({
      clock: this.clock,
      source: this.source,
      commitDuration: timings.swipeCommitMs,
      cancelDuration: timings.swipeCancelMs,
      commitThreshold: timings.swipeCommitThreshold,
      velocityThreshold: timings.swipeVelocityThreshold,
      edgeDeadZone: this.edgeDeadZone,
      onSwitch: () => this.hints.markLearned(),
      onError: (error) => this.reportFailure("switch player", error),
    })
    this.hideTimeline = new AnimationTimeline({ clock: this.clock })

    this.writableExpansion = createStore<ExpansionState>()(() => ({
      progress: 0,
      backgroundColor: null,
      isExpanded: false,
    }))
    this.writableFrame = createStore<{ frame: PlayerFrame }>()(() => ({ frame: this.computeFrame() }))
    this.expansionStore = this.writableExpansion
    this.frameStore = this.writableFrame

    const recompute = () => this.recompute()
    this.disposers.push(
      this.expansion.subscribe(this.handleExpansionEvent),
      this.queuePanel.subscribe(recompute),
      this.swipe.subscribe(recompute),
      this.hints.subscribe(recompute),
      this.hideTimeline.subscribe(recompute),
      this.source.subscribe(this.handleSourceChange)
    )
    this.handleSourceChange()
  }

  get frame(): PlayerFrame {
    return this.writableFrame.getState().frame
  }

  get expansionProgress(): number {
    return this.expansion.progress
  }

  get isExpanded(): boolean {
    return this.expansion.isExpanded
  }

  get expandedBackgroundColor(): string | null {
    return this.expandedBackground
  }

  expand(): void {
    if (this.disposed) return
    this.expansion.expand()
  }

  collapse(): void {
    if (this.disposed) return
    this.expansion.collapse()
  }

  setViewport(viewport: Viewport): void {
    this.viewport = viewport
    this.recompute()
  }

  setBrightness(brightness: Brightness): void {
    if (brightness === this.brightness) return
    this.brightness = brightness
    this.recompute()
  }

  setAdaptiveTheme(enabled: boolean): void {
    if (enabled === this.adaptiveTheme) return
    this.adaptiveTheme = enabled
    if (!enabled) {
      this.adaptiveColors = null
    } else if (this.imageUrl) {
      this.requestAdaptiveColors(this.imageUrl)
    }
    this.recompute()
  }

  setHintsEnabled(enabled: boolean): void {
    this.hints.setHintsEnabled(enabled)
  }

  // Gestures

  handleTap(): void {
    if (this.disposed || this.expansion.isExpanded) return
    this.expansion.expand()
  }

  handleHorizontalDragStart(x: number, containerWidth: number): void {
    this.horizontalMode = null
    if (this.disposed) return

    if (this.expansion.isCollapsed) {
      if (this.source.getAvailableTargets().length < 2) return
      const tracked = this.swipe.dragStart({ x, containerWidth, screenWidth: this.viewport.width })
      if (tracked) this.horizontalMode = "swipe"
      return
    }

    if (this.expansion.progress === 1 && !isInEdgeDeadZone(x, this.viewport.width, this.edgeDeadZone)) {
      this.horizontalMode = "queue"
    }
  }

  handleHorizontalDragUpdate(dx: number): void {
    if (this.horizontalMode === "swipe") this.swipe.dragUpdate(dx)
  }

  /** `velocity` in px/s, negative leftward. */
  handleHorizontalDragEnd(velocity: number): void {
    const mode = this.horizontalMode
    this.horizontalMode = null
    if (mode === "swipe") {
      this.swipe.dragEnd(velocity)
      return
    }
    if (mode !== "queue") return
    if (velocity < -QUEUE_FLING_VELOCITY && !this.queuePanel.isOpen) {
      this.toggleQueue()
    } else if (velocity > QUEUE_FLING_VELOCITY && this.queuePanel.isOpen) {
      this.toggleQueue()
    }
  }

  /** `delta` is the vertical drag distance so far, negative upward. */
  handleVerticalDrag(delta: number): void {
    if (this.disposed) return
    if (delta < -VERTICAL_DRAG_TRIGGER && !this.expansion.isExpanded) {
      this.expansion.expand()
    } else if (delta > VERTICAL_DRAG_TRIGGER && this.expansion.isExpanded && !this.queuePanel.isOpen) {
      this.expansion.collapse()
    }
  }

  // Panels and overlays

  toggleQueuePanel(): void {
    if (this.disposed || !this.expansion.isExpanded) return
    if (this.toggleQueue()) this.hints.bounce()
  }

  /** Collapses the player and slides it away while the target list is showing. */
  openDeviceSelector(): void {
    if (this.disposed || this.deviceSelectorOpen) return
    this.deviceSelectorOpen = true
    this.expansion.collapse()
    this.hide()
    this.recompute()
  }

  /** Closes the target list, switching to `target` when one was picked. */
  closeDeviceSelector(target: PlaybackTarget | null = null): void {
    if (this.disposed || !this.deviceSelectorOpen) return
    this.deviceSelectorOpen = false
    if (target) {
      try {
        this.source.selectTarget(target)
      } catch (error) {
        this.reportFailure("switch player", error)
      }
    }
    this.show()
    this.notifyDeviceSelectorClosed()
    this.recompute()
  }

  notifyDeviceSelectorClosed(): void {
    if (this.disposed) return
    this.hints.bounce()
  }

  skipHints(): void {
    this.hints.skip()
  }

  hide(): void {
    if (this.disposed) return
    this.hideTimeline.animateTo(1, { duration: this.hideSlideMs, curve: easeInCubic })
  }

  show(): void {
    if (this.disposed) return
    this.hideTimeline.animateTo(0, { duration: this.hideSlideMs, curve: easeOutCubic })
  }

  dismissNotification(id: number): void {
    if (this.notification?.id !== id) return
    this.notification = null
    this.recompute()
  }

  // Transport

  playPause(): void {
    this.runCommand("play or pause", (targetId) => this.source.playPause(targetId))
  }

  stop(): void {
    this.runCommand("stop playback", (targetId) => this.source.stop(targetId))
  }

  skipNext(): void {
    this.runCommand("skip to the next track", (targetId) => this.source.skipNext(targetId))
  }

  skipPrevious(): void {
    this.runCommand("skip to the previous track", (targetId) => this.source.skipPrevious(targetId))
  }

  toggleShuffle(): void {
    this.runCommand("toggle shuffle", (targetId) => this.source.toggleShuffle(targetId), () => this.loadQueue())
  }

  cycleRepeat(): void {
    const current = this.queue?.repeatMode ?? "off"
    this.runCommand("change repeat mode", (targetId) => this.source.cycleRepeat(targetId, current), () => this.loadQueue())
  }

  setVolume(level: number): void {
    if (!Number.isFinite(level)) return
    this.runCommand("change the volume", (targetId) => this.source.setVolume(targetId, level))
  }

  seek(seconds: number): void {
    const target = this.source.getSelectedTarget()
    if (this.disposed || !target || !Number.isFinite(seconds)) return
    const duration = this.source.getCurrentTrack()?.duration ?? null
    const clamped = duration === null ? Math.max(0, seconds) : Math.min(duration, Math.max(0, seconds))
    const pending: PendingSeek = { targetId: target.id, seconds: clamped, baseline: target.elapsedTime, failed: false }
    this.pendingSeek = pending
    this.recompute()
    this.source
      .seek(target.id, clamped)
      .then(() => this.settleSeek(pending))
      .catch((error: unknown) => {
        pending.failed = true
        this.reportFailure("seek", error)
      })
  }

  dispose(): void {
    if (this.disposed) return
    this.disposed = true
    this.disposers.forEach((dispose) => dispose())
    this.disposers.length = 0
    this.stopElapsedTicker()
    this.expansion.dispose()
    this.queuePanel.dispose()
    this.swipe.dispose()
    this.hints.dispose()
    this.hideTimeline.dispose()
  }

  private readonly handleExpansionEvent = (event: ExpansionEvent): void => {
    switch (event.type) {
      case "expand-start":
        this.loadQueue()
        break
      case "collapse-start":
        this.queuePanel.pauseRefresh()
        this.queuePanel.reset()
        this.stopElapsedTicker()
        break
      case "dismissed":
        this.queuePanel.reset()
        break
      case "expanded":
        this.queuePanel.resumeRefresh()
        this.startElapsedTicker()
        break
      case "progress":
        break
    }
    this.recompute()
  }

  private readonly handleSourceChange = (): void => {
    if (this.disposed) return
    const target = this.source.getSelectedTarget()
    const track = this.source.getCurrentTrack()

    const targetId = target?.id ?? null
    if (targetId !== this.lastTargetId) {
      this.lastTargetId = targetId
      this.queue = null
      if (targetId !== null && this.expansion.isExpanded) this.loadQueue()
    }

    this.reconcileSeek(target)
    this.updateElapsedAnchor(target)

    const imageUrl = track ? this.source.getArtworkUrl(track, ARTWORK_SIZE) : null
    if (imageUrl !== this.imageUrl) {
      this.imageUrl = imageUrl
      if (imageUrl && this.adaptiveTheme) this.requestAdaptiveColors(imageUrl)
    }

    this.hints.maybeStartHints({ connected: this.source.isConnected(), hasSelectedTarget: target !== null })
    this.recompute()
  }

  private toggleQueue(): boolean {
    const opening = this.queuePanel.progress === 0
    const toggled = this.queuePanel.toggle()
    if (toggled && opening) this.loadQueue()
    return toggled
  }

  private runCommand(label: string, action: (targetId: string) => Promise<void>, after?: () => void): void {
    if (this.disposed) return
    const target = this.source.getSelectedTarget()
    if (!target) return
    action(target.id)
      .then(() => {
        if (!this.disposed) after?.()
      })
      .catch((error: unknown) => this.reportFailure(label, error))
  }

  private reportFailure(label: string, error: unknown): void {
    const msg = error instanceof Error ? error.message : String(error)
    console.warn(`[player] ${label} failed: ${msg}`)
    if (this.disposed) return
    this.notification = { id: ++this.notificationSeq, message: `Couldn't ${label}` }
    this.recompute()
  }

  private loadQueue(): void {
    if (this.disposed) return
    const target = this.source.getSelectedTarget()
    if (!target) {
      this.queue = null
      return
    }

    const requestId = ++this.queueRequestId
    this.queueLoading = true
    this.recompute()
    this.source
      .getQueue(target.id)
      .then((queue) => {
        if (this.disposed || requestId !== this.queueRequestId) return
        this.queue = queue
      })
      .catch((error: unknown) => {
        const msg = error instanceof Error ? error.message : String(error)
        console.warn(`[player] failed to load queue for target ${target.id}: ${msg}`)
      })
      .finally(() => {
        if (this.disposed || requestId !== this.queueRequestId) return
        this.queueLoading = false
        this.recompute()
      })
  }

  private requestAdaptiveColors(imageUrl: string): void {
    this.source
      .extractAdaptiveColors(imageUrl)
      .then((colors) => {
        // Drop responses for artwork that is no longer showing.
        if (this.disposed || this.imageUrl !== imageUrl || !this.adaptiveTheme) return
        this.adaptiveColors = colors
        this.recompute()
      })
      .catch((error: unknown) => {
        const msg = error instanceof Error ? error.message : String(error)
        console.warn(`[player] adaptive colours failed for ${imageUrl}: ${msg}`)
      })
  }

  private reconcileSeek(target: PlaybackTarget | null): void {
    const pending = this.pendingSeek
    if (!pending) return
    if (!target || target.id !== pending.targetId || target.elapsedTime !== pending.baseline || pending.failed) {
      this.pendingSeek = null
    }
  }

  /**
   * A confirmed seek whose position was not reported back (for instance a
   * seek to the position already reported) continues from the seeked point.
   */
  private settleSeek(pending: PendingSeek): void {
    if (this.disposed || this.pendingSeek !== pending) return
    this.pendingSeek = null
    const target = this.source.getSelectedTarget()
    if (target && target.id === pending.targetId && target.elapsedTime !== null) {
      this.elapsedAnchor = {
        targetId: target.id,
        itemId: target.currentItemId,
        reported: target.elapsedTime,
        base: pending.seconds,
        at: this.clock.now(),
        playing: target.state === "playing",
      }
    }
    this.recompute()
  }

  private updateElapsedAnchor(target: PlaybackTarget | null): void {
    if (!target || target.elapsedTime === null) {
      this.elapsedAnchor = null
      return
    }

    const now = this.clock.now()
    const playing = target.state === "playing"
    const anchor = this.elapsedAnchor
    const sameReport = anchor !== null &&
      anchor.targetId === target.id &&
      anchor.itemId === target.currentItemId &&
      anchor.reported === target.elapsedTime

    if (anchor && sameReport) {
      // Play state flipped without a fresh position: continue from where the
      // readout currently is.
      if (anchor.playing !== playing) {
        this.elapsedAnchor = { ...anchor, base: this.anchorElapsed(anchor, now), at: now, playing }
      }
      return
    }

    this.elapsedAnchor = {
      targetId: target.id,
      itemId: target.currentItemId,
      reported: target.elapsedTime,
      base: target.elapsedTime,
      at: now,
      playing,
    }
  }

  private anchorElapsed(anchor: ElapsedAnchor, now: number): number {
    return anchor.base + (anchor.playing ? Math.max(0, now - anchor.at) / 1000 : 0)
  }

  private currentElapsed(target: PlaybackTarget | null, duration: number | null): number | null {
    if (!target) return null
    let elapsed: number | null = null
    if (this.pendingSeek && this.pendingSeek.targetId === target.id) {
      elapsed = this.pendingSeek.seconds
    } else if (this.elapsedAnchor && this.elapsedAnchor.targetId === target.id) {
      elapsed = this.anchorElapsed(this.elapsedAnchor, this.clock.now())
    }
    if (elapsed === null) return null
    return duration === null ? elapsed : Math.min(duration, elapsed)
  }

  private startElapsedTicker(): void {
    this.stopElapsedTicker()
    this.elapsedTimer = setInterval(() => this.recompute(), this.elapsedTickMs)
  }

  private stopElapsedTicker(): void {
    if (this.elapsedTimer === null) return
    clearInterval(this.elapsedTimer)
    this.elapsedTimer = null
  }

  private palette(): LayoutPalette {
    const scheme = this.adaptiveColors ? this.adaptiveColors[this.brightness] : null
    return {
      collapsedBackground: scheme?.primaryContainer ?? FALLBACK_COLLAPSED_BG,
      expandedBackground: scheme?.surface ?? FALLBACK_EXPANDED_BG,
      collapsedText: scheme?.onPrimaryContainer ?? FALLBACK_COLLAPSED_TEXT,
      expandedText: scheme?.onSurface ?? FALLBACK_EXPANDED_TEXT,
      primary: scheme?.primary ?? FALLBACK_PRIMARY,
    }
  }

  private contentFor(target: PlaybackTarget, track: Track | null, allowHint: boolean): PlayerContent {
    if (track) {
      return {
        kind: "track",
        primaryText: track.title,
        secondaryText: track.artist || null,
        imageUrl: this.source.getArtworkUrl(track, ARTWORK_SIZE),
        targetName: target.name,
        isHint: false,
      }
    }
    const showHint = allowHint && this.hints.snapshot.hintsEnabled && this.source.getAvailableTargets().length > 1
    return {
      kind: "device",
      primaryText: target.name,
      secondaryText: showHint ? SWIPE_HINT_TEXT : null,
      imageUrl: null,
      targetName: target.name,
      isHint: showHint,
    }
  }

  private computeFrame(): PlayerFrame {
    const target = this.source.getSelectedTarget()
    const track = this.source.getCurrentTrack()
    const palette = this.palette()

    if (this.adaptiveColors) {
      this.expandedBackground = palette.expandedBackground
    } else if (this.expandedBackground === null && target) {
      this.expandedBackground = FALLBACK_EXPANDED_BG
    }

    const hints = this.hints.snapshot
    const layout = computeExpansionLayout({
      t: this.expansion.progress,
      viewport: this.viewport,
      palette,
      queueProgress: this.queuePanel.progress,
      bounceOffset: hints.bounceOffset,
      hideProgress: this.hideTimeline.value,
    })
    const swipe = this.swipe.snapshot
    const duration = track?.duration ?? null

    return {
      visible: target !== null,
      layout,
      swipe,
      canSwipe: this.expansion.isCollapsed && this.source.getAvailableTargets().length > 1,
      miniContent: target ? this.contentFor(target, track, true) : null,
      peekContent: swipe.peekTarget ? this.contentFor(swipe.peekTarget, swipe.peekTrack, false) : null,
      target,
      track,
      availableTargets: this.source.getAvailableTargets(),
      deviceSelectorOpen: this.deviceSelectorOpen,
      queuePanel: {
        progress: this.queuePanel.progress,
        visible: layout.queuePanel.visible,
        left: layout.queuePanel.left,
        opacity: layout.queuePanel.opacity,
        queue: this.queue,
        isLoading: this.queueLoading,
      },
      bounceOffset: hints.bounceOffset,
      welcomeOpacity: hints.welcomeOpacity,
      hintActive: hints.isActive,
      hintsEnabled: hints.hintsEnabled,
      elapsed: this.currentElapsed(target, duration),
      duration,
      isPlaying: target?.state === "playing",
      shuffle: this.queue?.shuffle ?? false,
      repeatMode: this.queue?.repeatMode ?? "off",
      notification: this.notification,
    }
  }

  private recompute(): void {
    if (this.disposed) return
    this.writableFrame.setState({ frame: this.computeFrame() })

    const next: ExpansionState = {
      progress: this.expansion.progress,
      backgroundColor: this.expandedBackground,
      isExpanded: this.expansion.isExpanded,
    }
    const current = this.writableExpansion.getState()
    if (
      current.progress !== next.progress ||
      current.backgroundColor !== next.backgroundColor ||
      current.isExpanded !== next.isExpanded
    ) {
      this.writableExpansion.setState(next)
    }
  }
}
