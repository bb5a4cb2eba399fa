"use client"

import { useEffect, useRef } from "react"
import { useDrag } from "@use-gesture/react"
import DeviceSelector from "./player/DeviceSelector"
import MiniPlayerContent from "./player/MiniPlayerContent"
import QueuePanel from "./player/QueuePanel"
import { BOTTOM_NAV_HEIGHT, COLLAPSED_HEIGHT } from "./player/constants"
import { lerp } from "./player/easing"
import type { PlayerController } from "./player/playerController"
import type { Brightness, PlaybackSource } from "./player/types"
import {
  DeviceIcon,
  formatTime,
  MinimizePlayerIcon,
  PlayPauseIcon,
  QueueIcon,
  RepeatIcon,
  ShuffleIcon,
  SkipIcon,
} from "./player/ui"
import { useExpansionState, usePlayerController, usePlayerFrame } from "./player/usePlayerController"

const NOTIFICATION_MS = 4000

export default function ExpandablePlayer({
  source,
  brightness,
  adaptiveTheme,
}: {
  source: PlaybackSource
  brightness?: Brightness
  adaptiveTheme?: boolean
}) {
  const controller = usePlayerController(source, { brightness, adaptiveTheme })
  if (!controller) return null
  return (
    <>
      <PlayerSurface controller={controller} />
      <DeviceSelectorSheet controller={controller} />
      <BottomNav controller={controller} />
    </>
  )
}

function DeviceSelectorSheet({ controller }: { controller: PlayerController }) {
  const frame = usePlayerFrame(controller)
  if (!frame.deviceSelectorOpen) return null
  return (
    <DeviceSelector
      targets={frame.availableTargets}
      selectedId={frame.target?.id ?? null}
      hintsEnabled={frame.hintsEnabled}
      onSelect={(target) => controller.closeDeviceSelector(target)}
      onClose={() => controller.closeDeviceSelector()}
      onHintsChange={(enabled) => controller.setHintsEnabled(enabled)}
    />
  )
}

function BottomNav({ controller }: { controller: PlayerController }) {
  const expansion = useExpansionState(controller)
  return (
    <nav
      className="fixed inset-x-0 bottom-0 z-[60] flex items-center justify-around border-t border-zinc-800 bg-zinc-950 text-xs text-zinc-400"
      style={{
        height: BOTTOM_NAV_HEIGHT,
        backgroundColor: expansion.isExpanded && expansion.backgroundColor ? expansion.backgroundColor : undefined,
      }}
    >
      <span className="text-zinc-100">Home</span>
      <span>Library</span>
      <button type="button" onClick={() => controller.openDeviceSelector()} className="flex items-center gap-1.5">
        <DeviceIcon className="h-4 w-4" />
        Speakers
      </button>
    </nav>
  )
}

function PlayerSurface({ controller }: { controller: PlayerController }) {
  const frame = usePlayerFrame(controller)
  const surfaceRef = useRef<HTMLDivElement>(null)
  const notification = frame.notification

  useEffect(() => {
    if (!notification) return
    const timer = setTimeout(() => controller.dismissNotification(notification.id), NOTIFICATION_MS)
    return () => clearTimeout(timer)
  }, [controller, notification])

  const bind = useDrag(
    ({ tap, first, last, axis, initial: [startX], delta: [dx], movement: [, my], velocity: [vx], direction: [dirX] }) => {
      if (tap) {
        controller.handleTap()
        return
      }
      if (axis === "y") {
        controller.handleVerticalDrag(my)
        return
      }
      if (axis !== "x") return
      if (first) {
        controller.handleHorizontalDragStart(startX, surfaceRef.current?.getBoundingClientRect().width ?? 0)
      }
      controller.handleHorizontalDragUpdate(dx)
      // use-gesture reports speed in px/ms without a sign.
      if (last) controller.handleHorizontalDragEnd(vx * dirX * 1000)
    },
    { filterTaps: true, threshold: 10, axis: "lock" }
  )

  if (!frame.visible) return null

  const { layout, swipe, miniContent, peekContent } = frame
  const { surface, artwork, title, artist, controls } = layout
  const t = layout.t
  const collapsed = t === 0
  const expandedOpacity = layout.expandedControlsOpacity
  const swipeShift = swipe.offset * surface.width
  const rowWidth = controls.skipButtonSize * 2 + controls.playButtonContainerSize + controls.spacing * 2
  const rowPaddingRight = lerp(12, Math.max(0, (surface.width - rowWidth) / 2), t)

  return (
    <>
      <div
        ref={surfaceRef}
        {...bind()}
        className="fixed z-[70] touch-none select-none overflow-hidden"
        style={{
          left: surface.left,
          bottom: surface.bottom,
          width: surface.width,
          height: surface.height,
          borderRadius: surface.borderRadius,
          backgroundColor: surface.backgroundColor,
          boxShadow: `0 ${surface.elevation}px ${surface.elevation * 3}px rgba(0, 0, 0, 0.35)`,
          color: layout.textColor,
        }}
      >
        {collapsed && miniContent ? (
          <>
            <MiniPlayerContent
              content={miniContent}
              left={swipeShift}
              width={surface.width}
              textColor={layout.textColor}
              textWidth={title.width}
            />
            {peekContent && swipe.peekDirection && (
              <MiniPlayerContent
                content={peekContent}
                left={swipeShift + (swipe.peekDirection === "next" ? surface.width : -surface.width)}
                width={surface.width}
                textColor={layout.textColor}
                textWidth={title.width}
              />
            )}
          </>
        ) : (
          <>
            <div
              className="absolute flex items-center justify-center overflow-hidden bg-black/20"
              style={{
                left: artwork.left,
                top: artwork.top,
                width: artwork.size,
                height: artwork.size,
                borderRadius: artwork.borderRadius,
                boxShadow: `0 8px ${artwork.shadowBlur}px rgba(0, 0, 0, ${artwork.shadowOpacity})`,
              }}
            >
              {miniContent?.imageUrl ? (
                // eslint-disable-next-line @next/next/no-img-element
                <img src={miniContent.imageUrl} alt="" className="h-full w-full object-cover" draggable={false} />
              ) : (
                <DeviceIcon className="h-1/3 w-1/3 opacity-80" />
              )}
            </div>
            <p
              className="absolute truncate font-semibold"
              style={{ left: title.left, top: title.top, width: title.width, fontSize: title.fontSize }}
            >
              {miniContent?.primaryText}
            </p>
            <p
              className="absolute truncate opacity-75"
              style={{ left: artist.left, top: artist.top, width: artist.width, fontSize: artist.fontSize }}
            >
              {miniContent?.secondaryText}
            </p>
          </>
        )}

        {!collapsed && (
          <ExpandedDetails controller={controller} />
        )}

        <div
          className="absolute left-0 right-0 flex items-center justify-end"
          style={{ top: controls.top, paddingRight: rowPaddingRight, gap: controls.spacing, opacity: controls.opacity }}
          onPointerDown={(event) => event.stopPropagation()}
        >
          {expandedOpacity > 0 && (
            <button
              type="button"
              onClick={() => controller.toggleShuffle()}
              style={{ opacity: expandedOpacity * (frame.shuffle ? 1 : 0.5) }}
              aria-label="Toggle shuffle"
            >
              <ShuffleIcon />
            </button>
          )}
          <button type="button" onClick={() => controller.skipPrevious()} aria-label="Previous track">
            <SkipIcon direction="previous" size={controls.skipButtonSize} />
          </button>
          <button
            type="button"
            onClick={() => controller.playPause()}
            className="flex items-center justify-center rounded-full"
            style={{
              width: controls.playButtonContainerSize,
              height: controls.playButtonContainerSize,
              backgroundColor: expandedOpacity > 0 ? layout.primaryColor : "transparent",
              color: expandedOpacity > 0 ? surface.backgroundColor : layout.textColor,
            }}
            aria-label={frame.isPlaying ? "Pause" : "Play"}
          >
            <PlayPauseIcon playing={frame.isPlaying} size={controls.playButtonSize} />
          </button>
          <button type="button" onClick={() => controller.skipNext()} aria-label="Next track">
            <SkipIcon direction="next" size={controls.skipButtonSize} />
          </button>
          {expandedOpacity > 0 && (
            <button
              type="button"
              onClick={() => controller.cycleRepeat()}
              style={{ opacity: expandedOpacity * (frame.repeatMode === "off" ? 0.5 : 1) }}
              aria-label="Change repeat mode"
            >
              <RepeatIcon mode={frame.repeatMode} />
            </button>
          )}
        </div>

        {frame.queuePanel.visible && (
          <QueuePanel
            panel={frame.queuePanel}
            width={surface.width}
            textColor={layout.textColor}
            backgroundColor={surface.backgroundColor}
            topInset={0}
            onClose={() => controller.toggleQueuePanel()}
          />
        )}
      </div>

      {frame.welcomeOpacity > 0 && (
        <div
          className="pointer-events-auto fixed left-4 right-4 z-[71] rounded-xl bg-zinc-900/95 px-4 py-3 text-sm text-zinc-100 shadow-xl"
          style={{ bottom: surface.bottom + COLLAPSED_HEIGHT + 12, opacity: frame.welcomeOpacity }}
        >
          <p>Swipe the player sideways to switch between your speakers.</p>
          <button
            type="button"
            onClick={() => controller.skipHints()}
            className="mt-2 h-7 rounded-md border border-zinc-700 px-2.5 text-xs text-zinc-300 hover:border-zinc-500 hover:text-white"
          >
            Got it
          </button>
        </div>
      )}

      {notification && (
        <div className="fixed left-1/2 top-4 z-[80] -translate-x-1/2 rounded-lg border border-red-500/40 bg-zinc-950 px-3 py-2 text-sm text-red-200 shadow-xl">
          {notification.message}
        </div>
      )}
    </>
  )
}

function ExpandedDetails({ controller }: { controller: PlayerController }) {
  const frame = usePlayerFrame(controller)
  const { layout, track, target } = frame
  const duration = frame.duration ?? 0
  const elapsed = frame.elapsed ?? 0

  return (
    <>
      <div
        className="absolute left-0 right-0 flex items-center justify-between px-4"
        style={{ top: 0, height: 48, opacity: layout.expandedControlsOpacity }}
        onPointerDown={(event) => event.stopPropagation()}
      >
        <button type="button" onClick={() => controller.collapse()} aria-label="Minimize player">
          <MinimizePlayerIcon />
        </button>
        <button
          type="button"
          onClick={() => controller.openDeviceSelector()}
          className="truncate text-xs uppercase tracking-wide opacity-70 hover:opacity-100"
          aria-label="Choose speaker"
        >
          {target?.name}
        </button>
        <button type="button" onClick={() => controller.toggleQueuePanel()} aria-label="Show queue">
          <QueueIcon />
        </button>
      </div>

      {track?.album && (
        <p
          className="absolute left-8 right-8 truncate text-sm opacity-60"
          style={{ top: layout.album.top, opacity: layout.album.opacity * 0.6 }}
        >
          {track.album.name}
        </p>
      )}

      <div
        className="absolute left-8 right-8"
        style={{ top: layout.progressBar.top, opacity: layout.progressBar.opacity }}
        onPointerDown={(event) => event.stopPropagation()}
      >
        <input
          type="range"
          min={0}
          max={duration}
          step={1}
          value={Math.min(elapsed, duration)}
          disabled={duration === 0}
          onChange={(event) => controller.seek(Number(event.target.value))}
          className="w-full"
          style={{ accentColor: layout.primaryColor }}
          aria-label="Seek"
        />
        <div className="flex justify-between text-xs tabular-nums opacity-60">
          <span>{formatTime(frame.elapsed)}</span>
          <span>{formatTime(frame.duration)}</span>
        </div>
      </div>

      <div
        className="absolute left-8 right-8 flex items-center gap-3"
        style={{ top: layout.volume.top, opacity: layout.volume.opacity }}
        onPointerDown={(event) => event.stopPropagation()}
      >
        <input
          type="range"
          min={0}
          max={100}
          step={1}
          value={target?.volume ?? 0}
          disabled={target?.volume === null}
          onChange={(event) => controller.setVolume(Number(event.target.value))}
          className="flex-1"
          style={{ accentColor: layout.primaryColor }}
          aria-label="Volume"
        />
        <button
          type="button"
          onClick={() => controller.stop()}
          className="h-7 rounded-md border border-white/20 px-2.5 text-xs"
        >
          Stop
        </button>
      </div>
    </>
  )
}
