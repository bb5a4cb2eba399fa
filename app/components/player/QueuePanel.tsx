"use client"

import type { QueuePanelFrame } from "./playerController"
import type { RepeatMode } from "./types"
import { formatTime } from "./ui"

const REPEAT_LABELS: Record<RepeatMode, string> = {
  off: "Repeat off",
  all: "Repeat all",
  one: "Repeat one",
}

function queuePositionLabel(currentIndex: number | null, total: number): string {
  const current = currentIndex === null ? 0 : currentIndex + 1
  return `${current}/${Math.max(0, total)}`
}

export default function QueuePanel({
  panel,
  width,
  textColor,
  backgroundColor,
  topInset,
  onClose,
}: {
  panel: QueuePanelFrame
  width: number
  textColor: string
  backgroundColor: string
  topInset: number
  onClose: () => void
}) {
  const queue = panel.queue
  const items = queue?.items ?? []

  return (
    <section
      className="absolute top-0 bottom-0 flex flex-col overflow-hidden"
      style={{ left: panel.left, width, opacity: panel.opacity, color: textColor, backgroundColor, paddingTop: topInset }}
      aria-label="Queue"
    >
      <div className="flex items-center justify-between border-b border-white/10 px-4 py-3">
        <div className="flex items-center gap-2">
          <h3 className="text-base font-semibold">Queue</h3>
          <span className="text-sm font-medium tabular-nums opacity-70">
            {queuePositionLabel(queue?.currentIndex ?? null, items.length)}
          </span>
          {queue && (
            <span className="text-xs opacity-50">
              {queue.shuffle ? "Shuffle on" : "Shuffle off"} · {REPEAT_LABELS[queue.repeatMode]}
            </span>
          )}
        </div>
        <button
          type="button"
          onClick={onClose}
          className="h-7 rounded-md border border-white/20 px-2.5 text-xs opacity-80 hover:opacity-100"
        >
          Close
        </button>
      </div>
      {panel.isLoading && items.length === 0 ? (
        <div className="px-4 py-5 text-sm opacity-60">Loading queue…</div>
      ) : items.length === 0 ? (
        <div className="px-4 py-5 text-sm opacity-60">Queue is empty.</div>
      ) : (
        <ol className="flex-1 overflow-y-auto px-2 py-2">
          {items.map((item, index) => {
            const isCurrent = index === queue?.currentIndex
            const cover = item.track.imageUrl ?? item.track.album?.imageUrl ?? null
            return (
              <li
                key={item.id}
                className={`mb-1 flex items-center gap-2.5 rounded-lg px-3 py-2 ${isCurrent ? "bg-white/15" : "bg-white/5"}`}
              >
                <div className="h-9 w-9 shrink-0 overflow-hidden rounded bg-black/30">
                  {cover ? (
                    // eslint-disable-next-line @next/next/no-img-element
                    <img src={cover} alt="" className="h-full w-full object-cover" />
                  ) : (
                    <div className="flex h-full w-full items-center justify-center text-[11px] opacity-50">♪</div>
                  )}
                </div>
                <div className="min-w-0 flex-1">
                  <p className={`truncate text-base ${isCurrent ? "font-semibold" : ""}`}>
                    {index + 1}. {item.track.title}
                  </p>
                  <p className="truncate text-sm opacity-60">{item.track.artist || "Unknown Artist"}</p>
                </div>
                <span className="shrink-0 text-xs tabular-nums opacity-50">{formatTime(item.track.duration)}</span>
              </li>
            )
          })}
        </ol>
      )}
    </section>
  )
}
