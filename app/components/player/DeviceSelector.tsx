"use client"

import type { PlaybackTarget } from "./types"
import { DeviceIcon } from "./ui"

const STATE_LABELS: Record<PlaybackTarget["state"], string> = {
  idle: "Idle",
  playing: "Playing",
  paused: "Paused",
}

export default function DeviceSelector({
  targets,
  selectedId,
  hintsEnabled,
  onSelect,
  onClose,
  onHintsChange,
}: {
  targets: PlaybackTarget[]
  selectedId: string | null
  hintsEnabled: boolean
  onSelect: (target: PlaybackTarget) => void
  onClose: () => void
  onHintsChange: (enabled: boolean) => void
}) {
  return (
    <div className="fixed inset-0 z-[75] flex flex-col justify-end bg-black/60" onClick={onClose}>
      <section
        className="max-h-[70vh] overflow-y-auto rounded-t-2xl border-t border-zinc-800 bg-zinc-950 px-3 pt-3 pb-20 text-zinc-100"
        onClick={(event) => event.stopPropagation()}
        aria-label="Speakers"
      >
        <div className="mb-2 flex items-center justify-between px-1">
          <h3 className="text-base font-semibold">Play on</h3>
          <button
            type="button"
            onClick={onClose}
            className="h-7 rounded-md border border-zinc-700 px-2.5 text-xs text-zinc-300 hover:border-zinc-500 hover:text-white"
          >
            Close
          </button>
        </div>
        {targets.length === 0 ? (
          <p className="px-1 py-4 text-sm text-zinc-500">No speakers available.</p>
        ) : (
          <ul>
            {targets.map((target) => {
              const selected = target.id === selectedId
              return (
                <li key={target.id}>
                  <button
                    type="button"
                    onClick={() => onSelect(target)}
                    className={`mb-1 flex w-full items-center gap-3 rounded-lg px-3 py-2.5 text-left ${selected ? "bg-white/15" : "bg-white/5 hover:bg-white/10"}`}
                  >
                    <DeviceIcon className="h-5 w-5 shrink-0 opacity-80" />
                    <span className={`min-w-0 flex-1 truncate ${selected ? "font-semibold" : ""}`}>{target.name}</span>
                    <span className="shrink-0 text-xs text-zinc-500">{STATE_LABELS[target.state]}</span>
                  </button>
                </li>
              )
            })}
          </ul>
        )}
        <label className="mt-3 flex items-center gap-2 px-1 text-sm text-zinc-400">
          <input
            type="checkbox"
            checked={hintsEnabled}
            onChange={(event) => onHintsChange(event.target.checked)}
          />
          Show swipe hint on the mini player
        </label>
      </section>
    </div>
  )
}
