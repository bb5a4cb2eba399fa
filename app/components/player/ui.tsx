"use client"

export function formatTime(seconds: number | null): string {
  if (seconds === null || !Number.isFinite(seconds) || seconds < 0) return "0:00"
  const m = Math.floor(seconds / 60)
  const s = Math.floor(seconds % 60)
  return `${m}:${s.toString().padStart(2, "0")}`
}

export function PlayPauseIcon({ playing, size }: { playing: boolean; size: number }) {
  const barWidth = Math.max(3, Math.round(size * 0.14))
  const barHeight = Math.round(size * 0.5)

  if (playing) {
    return (
      <span className="inline-flex items-center" style={{ gap: barWidth }}>
        <span className="rounded-[1px] bg-current" style={{ width: barWidth, height: barHeight }} />
        <span className="rounded-[1px] bg-current" style={{ width: barWidth, height: barHeight }} />
      </span>
    )
  }

  const half = Math.round(size * 0.28)
  return (
    <span
      className="ml-[1px] block h-0 w-0 border-y-transparent border-l-current"
      style={{ borderTopWidth: half, borderBottomWidth: half, borderLeftWidth: Math.round(half * 1.6) }}
    />
  )
}

export function MinimizePlayerIcon() {
  return (
    <svg
      viewBox="0 0 24 24"
      fill="none"
      stroke="currentColor"
      strokeWidth="2.25"
      strokeLinecap="round"
      strokeLinejoin="round"
      className="h-5 w-5"
      aria-hidden="true"
    >
      <path d="M6 9l6 6 6-6" />
    </svg>
  )
}

export function QueueIcon() {
  return (
    <svg
      viewBox="0 0 24 24"
      fill="none"
      stroke="currentColor"
      strokeWidth="2"
      strokeLinecap="round"
      strokeLinejoin="round"
      className="h-5 w-5"
      aria-hidden="true"
    >
      <path d="M7 7h11" />
      <path d="M7 12h11" />
      <path d="M7 17h11" />
      <circle cx="4" cy="7" r="0.9" fill="currentColor" stroke="none" />
      <circle cx="4" cy="12" r="0.9" fill="currentColor" stroke="none" />
      <circle cx="4" cy="17" r="0.9" fill="currentColor" stroke="none" />
    </svg>
  )
}

/** Generic speaker glyph shown in place of artwork when a target has no track. */
export function DeviceIcon({ className = "h-6 w-6" }: { className?: string }) {
  return (
    <svg
      viewBox="0 0 24 24"
      fill="none"
      stroke="currentColor"
      strokeWidth="1.75"
      strokeLinecap="round"
      strokeLinejoin="round"
      className={className}
      aria-hidden="true"
    >
      <rect x="5" y="2" width="14" height="20" rx="2" />
      <circle cx="12" cy="14" r="4" />
      <circle cx="12" cy="6" r="1" fill="currentColor" stroke="none" />
    </svg>
  )
}

export function ShuffleIcon({ className = "h-5 w-5" }: { className?: string }) {
  return (
    <svg
      viewBox="0 0 24 24"
      fill="none"
      stroke="currentColor"
      strokeWidth="2"
      strokeLinecap="round"
      strokeLinejoin="round"
      className={className}
      aria-hidden="true"
    >
      <path d="M16 3h5v5M4 20L21 3M21 16v5h-5M15 15l6 6M4 4l5 5" />
    </svg>
  )
}

export function SkipIcon({ direction, size }: { direction: "previous" | "next"; size: number }) {
  const path = direction === "previous"
    ? "M6 6h2v12H6V6zm3.5 6l8.5 6V6l-8.5 6z"
    : "M6 18l8.5-6L6 6v12zm9-12v12h2V6h-2z"
  return (
    <svg viewBox="0 0 24 24" fill="currentColor" width={size} height={size} aria-hidden="true">
      <path d={path} />
    </svg>
  )
}

export function RepeatIcon({
  mode,
  className = "h-5 w-5",
}: {
  mode: "off" | "all" | "one"
  className?: string
}) {
  return (
    <svg
      viewBox="0 0 24 24"
      fill="none"
      stroke="currentColor"
      strokeWidth="2"
      strokeLinecap="round"
      strokeLinejoin="round"
      className={className}
      aria-hidden="true"
    >
      <path d="M17 1l4 4-4 4" />
      <path d="M3 11V9a4 4 0 0 1 4-4h14" />
      <path d="M7 23l-4-4 4-4" />
      <path d="M21 13v2a4 4 0 0 1-4 4H3" />
      {mode === "one" && (
        <text x="12" y="15" fontSize="10" fontWeight="700" fill="currentColor" textAnchor="middle" stroke="none">
          1
        </text>
      )}
    </svg>
  )
}
