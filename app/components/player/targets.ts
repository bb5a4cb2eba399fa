import type { PlaybackTarget } from "./types"

export type SwipeDirection = "next" | "previous"

function compareNames(a: PlaybackTarget, b: PlaybackTarget): number {
  const left = a.name.toLowerCase()
  const right = b.name.toLowerCase()
  if (left < right) return -1
  if (left > right) return 1
  return 0
}

/** Available targets ordered by lowercase name; ties keep their input order. */
export function sortTargets(targets: readonly PlaybackTarget[]): PlaybackTarget[] {
  return targets.filter((target) => target.available).sort(compareNames)
}

/** A leftward drag (negative offset) reveals the next target. */
export function directionForOffset(offset: number): SwipeDirection {
  return offset < 0 ? "next" : "previous"
}

/**
 * The neighbour of the selected target in the sorted list, wrapping at both
 * ends. Returns null when the selection is missing or has no other target
 * to swap with.
 */
export function adjacentTarget(
  targets: readonly PlaybackTarget[],
  selectedId: string,
  direction: SwipeDirection
): PlaybackTarget | null {
  if (targets.length < 2) return null
  const index = targets.findIndex((target) => target.id === selectedId)
  if (index === -1) return null

  const step = direction === "next" ? 1 : -1
  const candidate = targets[(index + step + targets.length) % targets.length]
  return candidate.id === selectedId ? null : candidate
}

export function isInEdgeDeadZone(x: number, screenWidth: number, deadZone: number): boolean {
  return x < deadZone || x > screenWidth - deadZone
}
