"use client"

import { useEffect, useRef, useState } from "react"
import { useStore } from "zustand"
import { PlayerController, type ExpansionState, type PlayerControllerOptions, type PlayerFrame } from "./playerController"
import type { PlaybackSource, Viewport } from "./types"

function readViewport(): Viewport {
  return {
    width: window.innerWidth,
    height: window.innerHeight,
    topInset: 0,
    bottomInset: 0,
  }
}

/**
 * Creates a controller for `source` once mounted and disposes it on unmount.
 * Returns null during the first render and on the server.
 */
export function usePlayerController(
  source: PlaybackSource,
  options: Omit<PlayerControllerOptions, "source" | "viewport"> = {}
): PlayerController | null {
  const [controller, setController] = useState<PlayerController | null>(null)
  const optionsRef = useRef(options)
  optionsRef.current = options

  useEffect(() => {
    const next = new PlayerController({ ...optionsRef.current, source, viewport: readViewport() })
    setController(next)

    const handleResize = () => next.setViewport(readViewport())
    window.addEventListener("resize", handleResize)
    return () => {
      window.removeEventListener("resize", handleResize)
      next.dispose()
    }
  }, [source])

  const { brightness, adaptiveTheme } = options
  useEffect(() => {
    if (!controller) return
    if (brightness) controller.setBrightness(brightness)
    if (adaptiveTheme !== undefined) controller.setAdaptiveTheme(adaptiveTheme)
  }, [controller, brightness, adaptiveTheme])

  return controller
}

export function usePlayerFrame(controller: PlayerController): PlayerFrame {
  return useStore(controller.frameStore, (state) => state.frame)
}

/** Expansion state for chrome outside the player, such as the bottom nav. */
export function useExpansionState(controller: PlayerController): ExpansionState {
  return useStore(controller.expansionStore)
}
