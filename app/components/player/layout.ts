import {
  BOTTOM_NAV_HEIGHT,
  COLLAPSED_ART_SIZE,
  COLLAPSED_BORDER_RADIUS,
  COLLAPSED_HEIGHT,
  COLLAPSED_MARGIN,
  EXPANDED_ART_MAX,
  EXPANDED_ART_MIN,
  EXPANDED_CONTENT_PADDING,
  EXPANDED_HEADER_HEIGHT,
  EXPANDED_TITLE_BLOCK,
  MINI_TEXT_GAP,
  VISIBLE_DETAILS_FROM,
  VISIBLE_EXPANDED_FROM,
} from "./constants"
import { lerpColor } from "./color"
import { clamp01, easeIn, lerp } from "./easing"
import type { Viewport } from "./types"

export interface LayoutPalette {
  collapsedBackground: string
  expandedBackground: string
  collapsedText: string
  expandedText: string
  primary: string
}

export interface LayoutInput {
  t: number
  viewport: Viewport
  palette: LayoutPalette
  queueProgress: number
  /** Upward offset of the collapsed surface, in px. */
  bounceOffset: number
  /** 0 = on screen, 1 = slid fully below the viewport. */
  hideProgress: number
}

export interface ExpansionLayout {
  t: number
  surface: {
    left: number
    width: number
    height: number
    bottom: number
    borderRadius: number
    elevation: number
    backgroundColor: string
  }
  artwork: {
    size: number
    left: number
    top: number
    borderRadius: number
    shadowOpacity: number
    shadowBlur: number
  }
  title: { fontSize: number; left: number; top: number; width: number }
  artist: { fontSize: number; left: number; top: number; width: number }
  album: { top: number; opacity: number }
  progressBar: { top: number; opacity: number }
  controls: {
    top: number
    skipButtonSize: number
    playButtonSize: number
    playButtonContainerSize: number
    spacing: number
    opacity: number
  }
  volume: { top: number; opacity: number }
  queuePanel: { left: number; width: number; opacity: number; visible: boolean }
  textColor: string
  primaryColor: string
  detailsOpacity: number
  expandedControlsOpacity: number
}

// Width reserved on the right of the mini player for its transport buttons.
const MINI_CONTROLS_WIDTH = 150
const HIDE_SLIDE_EXTRA = 20
// The hide slide and bounce only act on the collapsed surface; their weight
// fades to zero over the first part of the expansion.
const COLLAPSED_EFFECT_SPAN = 0.1

export function detailsOpacity(t: number): number {
  return clamp01((t - VISIBLE_DETAILS_FROM) / (1 - VISIBLE_DETAILS_FROM))
}

export function expandedControlsOpacity(t: number): number {
  const span = 1 - VISIBLE_EXPANDED_FROM
  return easeIn(Math.min(span, Math.max(0, t - VISIBLE_EXPANDED_FROM)) / span)
}

export function expandedArtSize(viewport: Viewport): number {
  const available = viewport.width - EXPANDED_CONTENT_PADDING * 2
  return Math.min(EXPANDED_ART_MAX, Math.max(EXPANDED_ART_MIN, available * 0.92))
}

export function computeExpansionLayout(input: LayoutInput): ExpansionLayout {
  const t = clamp01(input.t)
  const { viewport, palette } = input
  const bottomNavSpace = BOTTOM_NAV_HEIGHT + viewport.bottomInset

  const collapsedWidth = Math.max(0, viewport.width - COLLAPSED_MARGIN * 2)
  const collapsedBottom = bottomNavSpace + COLLAPSED_MARGIN
  const expandedHeight = Math.max(COLLAPSED_HEIGHT, viewport.height - bottomNavSpace)

  const collapsedWeight = 1 - clamp01(t / COLLAPSED_EFFECT_SPAN)
  const hideDistance = clamp01(input.hideProgress) * (COLLAPSED_HEIGHT + collapsedBottom + HIDE_SLIDE_EXTRA)
  const surfaceWidth = lerp(collapsedWidth, viewport.width, t)

  // Expanded targets
  const artSize = expandedArtSize(viewport)
  const artTop = viewport.topInset + EXPANDED_HEADER_HEIGHT + 16
  const titleTop = artTop + artSize + 28
  const artistTop = titleTop + EXPANDED_TITLE_BLOCK + 8
  const albumTop = artistTop + 24
  const progressTop = albumTop + 36
  const controlsTop = progressTop + 64
  const volumeTop = controlsTop + 88
  const expandedTextWidth = Math.max(0, viewport.width - EXPANDED_CONTENT_PADDING * 2)

  // Collapsed targets
  const miniTextLeft = COLLAPSED_ART_SIZE + MINI_TEXT_GAP
  const miniTextWidth = Math.max(0, collapsedWidth - COLLAPSED_ART_SIZE - MINI_CONTROLS_WIDTH)
  const miniControlsTop = (COLLAPSED_HEIGHT - 34) / 2 - 6

  const details = detailsOpacity(t)
  const expandedControls = expandedControlsOpacity(t)
  const queueProgress = clamp01(input.queueProgress)

  return {
    t,
    surface: {
      left: lerp(COLLAPSED_MARGIN, 0, t),
      width: surfaceWidth,
      height: lerp(COLLAPSED_HEIGHT, expandedHeight, t),
      bottom: lerp(collapsedBottom, bottomNavSpace, t) + (input.bounceOffset - hideDistance) * collapsedWeight,
      borderRadius: lerp(COLLAPSED_BORDER_RADIUS, 0, t),
      elevation: lerp(4, 0, t),
      backgroundColor: lerpColor(palette.collapsedBackground, palette.expandedBackground, t),
    },
    artwork: {
      size: lerp(COLLAPSED_ART_SIZE, artSize, t),
      left: lerp(0, (viewport.width - artSize) / 2, t),
      top: lerp(0, artTop, t),
      borderRadius: lerp(0, 12, t),
      shadowOpacity: 0.3 * t * details,
      shadowBlur: 24 * t,
    },
    title: {
      fontSize: lerp(16, 24, t),
      left: lerp(miniTextLeft, EXPANDED_CONTENT_PADDING, t),
      top: lerp(7, titleTop, t),
      width: lerp(miniTextWidth, expandedTextWidth, t),
    },
    artist: {
      fontSize: lerp(14, 16, t),
      left: lerp(miniTextLeft, EXPANDED_CONTENT_PADDING, t),
      top: lerp(27, artistTop, t),
      width: lerp(miniTextWidth, expandedTextWidth, t),
    },
    album: { top: albumTop, opacity: details },
    progressBar: { top: progressTop, opacity: details },
    controls: {
      top: lerp(miniControlsTop, controlsTop, t),
      skipButtonSize: lerp(28, 36, t),
      playButtonSize: lerp(34, 44, t),
      playButtonContainerSize: lerp(34, 72, t),
      spacing: lerp(0, 20, t),
      // Fades while the queue panel covers the now-playing view.
      opacity: clamp01(1 - queueProgress * 2),
    },
    volume: { top: volumeTop, opacity: expandedControls },
    queuePanel: {
      left: surfaceWidth * (1 - queueProgress),
      width: surfaceWidth,
      opacity: expandedControls,
      visible: t > VISIBLE_EXPANDED_FROM && queueProgress > 0,
    },
    textColor: lerpColor(palette.collapsedText, palette.expandedText, t),
    primaryColor: palette.primary,
    detailsOpacity: details,
    expandedControlsOpacity: expandedControls,
  }
}
