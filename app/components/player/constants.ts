export const EXPAND_MS = 300
export const COLLAPSE_MS = 300
export const QUEUE_PANEL_MS = 300
export const HIDE_SLIDE_MS = 250
export const QUEUE_REFRESH_INTERVAL_MS = 5000
export const ELAPSED_TICK_MS = 1000

export const SWIPE_COMMIT_THRESHOLD = 0.3
export const SWIPE_VELOCITY_THRESHOLD = 500
export const SWIPE_COMMIT_MS = 150
export const SWIPE_CANCEL_MS = 300
export const SWIPE_HOLD_FRAMES_KNOWN_TRACK = 1
export const SWIPE_HOLD_FRAMES_UNKNOWN_TRACK = 2
export const EDGE_DEAD_ZONE = 40

export const VERTICAL_DRAG_TRIGGER = 10
export const QUEUE_FLING_VELOCITY = 300

export const SINGLE_BOUNCE_MS = 400
export const SINGLE_BOUNCE_HEIGHT = 10
export const HINT_BOUNCE_MS = 600
export const HINT_BOUNCE_HEIGHT = 20
export const HINT_REPEAT_MS = 2000
export const WELCOME_FADE_IN_MS = 800
export const WELCOME_FADE_OUT_MS = 300

export const ARTWORK_SIZE = 512
export const SWIPE_HINT_TEXT = "Swipe to switch player"

// Mini surface
export const COLLAPSED_HEIGHT = 72
export const COLLAPSED_MARGIN = 8
export const COLLAPSED_BORDER_RADIUS = 16
export const COLLAPSED_ART_SIZE = 72
export const BOTTOM_NAV_HEIGHT = 56
export const MINI_TEXT_GAP = 10

// Expanded surface
export const EXPANDED_HEADER_HEIGHT = 48
export const EXPANDED_CONTENT_PADDING = 32
export const EXPANDED_ART_MIN = 280
export const EXPANDED_ART_MAX = 400
export const EXPANDED_TITLE_BLOCK = 58

export const VISIBLE_DETAILS_FROM = 0.3
export const VISIBLE_EXPANDED_FROM = 0.5

export const ONBOARDING_STORAGE_KEY = "tonearm.player.onboarding.completed"
export const HINTS_STORAGE_KEY = "tonearm.player.hints.enabled"

export const FALLBACK_COLLAPSED_BG = "#2b2930"
export const FALLBACK_COLLAPSED_TEXT = "#e6e0e9"
export const FALLBACK_EXPANDED_BG = "#121212"
export const FALLBACK_EXPANDED_TEXT = "#ffffff"
export const FALLBACK_PRIMARY = "#ffffff"
