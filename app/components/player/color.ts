import { clamp01, lerp } from "./easing"

export interface Rgba {
  r: number
  g: number
  b: number
  a: number
}

const HEX_PATTERN = /^#([0-9a-f]{3}|[0-9a-f]{6}|[0-9a-f]{8})$/i
const RGB_PATTERN = /^rgba?\(\s*([\d.]+)\s*,\s*([\d.]+)\s*,\s*([\d.]+)\s*(?:,\s*([\d.]+)\s*)?\)$/i

/**
 * Parses `#rgb`, `#rrggbb`, `#rrggbbaa`, `rgb(...)` and `rgba(...)`.
 * Returns null for anything else.
 */
export function parseColor(input: string): Rgba | null {
  const value = input.trim()

  const hex = HEX_PATTERN.exec(value)
  if (hex) {
    let digits = hex[1]
    if (digits.length === 3) {
      digits = digits.split("").map((digit) => digit + digit).join("")
    }
    return {
      r: parseInt(digits.slice(0, 2), 16),
      g: parseInt(digits.slice(2, 4), 16),
      b: parseInt(digits.slice(4, 6), 16),
      a: digits.length === 8 ? parseInt(digits.slice(6, 8), 16) / 255 : 1,
    }
  }

  const rgb = RGB_PATTERN.exec(value)
  if (rgb) {
    return {
      r: clampChannel(Number(rgb[1])),
      g: clampChannel(Number(rgb[2])),
      b: clampChannel(Number(rgb[3])),
      a: rgb[4] === undefined ? 1 : clamp01(Number(rgb[4])),
    }
  }

  return null
}

export function formatColor(color: Rgba): string {
  const r = clampChannel(Math.round(color.r))
  const g = clampChannel(Math.round(color.g))
  const b = clampChannel(Math.round(color.b))
  if (color.a >= 1) {
    return `#${toHex(r)}${toHex(g)}${toHex(b)}`
  }
  return `rgba(${r}, ${g}, ${b}, ${Number(clamp01(color.a).toFixed(3))})`
}

/**
 * Blends two colours channel by channel. An unparseable endpoint makes the
 * blend snap to the other one.
 */
export function lerpColor(from: string, to: string, t: number): string {
  const a = parseColor(from)
  const b = parseColor(to)
  if (!a) return b ? formatColor(b) : to
  if (!b) return formatColor(a)

  const amount = clamp01(t)
  return formatColor({
    r: lerp(a.r, b.r, amount),
    g: lerp(a.g, b.g, amount),
    b: lerp(a.b, b.b, amount),
    a: lerp(a.a, b.a, amount),
  })
}

function clampChannel(value: number): number {
  return Math.min(255, Math.max(0, value))
}

function toHex(channel: number): string {
  return channel.toString(16).padStart(2, "0")
}
