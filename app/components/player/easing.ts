export type Curve = (t: number) => number

const NEWTON_ITERATIONS = 8
const EPSILON = 1e-6

/**
 * Builds a CSS-style cubic-bezier timing function. The x axis is solved with
 * Newton's method, falling back to bisection where the slope flattens out.
 * Endpoints are exact: `curve(0) === 0` and `curve(1) === 1`.
 */
export function cubicBezier(x1: number, y1: number, x2: number, y2: number): Curve {
  const cx = 3 * x1
  const bx = 3 * (x2 - x1) - cx
  const ax = 1 - cx - bx
  const cy = 3 * y1
  const by = 3 * (y2 - y1) - cy
  const ay = 1 - cy - by

  const sampleX = (s: number) => ((ax * s + bx) * s + cx) * s
  const sampleY = (s: number) => ((ay * s + by) * s + cy) * s
  const slopeX = (s: number) => (3 * ax * s + 2 * bx) * s + cx

  function solveX(x: number): number {
    let s = x
    for (let i = 0; i < NEWTON_ITERATIONS; i++) {
      const error = sampleX(s) - x
      if (Math.abs(error) < EPSILON) return s
      const slope = slopeX(s)
      if (Math.abs(slope) < EPSILON) break
      s -= error / slope
    }

    let lo = 0
    let hi = 1
    s = x
    while (hi - lo > EPSILON) {
      const value = sampleX(s)
      if (Math.abs(value - x) < EPSILON) return s
      if (value < x) lo = s
      else hi = s
      s = (lo + hi) / 2
    }
    return s
  }

  return (t: number) => {
    if (t <= 0) return 0
    if (t >= 1) return 1
    return sampleY(solveX(t))
  }
}

export const linear: Curve = (t) => Math.min(1, Math.max(0, t))
export const easeIn = cubicBezier(0.42, 0, 1, 1)
export const easeOut = cubicBezier(0, 0, 0.58, 1)
export const easeInCubic = cubicBezier(0.55, 0.055, 0.675, 0.19)
export const easeOutCubic = cubicBezier(0.215, 0.61, 0.355, 1)
/** Overshoots past 1 before settling; used for spring-back. */
export const easeOutBack = cubicBezier(0.175, 0.885, 0.32, 1.275)

export function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value))
}

export function lerp(a: number, b: number, t: number): number {
  return a + (b - a) * t
}
