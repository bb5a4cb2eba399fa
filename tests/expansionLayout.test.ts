import { describe, expect, it } from "vitest"
import {
  computeExpansionLayout,
  detailsOpacity,
  expandedControlsOpacity,
  type LayoutInput,
} from "../app/components/player/layout"
import { lerpColor, parseColor } from "../app/components/player/color"

const viewport = { width: 390, height: 844, topInset: 0, bottomInset: 0 }
const palette = {
  collapsedBackground: "#2b2930",
  expandedBackground: "#121212",
  collapsedText: "#e6e0e9",
  expandedText: "#ffffff",
  primary: "#ffffff",
}

function input(t: number, overrides: Partial<LayoutInput> = {}): LayoutInput {
  return { t, viewport, palette, queueProgress: 0, bounceOffset: 0, hideProgress: 0, ...overrides }
}

function numericLeaves(value: object, prefix = ""): Map<string, number> {
  const leaves = new Map<string, number>()
  const entries: [string, unknown][] = Object.entries(value)
  for (const [key, child] of entries) {
    const path = prefix ? `${prefix}.${key}` : key
    if (typeof child === "number") {
      leaves.set(path, child)
    } else if (typeof child === "object" && child !== null) {
      numericLeaves(child, path).forEach((leaf, leafPath) => leaves.set(leafPath, leaf))
    }
  }
  return leaves
}

describe("expansion layout", () => {
  it("matches the mini player at t = 0", () => {
    const layout = computeExpansionLayout(input(0))
    expect(layout.surface.width).toBe(374)
    expect(layout.surface.height).toBe(72)
    expect(layout.surface.left).toBe(8)
    expect(layout.surface.bottom).toBe(64)
    expect(layout.surface.borderRadius).toBe(16)
    expect(layout.surface.backgroundColor).toBe("#2b2930")
    expect(layout.artwork.size).toBe(72)
    expect(layout.title.left).toBe(82)
    expect(layout.detailsOpacity).toBe(0)
    expect(layout.expandedControlsOpacity).toBe(0)
  })

  it("fills the screen above the nav bar at t = 1", () => {
    const layout = computeExpansionLayout(input(1))
    expect(layout.surface.width).toBe(390)
    expect(layout.surface.height).toBe(788)
    expect(layout.surface.left).toBe(0)
    expect(layout.surface.bottom).toBe(56)
    expect(layout.surface.borderRadius).toBe(0)
    expect(layout.surface.backgroundColor).toBe("#121212")
    expect(layout.artwork.size).toBeCloseTo(299.92, 6)
    expect(layout.artwork.left).toBeCloseTo(45.04, 6)
    expect(layout.textColor).toBe("#ffffff")
    expect(layout.detailsOpacity).toBe(1)
    expect(layout.expandedControlsOpacity).toBe(1)
  })

  it("keeps every numeric property continuous in t", () => {
    const step = 0.0005
    const extras = { queueProgress: 0.4, bounceOffset: 10, hideProgress: 0.5 }
    let previous = numericLeaves(computeExpansionLayout(input(0, extras)))

    for (let i = 1; i * step <= 1; i++) {
      const current = numericLeaves(computeExpansionLayout(input(i * step, extras)))
      current.forEach((value, path) => {
        const before = previous.get(path)
        expect(before, path).toBeDefined()
        if (before === undefined) return
        expect(Math.abs(value - before), `${path} at t=${i * step}`).toBeLessThan(1)
      })
      previous = current
    }
  })

  it("applies bounce and hide only while collapsed", () => {
    const bounced = computeExpansionLayout(input(0, { bounceOffset: 10 }))
    expect(bounced.surface.bottom).toBe(74)

    const hidden = computeExpansionLayout(input(0, { hideProgress: 1 }))
    expect(hidden.surface.bottom).toBe(64 - (72 + 64 + 20))

    const expanded = computeExpansionLayout(input(1, { bounceOffset: 10, hideProgress: 1 }))
    expect(expanded.surface.bottom).toBe(56)
  })

  it("slides the queue panel in from the trailing edge", () => {
    const layout = computeExpansionLayout(input(1, { queueProgress: 0.25 }))
    expect(layout.queuePanel.left).toBe(292.5)
    expect(layout.queuePanel.visible).toBe(true)

    const halfOpen = computeExpansionLayout(input(1, { queueProgress: 0.5 }))
    expect(halfOpen.controls.opacity).toBe(0)
  })

  it("hides the queue panel until the player is past halfway", () => {
    expect(computeExpansionLayout(input(0.5, { queueProgress: 1 })).queuePanel.visible).toBe(false)
    expect(computeExpansionLayout(input(0.6, { queueProgress: 1 })).queuePanel.visible).toBe(true)
    expect(computeExpansionLayout(input(1, { queueProgress: 0 })).queuePanel.visible).toBe(false)
  })

  it("gates detail and control opacity on thresholds", () => {
    expect(detailsOpacity(0.3)).toBe(0)
    expect(detailsOpacity(0.65)).toBeCloseTo(0.5, 10)
    expect(expandedControlsOpacity(0.5)).toBe(0)
    expect(expandedControlsOpacity(0.4)).toBe(0)
    expect(expandedControlsOpacity(1)).toBe(1)
  })
})

describe("colour blending", () => {
  it("parses the supported notations", () => {
    expect(parseColor("#fff")).toEqual({ r: 255, g: 255, b: 255, a: 1 })
    expect(parseColor("#102030")).toEqual({ r: 16, g: 32, b: 48, a: 1 })
    expect(parseColor("rgba(1, 2, 3, 0.5)")).toEqual({ r: 1, g: 2, b: 3, a: 0.5 })
    expect(parseColor("teal")).toBeNull()
  })

  it("blends channel by channel", () => {
    expect(lerpColor("#000000", "#ffffff", 0.5)).toBe("#808080")
    expect(lerpColor("#000000", "#ffffff", 2)).toBe("#ffffff")
    expect(lerpColor("rgba(0, 0, 0, 0)", "#000000", 0.5)).toBe("rgba(0, 0, 0, 0.5)")
  })

  it("falls back to the parseable endpoint", () => {
    expect(lerpColor("nope", "#abcdef", 0.3)).toBe("#abcdef")
    expect(lerpColor("#abcdef", "nope", 0.3)).toBe("#abcdef")
  })
})
