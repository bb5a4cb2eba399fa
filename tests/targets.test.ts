import { describe, expect, it } from "vitest"
import { adjacentTarget, directionForOffset, isInEdgeDeadZone, sortTargets } from "../app/components/player/targets"
import { makeTarget } from "./helpers/fixtures"

describe("playback target ordering", () => {
  it("sorts available targets by lowercase name and keeps ties stable", () => {
    const sorted = sortTargets([
      makeTarget("b", "beta"),
      makeTarget("a1", "Alpha"),
      makeTarget("off", "Aardvark", { available: false }),
      makeTarget("a2", "alpha"),
    ])
    expect(sorted.map((target) => target.id)).toEqual(["a1", "a2", "b"])
  })

  it("finds neighbours with wrap-around", () => {
    const targets = [makeTarget("a", "A"), makeTarget("b", "B"), makeTarget("c", "C")]
    expect(adjacentTarget(targets, "b", "next")?.id).toBe("c")
    expect(adjacentTarget(targets, "b", "previous")?.id).toBe("a")
    expect(adjacentTarget(targets, "c", "next")?.id).toBe("a")
    expect(adjacentTarget(targets, "a", "previous")?.id).toBe("c")
  })

  it("never offers the selected target itself", () => {
    expect(adjacentTarget([makeTarget("a", "A")], "a", "next")).toBeNull()
    expect(adjacentTarget([makeTarget("a", "A"), makeTarget("b", "B")], "missing", "next")).toBeNull()
  })

  it("offers the other target in both directions when there are two", () => {
    const targets = [makeTarget("a", "A"), makeTarget("b", "B")]
    expect(adjacentTarget(targets, "a", "next")?.id).toBe("b")
    expect(adjacentTarget(targets, "a", "previous")?.id).toBe("b")
  })

  it("maps a leftward offset to the next target", () => {
    expect(directionForOffset(-0.1)).toBe("next")
    expect(directionForOffset(0.1)).toBe("previous")
    expect(directionForOffset(0)).toBe("previous")
  })

  it("detects the edge dead zone on both sides", () => {
    expect(isInEdgeDeadZone(39, 400, 40)).toBe(true)
    expect(isInEdgeDeadZone(40, 400, 40)).toBe(false)
    expect(isInEdgeDeadZone(360, 400, 40)).toBe(false)
    expect(isInEdgeDeadZone(361, 400, 40)).toBe(true)
  })
})
