import { describe, expect, it } from "vitest"
import { ExpansionController, type ExpansionEvent } from "../app/components/player/expansion"
import { ManualFrameClock } from "./helpers/manualFrameClock"

function setup() {
  const clock = new ManualFrameClock()
  const expansion = new ExpansionController({ clock })
  const events: ExpansionEvent["type"][] = []
  expansion.subscribe((event) => {
    if (event.type !== "progress") events.push(event.type)
  })
  return { clock, expansion, events }
}

describe("ExpansionController", () => {
  it("expands to exactly 1 over the expand duration", () => {
    const { clock, expansion, events } = setup()
    expansion.expand()
    clock.advance(150)
    expect(expansion.progress).toBeGreaterThan(0.5)
    expect(expansion.progress).toBeLessThan(1)

    clock.advance(150)
    expect(expansion.progress).toBe(1)
    expect(expansion.isExpanded).toBe(true)
    expect(events).toEqual(["expand-start", "expanded"])
  })

  it("treats expand at 1 as a no-op", () => {
    const { clock, expansion, events } = setup()
    expansion.expand()
    clock.flush()
    events.length = 0

    expansion.expand()
    expect(events).toEqual([])
    expect(expansion.isAnimating).toBe(false)
    expect(clock.pendingFrames).toBe(0)
  })

  it("does not restart an expand already in flight", () => {
    const { clock, expansion, events } = setup()
    expansion.expand()
    clock.frame()
    const progress = expansion.progress
    expansion.expand()
    expect(events).toEqual(["expand-start"])
    expect(expansion.progress).toBe(progress)
  })

  it("reports collapse start immediately and dismissal at 0", () => {
    const { clock, expansion, events } = setup()
    expansion.expand()
    clock.flush()
    events.length = 0

    expansion.collapse()
    expect(events).toEqual(["collapse-start"])
    clock.flush()
    expect(expansion.progress).toBe(0)
    expect(events).toEqual(["collapse-start", "dismissed"])
  })

  it("reverses from the current progress without jumping", () => {
    const { clock, expansion } = setup()
    expansion.expand()
    clock.advance(96)
    const reached = expansion.progress

    expansion.collapse()
    clock.frame()
    expect(expansion.progress).toBeLessThan(reached)
    expect(expansion.progress).toBeGreaterThan(reached - 0.2)
    clock.flush()
    expect(expansion.progress).toBe(0)
  })

  it("ignores collapse when already collapsed", () => {
    const { expansion, events } = setup()
    expansion.collapse()
    expect(events).toEqual([])
  })
})
