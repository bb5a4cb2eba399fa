import { describe, expect, it } from "vitest"
import { createLocalTransport } from "../lib/localTransport"
import { createPlaybackSource } from "../lib/playbackSource"
import { makeTrack } from "./helpers/fixtures"

function setup() {
  const transport = createLocalTransport([
    {
      id: "den",
      name: "Den",
      state: "playing",
      queue: [makeTrack("d1"), makeTrack("d2"), makeTrack("d3", { duration: 200 })],
    },
    { id: "porch", name: "Porch" },
  ])
  const source = createPlaybackSource(transport)
  return { transport, source }
}

describe("local transport", () => {
  it("publishes targets and tracks on connect", () => {
    const { transport, source } = setup()
    transport.connect(source)

    expect(source.isConnected()).toBe(true)
    expect(source.getAvailableTargets().map((target) => target.id)).toEqual(["den", "porch"])
    expect(source.getCurrentTrack()?.id).toBe("d1")
    expect(source.getSelectedTarget()).toMatchObject({ currentItemId: "den:0", elapsedTime: 0 })
    expect(source.getCachedTrackForTarget("porch")).toBeNull()
    expect(transport.getTarget("porch")?.elapsedTime).toBeNull()
  })

  it("stops at the end of the queue unless repeating", async () => {
    const { transport, source } = setup()
    transport.connect(source)

    await source.skipNext("den")
    await source.skipNext("den")
    await source.skipNext("den")
    expect(source.getCurrentTrack()?.id).toBe("d3")

    await source.cycleRepeat("den", "off")
    await source.skipNext("den")
    expect(source.getCurrentTrack()?.id).toBe("d1")
  })

  it("restarts the current item when going back after a few seconds", async () => {
    const { transport, source } = setup()
    transport.connect(source)
    await source.skipNext("den")

    await source.seek("den", 10)
    await source.skipPrevious("den")
    expect(transport.getTarget("den")).toMatchObject({ currentItemId: "den:1", elapsedTime: 0 })

    await source.skipPrevious("den")
    expect(transport.getTarget("den")?.currentItemId).toBe("den:0")
  })

  it("clamps seeks to the track duration", async () => {
    const { transport, source } = setup()
    transport.connect(source)
    await source.skipNext("den")
    await source.skipNext("den")

    await source.seek("den", 999)
    expect(transport.getTarget("den")?.elapsedTime).toBe(200)
    await source.seek("den", -5)
    expect(transport.getTarget("den")?.elapsedTime).toBe(0)
  })

  it("only toggles play state when something is loaded", async () => {
    const { transport, source } = setup()
    transport.connect(source)

    await source.playPause("den")
    expect(transport.getTarget("den")?.state).toBe("paused")
    await source.playPause("porch")
    expect(transport.getTarget("porch")?.state).toBe("idle")
  })

  it("publishes volume changes", async () => {
    const { transport, source } = setup()
    transport.connect(source)
    await source.setVolume("porch", 12)
    expect(transport.getTarget("porch")?.volume).toBe(12)
    expect(source.getAvailableTargets().find((target) => target.id === "porch")?.volume).toBe(12)
  })

  it("reports the queue with shuffle and repeat state", async () => {
    const { transport, source } = setup()
    transport.connect(source)
    await source.toggleShuffle("den")

    const queue = await source.getQueue("den")
    expect(queue).toMatchObject({ targetId: "den", currentIndex: 0, shuffle: true, repeatMode: "off" })
    expect(queue?.items.map((item) => item.id)).toEqual(["den:0", "den:1", "den:2"])
  })

  it("rejects every command while failing", async () => {
    const { transport, source } = setup()
    transport.connect(source)
    transport.setFailure(new Error("unreachable"))

    await expect(source.getQueue("den")).rejects.toThrow("fetchQueue failed for target den: unreachable")

    transport.setFailure(null)
    await expect(source.getQueue("den")).resolves.not.toBeNull()
  })

  it("marks the source disconnected and stops publishing", async () => {
    const { transport, source } = setup()
    transport.connect(source)
    transport.disconnect()
    expect(source.isConnected()).toBe(false)

    await transport.next("den")
    expect(transport.getTarget("den")?.currentItemId).toBe("den:1")
    expect(source.getCurrentTrack()?.id).toBe("d1")
  })
})
