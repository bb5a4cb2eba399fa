import { afterEach, describe, expect, it, vi } from "vitest"
import { createPlaybackSource, nextRepeatMode, PlayerCommandError } from "../lib/playbackSource"
import { createStubTransport, makeTarget, makeTrack } from "./helpers/fixtures"

describe("playback source", () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it("keeps available targets sorted and selects the first", () => {
    const source = createPlaybackSource(createStubTransport())
    source.applyTargets([
      makeTarget("z", "zebra"),
      makeTarget("x", "Offline", { available: false }),
      makeTarget("k", "Kitchen"),
    ])

    expect(source.getAvailableTargets().map((target) => target.id)).toEqual(["k", "z"])
    expect(source.getSelectedTarget()?.id).toBe("k")
  })

  it("prefers the configured target on first load", () => {
    const source = createPlaybackSource(createStubTransport(), { preferredTargetId: "z" })
    source.applyTargets([makeTarget("k", "Kitchen"), makeTarget("z", "Zebra")])
    expect(source.getSelectedTarget()?.id).toBe("z")
  })

  it("keeps the selection across refreshes and falls back when it disappears", () => {
    const source = createPlaybackSource(createStubTransport())
    source.applyTargets([makeTarget("a", "A"), makeTarget("b", "B")])
    source.selectTarget(makeTarget("b", "B"))

    source.applyTargets([makeTarget("b", "B", { state: "playing" }), makeTarget("a", "A")])
    expect(source.getSelectedTarget()?.state).toBe("playing")

    source.applyTargets([makeTarget("a", "A")])
    expect(source.getSelectedTarget()?.id).toBe("a")

    source.applyTargets([])
    expect(source.getSelectedTarget()).toBeNull()
    expect(source.getCurrentTrack()).toBeNull()
  })

  it("sets the current track from the cache on selection, even when empty", () => {
    const source = createPlaybackSource(createStubTransport())
    source.applyTargets([makeTarget("a", "A"), makeTarget("b", "B")])
    const track = makeTrack("a1")
    source.applyTrack("a", track)
    expect(source.getCurrentTrack()).toEqual(track)

    source.selectTarget(makeTarget("b", "B"))
    expect(source.getCurrentTrack()).toBeNull()
    expect(source.getCachedTrackForTarget("a")).toEqual(track)
  })

  it("does not let a re-report without artwork wipe cached artwork", () => {
    const source = createPlaybackSource(createStubTransport())
    source.applyTargets([makeTarget("a", "A")])
    const withArt = makeTrack("t1", { imageUrl: "https://img.test/t1.jpg" })
    source.applyTrack("a", withArt)

    source.applyTrack("a", makeTrack("t1"))
    expect(source.getCurrentTrack()?.imageUrl).toBe("https://img.test/t1.jpg")

    source.applyTrack("a", makeTrack("t2"))
    expect(source.getCurrentTrack()?.id).toBe("t2")
  })

  it("ignores selection of unknown targets", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined)
    const source = createPlaybackSource(createStubTransport())
    source.applyTargets([makeTarget("a", "A")])
    source.selectTarget(makeTarget("ghost", "Ghost"))

    expect(source.getSelectedTarget()?.id).toBe("a")
    expect(warn).toHaveBeenCalledWith("[playback-source] cannot select unknown target ghost")
  })

  it("builds sized artwork URLs from the track, then the album", () => {
    const source = createPlaybackSource(createStubTransport())
    const album = { id: "al", name: "Album", imageUrl: "https://img.test/album.jpg?v=2" }

    expect(source.getArtworkUrl(makeTrack("t", { imageUrl: "https://img.test/t.jpg", album }), 512)).toBe(
      "https://img.test/t.jpg?size=512"
    )
    expect(source.getArtworkUrl(makeTrack("t", { album }), 256)).toBe("https://img.test/album.jpg?v=2&size=256")
    expect(source.getArtworkUrl(makeTrack("t"), 512)).toBeNull()
  })

  it("wraps transport failures in PlayerCommandError and logs them", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined)
    const source = createPlaybackSource(
      createStubTransport({
        playPause: async () => {
          throw new Error("offline")
        },
      })
    )

    const failure = await source.playPause("a").catch((error: unknown) => error)
    expect(failure).toBeInstanceOf(PlayerCommandError)
    expect(failure).toMatchObject({ command: "playPause", targetId: "a", message: "playPause failed for target a: offline" })
    expect(warn).toHaveBeenCalledWith("[playback-source] playPause failed for target a: offline")
  })

  it("cycles repeat modes through the transport", async () => {
    const setRepeat = vi.fn(async () => undefined)
    const source = createPlaybackSource(createStubTransport({ setRepeat }))
    await source.cycleRepeat("a", "all")
    expect(setRepeat).toHaveBeenCalledWith("a", "one")

    expect(nextRepeatMode("off")).toBe("all")
    expect(nextRepeatMode("one")).toBe("off")
  })

  it("sends volume levels clamped to 0-100", async () => {
    const setVolume = vi.fn(async () => undefined)
    const source = createPlaybackSource(createStubTransport({ setVolume }))
    await source.setVolume("a", 140)
    await source.setVolume("a", 33.6)
    expect(setVolume.mock.calls).toEqual([
      ["a", 100],
      ["a", 34],
    ])
  })

  it("flips shuffle based on the last known state", async () => {
    const setShuffle = vi.fn(async () => undefined)
    const source = createPlaybackSource(createStubTransport({ setShuffle }))
    await source.toggleShuffle("a")
    await source.toggleShuffle("a")
    expect(setShuffle.mock.calls).toEqual([
      ["a", true],
      ["a", false],
    ])
  })

  it("notifies subscribers on every state change", () => {
    const source = createPlaybackSource(createStubTransport())
    const listener = vi.fn()
    const unsubscribe = source.subscribe(listener)
    source.applyTargets([makeTarget("a", "A")])
    source.setConnected(true)
    expect(listener).toHaveBeenCalledTimes(2)

    unsubscribe()
    source.setConnected(false)
    expect(listener).toHaveBeenCalledTimes(2)
  })

  it("returns no colours without an extractor", async () => {
    const source = createPlaybackSource(createStubTransport())
    await expect(source.extractAdaptiveColors("https://img.test/a.jpg")).resolves.toBeNull()
  })
})
