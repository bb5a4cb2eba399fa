"use client"

import { useEffect, useState } from "react"
import ExpandablePlayer from "./components/ExpandablePlayer"
import type { Track } from "./components/player/types"
import { createLocalTransport, type LocalTargetSeed } from "../lib/localTransport"
import { createPlaybackSource } from "../lib/playbackSource"

function demoTrack(id: string, title: string, artist: string, duration: number): Track {
  return { id, title, artist, album: { id: `album-${id}`, name: `${title} (Single)`, imageUrl: null }, duration, imageUrl: null }
}

const DEMO_TARGETS: LocalTargetSeed[] = [
  {
    id: "kitchen",
    name: "Kitchen",
    state: "playing",
    volume: 40,
    queue: [
      demoTrack("t-101", "Morning Static", "The Placeholders", 214),
      demoTrack("t-102", "Low Tide", "The Placeholders", 188),
      demoTrack("t-103", "Paper Moons", "Sample Choir", 251),
    ],
  },
  {
    id: "living-room",
    name: "Living Room",
    state: "paused",
    volume: 65,
    queue: [demoTrack("t-201", "Fixture Blues", "Mock Orchestra", 302)],
  },
  { id: "office", name: "office", volume: 20, queue: [] },
]

export default function Home() {
  const [player] = useState(() => {
    const transport = createLocalTransport(DEMO_TARGETS)
    return { transport, source: createPlaybackSource(transport) }
  })

  useEffect(() => {
    player.transport.connect(player.source)
    return () => player.transport.disconnect()
  }, [player])

  return (
    <main className="h-full overflow-y-auto px-4 pt-6 pb-40">
      <h1 className="text-2xl font-semibold">Tonearm</h1>
      <p className="mt-2 text-sm text-zinc-400">
        Tap the player to expand it. Swipe it sideways to move between speakers.
      </p>
      <ExpandablePlayer source={player.source} />
    </main>
  )
}
