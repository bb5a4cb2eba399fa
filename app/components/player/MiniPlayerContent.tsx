"use client"

import { COLLAPSED_ART_SIZE, COLLAPSED_HEIGHT, MINI_TEXT_GAP } from "./constants"
import type { PlayerContent } from "./playerController"
import { DeviceIcon } from "./ui"

/**
 * Artwork and text of the collapsed player for one target. The live and the
 * peeking target both render through this, side by side during a swipe.
 */
export default function MiniPlayerContent({
  content,
  left,
  width,
  textColor,
  textWidth,
}: {
  content: PlayerContent
  left: number
  width: number
  textColor: string
  textWidth: number
}) {
  return (
    <div
      className="absolute top-0 flex items-center"
      style={{ left, width, height: COLLAPSED_HEIGHT, color: textColor }}
    >
      <div
        className="flex shrink-0 items-center justify-center overflow-hidden bg-black/20"
        style={{ width: COLLAPSED_ART_SIZE, height: COLLAPSED_ART_SIZE }}
      >
        {content.kind === "track" && content.imageUrl ? (
          // eslint-disable-next-line @next/next/no-img-element
          <img src={content.imageUrl} alt="" className="h-full w-full object-cover" draggable={false} />
        ) : (
          <DeviceIcon className="h-7 w-7 opacity-80" />
        )}
      </div>
      <div className="min-w-0" style={{ marginLeft: MINI_TEXT_GAP, width: textWidth }}>
        <p className="truncate text-base font-semibold leading-5">{content.primaryText}</p>
        {content.secondaryText && (
          <p className={`truncate text-sm leading-5 ${content.isHint ? "italic opacity-60" : "opacity-75"}`}>
            {content.secondaryText}
          </p>
        )}
        {content.kind === "track" && (
          <p className="truncate text-xs leading-4 opacity-50">{content.targetName}</p>
        )}
      </div>
    </div>
  )
}
