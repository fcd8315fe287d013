/*
 * Copyright (C) 2025-2026  Henrique Almeida
 * This file is part of WASudoku.
 *
 * WASudoku is free software: you can redistribute it and/or modify
 * it under the terms of the GNU Affero General Public License as published
 * by the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 *
 * WASudoku is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE.  See the
 * GNU Affero General Public License for more details.
 *
 * You should have received a copy of the GNU Affero General Public License
 * along with WASudoku.  If not, see <https://www.gnu.org/licenses/>.
 */

import { memo } from 'react'

import { useHanoiState } from '@/context/hanoi.hooks'
import { PEG_LABELS, PEG_ORDER, type PegName } from '@/lib/config'
import { cn, diskColour, diskWidthPercent } from '@/lib/utils'

interface PegProps {
  readonly name: PegName
  readonly disks: readonly number[]
  readonly diskCount: number
  /** Size of the disk that just landed on this peg, if any. */
  readonly movedDisk: number | null
}

const Peg = memo(function Peg({ name, disks, diskCount, movedDisk }: PegProps) {
  const label = PEG_LABELS[name]

  return (
    <div
      role="group"
      aria-label={`Peg ${label}`}
      className="flex flex-1 flex-col items-center gap-2"
    >
      <div className="relative flex h-72 w-full flex-col-reverse items-center">
        <div className="absolute inset-y-0 left-1/2 w-2 -translate-x-1/2 rounded-t bg-amber-700" />
        {disks.map((size) => (
          <div
            key={size}
            aria-label={`Disk ${size}`}
            data-moved={size === movedDisk || undefined}
            className={cn(
              'relative z-10 flex h-6 items-center justify-center rounded border-2 border-gray-700 text-xs shadow',
              size === movedDisk && 'border-4 border-red-400 font-bold',
            )}
            style={{
              width: `${diskWidthPercent(size, diskCount) * 0.8}%`,
              backgroundColor: diskColour(size),
            }}
          >
            {size}
          </div>
        ))}
      </div>
      <div className="h-3 w-11/12 rounded bg-amber-900" />
      <span className="text-lg font-bold">{label}</span>
    </div>
  )
})

/**
 * Draws the three pegs and their disks. The disk moved last is highlighted.
 */
export function PuzzleBoard() {
  const { puzzle } = useHanoiState()
  const { pegs, diskCount, lastMove } = puzzle

  return (
    <div className="flex w-full items-end gap-4 rounded-lg border bg-white p-4 dark:bg-gray-900">
      {PEG_ORDER.map((name) => (
        <Peg
          key={name}
          name={name}
          disks={pegs[name]}
          diskCount={diskCount}
          movedDisk={lastMove?.to === name ? lastMove.diskSize : null}
        />
      ))}
    </div>
  )
}
