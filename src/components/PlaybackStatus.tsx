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

import { useHanoiState } from '@/context/hanoi.hooks'
import type { PuzzleState } from '@/context/hanoi.types'
import { cn, formatMove } from '@/lib/utils'

export function statusText({ phase, cursor, moves }: PuzzleState): string {
  const total = moves.length
  if (phase === 'completed') return `Solved in ${cursor} moves!`
  if (phase === 'idle') return 'Ready to start'
  return `Move ${cursor}/${total} (${total - cursor} remaining)`
}

/**
 * Displays playback progress and the move that was just made.
 */
export function PlaybackStatus() {
  const { puzzle } = useHanoiState()
  const { phase, lastMove } = puzzle

  return (
    <div
      role="status"
      className="flex w-full items-center justify-between text-sm font-medium text-gray-600 dark:text-gray-400"
    >
      <span className={cn(phase === 'completed' && 'font-bold text-green-600')}>
        {statusText(puzzle)}
      </span>
      <span>{lastMove ? formatMove(lastMove) : null}</span>
    </div>
  )
}
