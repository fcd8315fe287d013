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

import { Pause, Play, RotateCcw } from 'lucide-react'
import { Button } from '@/components/ui/button'
import { useHanoiState } from '@/context/hanoi.hooks'
import { useHanoiActions } from '@/hooks/useHanoiActions'

/**
 * Starts, pauses or resumes the animation. After a finished run it replays
 * the solution from the start.
 */
export function PlaybackButton() {
  const { puzzle } = useHanoiState()
  const { togglePlayback } = useHanoiActions()

  const content = (() => {
    switch (puzzle.phase) {
      case 'running':
        return (
          <>
            <Pause className="size-4" />
            Pause
          </>
        )
      case 'paused':
        return (
          <>
            <Play className="size-4" />
            Resume
          </>
        )
      case 'completed':
        return (
          <>
            <RotateCcw className="size-4" />
            Replay
          </>
        )
      default:
        return (
          <>
            <Play className="size-4" />
            Start
          </>
        )
    }
  })()

  return (
    <Button onClick={togglePlayback} className="w-28" onMouseDown={(e) => e.preventDefault()}>
      {content}
    </Button>
  )
}
