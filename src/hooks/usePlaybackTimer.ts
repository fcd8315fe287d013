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

import { useEffect, type Dispatch } from 'react'
import type { HanoiState } from '@/context/hanoi.types'
import type { HanoiAction } from '@/context/hanoi.actions.types'
import { step } from '@/context/hanoi.actions'
import { SPEEDS } from '@/lib/config'

/**
 * Paces the animation. While the puzzle is running it dispatches one STEP per
 * interval of the selected speed; in any other phase no interval exists.
 *
 * @param state The current visualizer state.
 * @param dispatch The dispatch function.
 */
export function usePlaybackTimer(state: HanoiState, dispatch: Dispatch<HanoiAction>) {
  const { phase } = state.puzzle
  const delay = SPEEDS[state.ui.speed]

  useEffect(() => {
    let interval: ReturnType<typeof setInterval> | null = null

    if (phase === 'running') {
      interval = setInterval(() => {
        dispatch(step())
      }, delay)
    }

    return () => {
      if (interval) {
        clearInterval(interval)
      }
    }
  }, [phase, delay, dispatch])
}
