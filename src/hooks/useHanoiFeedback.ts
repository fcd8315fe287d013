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

import { type Dispatch, useEffect } from 'react'
import { toast } from 'sonner'

import { clearError } from '@/context/hanoi.actions'
import type { HanoiAction } from '@/context/hanoi.actions.types'
import type { HanoiState } from '@/context/hanoi.types'

/**
 * Manages user-facing feedback. Errors set on `ui.lastError` are logged,
 * shown as a toast and cleared; a finished run is announced once.
 *
 * @param state - The current visualizer state.
 * @param dispatch - The dispatch function from the reducer.
 */
export function useHanoiFeedback(state: HanoiState, dispatch: Dispatch<HanoiAction>) {
  const { lastError } = state.ui
  const { phase, cursor } = state.puzzle

  useEffect(() => {
    if (lastError) {
      console.error('Playback error:', lastError)
      toast.error(lastError)
      dispatch(clearError())
    }
  }, [lastError, dispatch])

  useEffect(() => {
    if (phase === 'completed') {
      console.info(`Puzzle solved in ${cursor} moves`)
      toast.success(`Solved in ${cursor} moves!`)
    }
  }, [phase, cursor])
}
