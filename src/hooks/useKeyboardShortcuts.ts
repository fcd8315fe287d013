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

import { pause, reset, resume, start } from '@/context/hanoi.actions'
import type { HanoiAction } from '@/context/hanoi.actions.types'
import type { HanoiState, PlaybackPhase } from '@/context/hanoi.types'

/**
 * Maps a key press to the action it triggers in the given phase, if any.
 * Space toggles pause, Enter starts or resumes, R resets.
 */
export function shortcutFor(key: string, phase: PlaybackPhase): HanoiAction | null {
  switch (key) {
    case ' ':
      if (phase === 'running') return pause()
      if (phase === 'paused') return resume()
      return null
    case 'Enter':
      if (phase === 'idle') return start()
      if (phase === 'paused') return resume()
      return null
    case 'r':
    case 'R':
      return reset()
    default:
      return null
  }
}

// Keys pressed inside form controls belong to the control.
function isFormControl(target: EventTarget | null) {
  return target instanceof Element && target.closest('button, input, select, textarea') !== null
}

/**
 * Binds the global keyboard shortcuts for playback control.
 *
 * @param state - The current visualizer state.
 * @param dispatch - The dispatch function from the reducer.
 */
export function useKeyboardShortcuts(state: HanoiState, dispatch: Dispatch<HanoiAction>) {
  const { phase } = state.puzzle

  useEffect(() => {
    const handleKeyDown = (event: KeyboardEvent) => {
      if (event.repeat || event.ctrlKey || event.metaKey || event.altKey) return
      if (isFormControl(event.target)) return

      const action = shortcutFor(event.key, phase)
      if (action) {
        event.preventDefault()
        dispatch(action)
      }
    }

    window.addEventListener('keydown', handleKeyDown)
    return () => window.removeEventListener('keydown', handleKeyDown)
  }, [phase, dispatch])
}
