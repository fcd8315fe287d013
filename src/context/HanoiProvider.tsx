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

import { useReducer, type ReactNode } from 'react'

import { useHanoiFeedback } from '@/hooks/useHanoiFeedback'
import { useKeyboardShortcuts } from '@/hooks/useKeyboardShortcuts'
import { usePlaybackTimer } from '@/hooks/usePlaybackTimer'

import { HanoiDispatchContext, HanoiStateContext } from './hanoi.context'
import { hanoiReducer, initialState } from './hanoi.reducer'
import type { HanoiState } from './hanoi.types'

interface HanoiProviderProps {
  readonly children: ReactNode
  readonly initial?: HanoiState
}

/**
 * Owns the visualizer state and wires the side effects that drive it:
 * the playback timer, toasts and keyboard shortcuts.
 */
export function HanoiProvider({ children, initial = initialState }: HanoiProviderProps) {
  const [state, dispatch] = useReducer(hanoiReducer, initial)

  usePlaybackTimer(state, dispatch)
  useHanoiFeedback(state, dispatch)
  useKeyboardShortcuts(state, dispatch)

  return (
    <HanoiStateContext.Provider value={state}>
      <HanoiDispatchContext.Provider value={dispatch}>{children}</HanoiDispatchContext.Provider>
    </HanoiStateContext.Provider>
  )
}
