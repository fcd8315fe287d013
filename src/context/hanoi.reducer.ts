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

import { DEFAULT_DISK_COUNT, DEFAULT_SPEED } from '@/lib/config'
import { InvalidDiskCountError, InvalidMoveError, InvalidStateError } from '@/lib/errors'
import * as playback from '@/lib/playback'
import type { HanoiAction } from './hanoi.actions.types'
import type { HanoiState, PuzzleState } from './hanoi.types'

export const initialState: HanoiState = {
  puzzle: playback.createPuzzle(DEFAULT_DISK_COUNT),
  ui: {
    speed: DEFAULT_SPEED,
    lastError: null,
    isHelpOpen: false,
  },
}

const withError = (state: HanoiState, puzzle: PuzzleState, error: Error): HanoiState => ({
  ...state,
  puzzle,
  ui: { ...state.ui, lastError: error.message },
})

/**
 * Runs a puzzle transition and folds its failures into the UI state.
 * Out-of-phase calls (a late timer tick, a double click) leave the state
 * untouched. A move that does not fit the pegs aborts the run.
 */
function transition(
  state: HanoiState,
  apply: (puzzle: PuzzleState) => PuzzleState,
): HanoiState {
  try {
    return { ...state, puzzle: apply(state.puzzle) }
  } catch (error) {
    if (error instanceof InvalidStateError) {
      return state
    }
    if (error instanceof InvalidMoveError) {
      return withError(state, playback.reset(state.puzzle), error)
    }
    if (error instanceof InvalidDiskCountError) {
      return withError(state, state.puzzle, error)
    }
    throw error
  }
}

export function hanoiReducer(state: HanoiState, action: HanoiAction): HanoiState {
  switch (action.type) {
    case 'CONFIGURE':
      // A new disk count always discards the current run.
      return transition(state, (puzzle) =>
        playback.configure(playback.reset(puzzle), action.diskCount),
      )
    case 'START':
      return transition(state, playback.start)
    case 'STEP':
      return transition(state, (puzzle) => playback.step(puzzle).state)
    case 'PAUSE':
      return transition(state, playback.pause)
    case 'RESUME':
      return transition(state, playback.resume)
    case 'RESET':
      return { ...state, puzzle: playback.reset(state.puzzle) }
    case 'SET_SPEED':
      return { ...state, ui: { ...state.ui, speed: action.speed } }
    case 'SET_HELP_OPEN':
      return { ...state, ui: { ...state.ui, isHelpOpen: action.open } }
    case 'CLEAR_ERROR':
      return { ...state, ui: { ...state.ui, lastError: null } }
    default:
      return state
  }
}
