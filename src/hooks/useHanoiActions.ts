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

import { useMemo } from 'react'

import * as actions from '@/context/hanoi.actions'
import { useHanoiDispatch, useHanoiState } from '@/context/hanoi.hooks'
import type { Speed } from '@/lib/config'

/**
 * Provides a stable, memoized API for dispatching visualizer actions.
 * Translates button presses into the playback transitions the reducer runs.
 *
 * @returns An object containing functions to dispatch all user intents.
 */
export function useHanoiActions() {
  const { puzzle } = useHanoiState()
  const dispatch = useHanoiDispatch()
  const { phase } = puzzle

  return useMemo(
    () => ({
      /** Rebuilds the puzzle with a new number of disks. */
      configure: (diskCount: number) => dispatch(actions.configure(diskCount)),

      /** Starts, pauses or resumes depending on the current phase. */
      togglePlayback: () => {
        switch (phase) {
          case 'idle':
            dispatch(actions.start())
            break
          case 'running':
            dispatch(actions.pause())
            break
          case 'paused':
            dispatch(actions.resume())
            break
          case 'completed':
            // Replay from the beginning.
            dispatch(actions.reset())
            dispatch(actions.start())
            break
        }
      },

      /** Puts every disk back on the source peg. */
      reset: () => dispatch(actions.reset()),
      /** Changes the delay between moves. */
      setSpeed: (speed: Speed) => dispatch(actions.setSpeed(speed)),
      openHelp: () => dispatch(actions.setHelpOpen(true)),
      closeHelp: () => dispatch(actions.setHelpOpen(false)),
    }),
    [phase, dispatch],
  )
}
