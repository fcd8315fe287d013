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

import type { Speed } from '@/lib/config'
import type { PuzzleState } from '@/lib/playback'

export type { PlaybackPhase, PuzzleState } from '@/lib/playback'

export interface UiState {
  /** Delay preset between two automatic moves. */
  readonly speed: Speed
  readonly lastError: string | null
  readonly isHelpOpen: boolean
}

/** The complete state of the visualizer. */
export interface HanoiState {
  /** Pegs, move list and playback phase of the current run. */
  readonly puzzle: PuzzleState
  readonly ui: UiState
}
