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

import { DEFAULT_DISK_COUNT } from './config'
import { InvalidMoveError } from './errors'
import { solve } from './hanoi'
import * as playback from './playback'
import type { MoveResult, MoveSource, PlaybackPhase, PuzzleSnapshot, PuzzleState } from './playback'

export interface PlaybackControllerOptions {
  diskCount?: number
  /** Called synchronously after every successful `step()`. */
  onProgress?: (result: MoveResult) => void
  /** Move list factory. Defaults to the optimal recursive solution. */
  generate?: MoveSource
}

/**
 * Owns one puzzle and exposes the playback state machine to whatever drives
 * it. The controller never schedules anything on its own: callers pace the
 * animation by calling `step()` on their own timer.
 */
export class PlaybackController {
  private state: PuzzleState
  private readonly onProgress?: (result: MoveResult) => void
  private readonly generate: MoveSource

  constructor(options: PlaybackControllerOptions = {}) {
    this.generate = options.generate ?? solve
    this.onProgress = options.onProgress
    this.state = playback.createPuzzle(options.diskCount ?? DEFAULT_DISK_COUNT, this.generate)
  }

  get phase(): PlaybackPhase {
    return this.state.phase
  }

  get diskCount(): number {
    return this.state.diskCount
  }

  get movesMade(): number {
    return this.state.cursor
  }

  get totalMoves(): number {
    return this.state.moves.length
  }

  /** Selects a new disk count. Only allowed while idle. */
  configure(diskCount: number): void {
    this.state = playback.configure(this.state, diskCount, this.generate)
  }

  start(): void {
    this.state = playback.start(this.state)
  }

  /**
   * Applies the next move. An `InvalidMoveError` ends the current run: the
   * puzzle is reset before the error is rethrown.
   */
  step(): MoveResult {
    let outcome: playback.StepOutcome
    try {
      outcome = playback.step(this.state)
    } catch (error) {
      if (error instanceof InvalidMoveError) {
        this.state = playback.reset(this.state)
      }
      throw error
    }

    this.state = outcome.state
    this.onProgress?.(outcome.result)
    return outcome.result
  }

  pause(): void {
    this.state = playback.pause(this.state)
  }

  resume(): void {
    this.state = playback.resume(this.state)
  }

  reset(): void {
    this.state = playback.reset(this.state)
  }

  snapshot(): PuzzleSnapshot {
    return playback.snapshot(this.state)
  }
}
