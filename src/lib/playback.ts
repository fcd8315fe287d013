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

import type { PegName } from './config'
import { InvalidMoveError, InvalidStateError } from './errors'
import { assertDiskCount, solve, type Move } from './hanoi'
import { applyMove, copyPegs, createInitialPegs, type Pegs } from './pegs'

export type PlaybackPhase = 'idle' | 'running' | 'paused' | 'completed'

export type PlaybackOperation = 'configure' | 'start' | 'step' | 'pause' | 'resume'

/** Produces the move list for a disk count. */
export type MoveSource = (diskCount: number) => readonly Move[]

/** Phases in which each operation is allowed. `reset` is allowed everywhere. */
const TRANSITIONS: Record<PlaybackOperation, readonly PlaybackPhase[]> = {
  configure: ['idle'],
  start: ['idle'],
  step: ['running'],
  pause: ['running'],
  resume: ['paused'],
}

export interface PuzzleState {
  readonly diskCount: number
  readonly pegs: Pegs
  readonly moves: readonly Move[]
  /** Number of moves already applied. */
  readonly cursor: number
  readonly phase: PlaybackPhase
  readonly lastMove: Move | null
}

export interface MoveResult {
  readonly move: Move
  readonly movesMade: number
  readonly movesRemaining: number
  readonly totalMoves: number
  readonly completed: boolean
  readonly pegs: Record<PegName, number[]>
}

export interface PuzzleSnapshot {
  /** Disk sizes per peg, bottom to top. */
  readonly pegs: Record<PegName, number[]>
  readonly state: PlaybackPhase
}

export interface StepOutcome {
  readonly state: PuzzleState
  readonly result: MoveResult
}

export function canPerform(phase: PlaybackPhase, operation: PlaybackOperation): boolean {
  return TRANSITIONS[operation].includes(phase)
}

function assertPhase(state: PuzzleState, operation: PlaybackOperation) {
  if (!canPerform(state.phase, operation)) {
    throw new InvalidStateError(operation, state.phase)
  }
}

export function createPuzzle(diskCount: number, source: MoveSource = solve): PuzzleState {
  assertDiskCount(diskCount)
  return {
    diskCount,
    pegs: createInitialPegs(diskCount),
    moves: source(diskCount),
    cursor: 0,
    phase: 'idle',
    lastMove: null,
  }
}

export function configure(
  state: PuzzleState,
  diskCount: number,
  source: MoveSource = solve,
): PuzzleState {
  assertPhase(state, 'configure')
  return createPuzzle(diskCount, source)
}

export function start(state: PuzzleState): PuzzleState {
  assertPhase(state, 'start')
  return { ...state, phase: 'running' }
}

/**
 * Applies the move under the cursor. The move is validated against the pegs
 * before it is applied, so a faulty move list surfaces as an
 * `InvalidMoveError` instead of an illegal position.
 */
export function step(state: PuzzleState): StepOutcome {
  assertPhase(state, 'step')
  if (state.cursor >= state.moves.length) {
    throw new InvalidMoveError(`No move left after ${state.cursor} of ${state.moves.length}.`)
  }

  const move = state.moves[state.cursor]
  const pegs = applyMove(state.pegs, move)
  const cursor = state.cursor + 1
  const completed = cursor >= state.moves.length

  const next: PuzzleState = {
    ...state,
    pegs,
    cursor,
    phase: completed ? 'completed' : 'running',
    lastMove: move,
  }

  return {
    state: next,
    result: {
      move,
      movesMade: cursor,
      movesRemaining: state.moves.length - cursor,
      totalMoves: state.moves.length,
      completed,
      pegs: copyPegs(pegs),
    },
  }
}

export function pause(state: PuzzleState): PuzzleState {
  assertPhase(state, 'pause')
  return { ...state, phase: 'paused' }
}

export function resume(state: PuzzleState): PuzzleState {
  assertPhase(state, 'resume')
  return { ...state, phase: 'running' }
}

/** Puts every disk back on the source peg. The move list is kept. */
export function reset(state: PuzzleState): PuzzleState {
  return {
    ...state,
    pegs: createInitialPegs(state.diskCount),
    cursor: 0,
    phase: 'idle',
    lastMove: null,
  }
}

export function snapshot(state: PuzzleState): PuzzleSnapshot {
  return { pegs: copyPegs(state.pegs), state: state.phase }
}
