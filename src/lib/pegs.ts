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

import { PEG_LABELS, PEG_ORDER, type PegName } from './config'
import { InvalidMoveError } from './errors'
import type { Move } from './hanoi'

/**
 * Disk sizes on each peg, bottom to top. The last element is the top disk.
 */
export type Pegs = Readonly<Record<PegName, readonly number[]>>

export function createInitialPegs(diskCount: number): Pegs {
  return {
    source: Array.from({ length: diskCount }, (_, i) => diskCount - i),
    auxiliary: [],
    destination: [],
  }
}

export function topDisk(stack: readonly number[]): number | null {
  return stack.length > 0 ? stack[stack.length - 1] : null
}

/**
 * Checks `move` against the current pegs and returns the pegs after it.
 * The input is left untouched.
 *
 * @throws {InvalidMoveError} When the disk is not on top of its peg or
 * would land on a smaller disk.
 */
export function applyMove(pegs: Pegs, move: Move): Pegs {
  const fromLabel = PEG_LABELS[move.from]
  const toLabel = PEG_LABELS[move.to]

  if (move.from === move.to) {
    throw new InvalidMoveError(`Cannot move disk ${move.diskSize} from peg ${fromLabel} onto itself.`)
  }

  const moving = topDisk(pegs[move.from])
  if (moving === null) {
    throw new InvalidMoveError(`Cannot move disk ${move.diskSize}: peg ${fromLabel} is empty.`)
  }
  if (moving !== move.diskSize) {
    throw new InvalidMoveError(
      `Expected disk ${move.diskSize} on top of peg ${fromLabel}, found disk ${moving}.`,
    )
  }

  const target = topDisk(pegs[move.to])
  if (target !== null && target < moving) {
    throw new InvalidMoveError(
      `Cannot place disk ${moving} on smaller disk ${target} on peg ${toLabel}.`,
    )
  }

  return {
    ...pegs,
    [move.from]: pegs[move.from].slice(0, -1),
    [move.to]: [...pegs[move.to], moving],
  }
}

/** True when every peg holds strictly decreasing sizes from bottom to top. */
export function isWellOrdered(pegs: Pegs): boolean {
  return PEG_ORDER.every((name) => pegs[name].every((size, i, stack) => i === 0 || stack[i - 1] > size))
}

export function isSolved(pegs: Pegs, diskCount: number): boolean {
  return (
    pegs.source.length === 0 &&
    pegs.auxiliary.length === 0 &&
    pegs.destination.length === diskCount
  )
}

export function copyPegs(pegs: Pegs): Record<PegName, number[]> {
  return {
    source: [...pegs.source],
    auxiliary: [...pegs.auxiliary],
    destination: [...pegs.destination],
  }
}
