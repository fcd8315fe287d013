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

import { MAX_DISKS, MIN_DISKS, PegName } from './config'
import { InvalidDiskCountError } from './errors'

/** A single transfer of one disk between two pegs. */
export interface Move {
  readonly diskSize: number
  readonly from: PegName
  readonly to: PegName
}

export function isValidDiskCount(n: number): boolean {
  return Number.isInteger(n) && n >= MIN_DISKS && n <= MAX_DISKS
}

export function assertDiskCount(n: number): void {
  if (!isValidDiskCount(n)) {
    throw new InvalidDiskCountError(n)
  }
}

/** Length of the optimal solution for `n` disks. */
export function totalMoves(n: number): number {
  return 2 ** n - 1
}

function* moveTower(
  n: number,
  source: PegName,
  auxiliary: PegName,
  destination: PegName,
): Generator<Move, void, undefined> {
  if (n === 0) return

  yield* moveTower(n - 1, source, destination, auxiliary)
  yield { diskSize: n, from: source, to: destination }
  yield* moveTower(n - 1, auxiliary, source, destination)
}

/**
 * Produces the optimal move sequence carrying `n` disks from `source` to
 * `destination`. The disk count is checked immediately; the moves themselves
 * are generated lazily, and every iteration of the returned iterable starts
 * again from the first move.
 */
export function generateMoves(
  n: number,
  source: PegName,
  auxiliary: PegName,
  destination: PegName,
): Iterable<Move> {
  assertDiskCount(n)
  return {
    [Symbol.iterator]: () => moveTower(n, source, auxiliary, destination),
  }
}

/** The full solution from the source peg to the destination peg. */
export function solve(n: number): readonly Move[] {
  return Object.freeze(
    Array.from(generateMoves(n, PegName.SOURCE, PegName.AUXILIARY, PegName.DESTINATION)),
  )
}
