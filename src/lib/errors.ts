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

import { MAX_DISKS, MIN_DISKS } from './config'

export type HanoiErrorCode = 'INVALID_DISK_COUNT' | 'INVALID_STATE' | 'INVALID_MOVE'

/**
 * Base class for every failure raised by the puzzle core.
 */
export abstract class HanoiError extends Error {
  abstract readonly code: HanoiErrorCode
}

/** The requested disk count is outside the supported range. */
export class InvalidDiskCountError extends HanoiError {
  readonly code = 'INVALID_DISK_COUNT'
  readonly diskCount: number

  constructor(diskCount: number) {
    super(`Number of disks must be between ${MIN_DISKS} and ${MAX_DISKS}, got ${diskCount}.`)
    this.name = 'InvalidDiskCountError'
    this.diskCount = diskCount
  }
}

/** A control call was issued in a playback phase that forbids it. */
export class InvalidStateError extends HanoiError {
  readonly code = 'INVALID_STATE'
  readonly operation: string
  readonly phase: string

  constructor(operation: string, phase: string) {
    super(`Cannot ${operation} while ${phase}.`)
    this.name = 'InvalidStateError'
    this.operation = operation
    this.phase = phase
  }
}

/**
 * The pending move does not fit the current pegs. Only a faulty move
 * source can produce this.
 */
export class InvalidMoveError extends HanoiError {
  readonly code = 'INVALID_MOVE'

  constructor(message: string) {
    super(message)
    this.name = 'InvalidMoveError'
  }
}

export function isHanoiError(error: unknown): error is HanoiError {
  return error instanceof HanoiError
}
