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

import { describe, expect, it } from 'vitest'

import {
  InvalidDiskCountError,
  InvalidMoveError,
  InvalidStateError,
  isHanoiError,
} from './errors'

describe('error classes', () => {
  it('describe an out-of-range disk count', () => {
    const error = new InvalidDiskCountError(11)
    expect(error.message).toBe('Number of disks must be between 3 and 10, got 11.')
    expect(error.code).toBe('INVALID_DISK_COUNT')
    expect(error.name).toBe('InvalidDiskCountError')
    expect(error.diskCount).toBe(11)
  })

  it('describe a forbidden transition', () => {
    const error = new InvalidStateError('pause', 'idle')
    expect(error.message).toBe('Cannot pause while idle.')
    expect(error.code).toBe('INVALID_STATE')
    expect(error.operation).toBe('pause')
    expect(error.phase).toBe('idle')
  })

  it('carry the move failure message', () => {
    const error = new InvalidMoveError('bad move')
    expect(error.code).toBe('INVALID_MOVE')
    expect(error).toBeInstanceOf(Error)
  })

  it('are recognised by isHanoiError', () => {
    expect(isHanoiError(new InvalidMoveError('x'))).toBe(true)
    expect(isHanoiError(new Error('x'))).toBe(false)
    expect(isHanoiError('x')).toBe(false)
  })
})
