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

import { describe, expect, it, vi } from 'vitest'

import { InvalidDiskCountError, InvalidMoveError, InvalidStateError } from './errors'
import { solve, type Move } from './hanoi'
import type { MoveResult } from './playback'
import { PlaybackController } from './playback-controller'
import { isWellOrdered } from './pegs'

/** Steps until the controller leaves the running phase, collecting every result. */
function drain(controller: PlaybackController): MoveResult[] {
  const results: MoveResult[] = []
  while (controller.phase === 'running') {
    results.push(controller.step())
  }
  return results
}

describe('PlaybackController', () => {
  it('starts idle with three disks on the source peg', () => {
    const controller = new PlaybackController()
    expect(controller.phase).toBe('idle')
    expect(controller.diskCount).toBe(3)
    expect(controller.totalMoves).toBe(7)
    expect(controller.snapshot()).toEqual({
      pegs: { source: [3, 2, 1], auxiliary: [], destination: [] },
      state: 'idle',
    })
  })

  describe('configure', () => {
    it.each([0, 1, 2, 11, 100])('rejects %i disks', (n) => {
      const controller = new PlaybackController()
      expect(() => controller.configure(n)).toThrow(InvalidDiskCountError)
      expect(controller.diskCount).toBe(3)
    })

    it.each([3, 4, 5, 6, 7, 8, 9, 10])('accepts %i disks', (n) => {
      const controller = new PlaybackController()
      controller.configure(n)
      expect(controller.diskCount).toBe(n)
      expect(controller.totalMoves).toBe(2 ** n - 1)
      expect(controller.movesMade).toBe(0)
    })

    it('is refused outside idle', () => {
      const controller = new PlaybackController()
      controller.start()
      expect(() => controller.configure(4)).toThrow(InvalidStateError)
    })

    it('asks the move source for the new disk count', () => {
      const generate = vi.fn(solve)
      const controller = new PlaybackController({ generate })
      controller.configure(5)
      expect(generate).toHaveBeenLastCalledWith(5)
      expect(controller.totalMoves).toBe(31)
    })
  })

  it.each([3, 4, 5, 6, 7, 8, 9, 10])(
    'solves %i disks keeping every peg ordered after each move',
    (n) => {
      const controller = new PlaybackController({ diskCount: n })
      controller.start()

      let moves = 0
      while (controller.phase === 'running') {
        const result = controller.step()
        moves++
        expect(isWellOrdered(result.pegs)).toBe(true)
      }

      const expectedStack = Array.from({ length: n }, (_, i) => n - i)
      expect(moves).toBe(2 ** n - 1)
      expect(controller.snapshot()).toEqual({
        pegs: { source: [], auxiliary: [], destination: expectedStack },
        state: 'completed',
      })
    },
  )

  it('plays the three-disk solution and ends with the tower on the destination peg', () => {
    const controller = new PlaybackController({ diskCount: 3 })
    controller.start()
    const results = drain(controller)

    expect(results.map((r) => r.move)).toEqual(solve(3))
    expect(results[6]).toEqual({
      move: { diskSize: 1, from: 'source', to: 'destination' },
      movesMade: 7,
      movesRemaining: 0,
      totalMoves: 7,
      completed: true,
      pegs: { source: [], auxiliary: [], destination: [3, 2, 1] },
    })
  })

  it('plays fifteen moves for four disks', () => {
    const controller = new PlaybackController({ diskCount: 4 })
    controller.start()
    expect(drain(controller)).toHaveLength(15)
    expect(controller.snapshot().pegs.destination).toEqual([4, 3, 2, 1])
  })

  it('reports every step to the progress callback', () => {
    const onProgress = vi.fn()
    const controller = new PlaybackController({ onProgress })
    controller.start()
    const results = drain(controller)

    expect(onProgress).toHaveBeenCalledTimes(7)
    results.forEach((result, i) => {
      expect(onProgress.mock.calls[i][0]).toBe(result)
    })
  })

  describe('pause and resume', () => {
    it('neither skip nor repeat moves', () => {
      const reference = new PlaybackController({ diskCount: 5 })
      reference.start()
      const expected = drain(reference).map((r) => r.move)

      const controller = new PlaybackController({ diskCount: 5 })
      controller.start()
      const played: Move[] = []
      while (controller.phase === 'running') {
        played.push(controller.step().move)
        if (played.length % 4 === 0 && controller.phase === 'running') {
          controller.pause()
          expect(() => controller.step()).toThrow(InvalidStateError)
          expect(controller.movesMade).toBe(played.length)
          controller.resume()
        }
      }

      expect(played).toEqual(expected)
    })

    it('are refused in the wrong phase', () => {
      const controller = new PlaybackController()
      expect(() => controller.pause()).toThrow('Cannot pause while idle.')
      expect(() => controller.resume()).toThrow('Cannot resume while idle.')
      controller.start()
      expect(() => controller.resume()).toThrow('Cannot resume while running.')
      expect(() => controller.start()).toThrow('Cannot start while running.')
    })
  })

  describe('step', () => {
    it('is refused while idle, paused or completed', () => {
      const controller = new PlaybackController()
      expect(() => controller.step()).toThrow('Cannot step while idle.')

      controller.start()
      controller.pause()
      expect(() => controller.step()).toThrow('Cannot step while paused.')

      controller.resume()
      drain(controller)
      expect(() => controller.step()).toThrow('Cannot step while completed.')
    })

    it('resets the run when the move source is faulty', () => {
      const onProgress = vi.fn()
      const controller = new PlaybackController({
        onProgress,
        generate: () => [{ diskSize: 3, from: 'source', to: 'destination' }],
      })
      controller.start()

      expect(() => controller.step()).toThrow(
        new InvalidMoveError('Expected disk 3 on top of peg A, found disk 1.'),
      )
      expect(controller.phase).toBe('idle')
      expect(controller.movesMade).toBe(0)
      expect(controller.snapshot().pegs.source).toEqual([3, 2, 1])
      expect(onProgress).not.toHaveBeenCalled()
    })
  })

  describe('reset', () => {
    it.each(['running', 'paused', 'completed'] as const)(
      'returns to the starting position from %s and replays the same moves',
      (phase) => {
        const controller = new PlaybackController({ diskCount: 4 })
        controller.start()
        const firstRun = drain(controller).map((r) => r.move)
        controller.reset()

        controller.start()
        controller.step()
        controller.step()
        if (phase === 'paused') controller.pause()
        if (phase === 'completed') drain(controller)
        expect(controller.phase).toBe(phase)

        controller.reset()
        expect(controller.movesMade).toBe(0)
        expect(controller.snapshot()).toEqual({
          pegs: { source: [4, 3, 2, 1], auxiliary: [], destination: [] },
          state: 'idle',
        })

        controller.start()
        expect(drain(controller).map((r) => r.move)).toEqual(firstRun)
      },
    )

    it('keeps the configured disk count', () => {
      const controller = new PlaybackController()
      controller.configure(6)
      controller.start()
      controller.step()
      controller.reset()
      expect(controller.diskCount).toBe(6)
      expect(controller.snapshot().pegs.source).toEqual([6, 5, 4, 3, 2, 1])
    })
  })
})
