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

import { useHanoiState } from '@/context/hanoi.hooks'
import { useHanoiActions } from '@/hooks/useHanoiActions'
import { MAX_DISKS, MIN_DISKS, SPEEDS, type Speed } from '@/lib/config'

const DISK_OPTIONS = Array.from({ length: MAX_DISKS - MIN_DISKS + 1 }, (_, i) => MIN_DISKS + i)

const SPEED_LABELS: Record<Speed, string> = {
  slow: 'Slow',
  normal: 'Normal',
  fast: 'Fast',
}

function isSpeed(value: string): value is Speed {
  return value in SPEEDS
}

const selectClassName =
  'h-9 rounded-md border bg-transparent px-2 text-sm disabled:cursor-not-allowed disabled:opacity-50'

/**
 * Disk count and speed pickers. The disk count is locked while an
 * animation is in progress.
 */
export function SettingsFields() {
  const { puzzle, ui } = useHanoiState()
  const { configure, setSpeed } = useHanoiActions()

  const isPlaying = puzzle.phase === 'running' || puzzle.phase === 'paused'

  return (
    <div className="flex items-center gap-4">
      <label className="flex items-center gap-2 text-sm">
        Number of disks
        <select
          className={selectClassName}
          value={puzzle.diskCount}
          disabled={isPlaying}
          onChange={(e) => configure(Number(e.target.value))}
        >
          {DISK_OPTIONS.map((n) => (
            <option key={n} value={n}>
              {n}
            </option>
          ))}
        </select>
      </label>
      <label className="flex items-center gap-2 text-sm">
        Speed
        <select
          className={selectClassName}
          value={ui.speed}
          onChange={(e) => {
            if (isSpeed(e.target.value)) setSpeed(e.target.value)
          }}
        >
          {Object.entries(SPEED_LABELS).map(([value, label]) => (
            <option key={value} value={value}>
              {label}
            </option>
          ))}
        </select>
      </label>
    </div>
  )
}
