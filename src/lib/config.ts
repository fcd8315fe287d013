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

export const MIN_DISKS = 3
export const MAX_DISKS = 10
export const DEFAULT_DISK_COUNT = 3

export const PegName = {
  SOURCE: 'source',
  AUXILIARY: 'auxiliary',
  DESTINATION: 'destination',
} as const

export type PegName = (typeof PegName)[keyof typeof PegName]

/** Pegs in display order, left to right. */
export const PEG_ORDER: readonly PegName[] = [PegName.SOURCE, PegName.AUXILIARY, PegName.DESTINATION]

export const PEG_LABELS: Record<PegName, string> = {
  source: 'A',
  auxiliary: 'B',
  destination: 'C',
}

/** Milliseconds between two moves for each playback speed. */
export const SPEEDS = {
  slow: 1000,
  normal: 500,
  fast: 100,
} as const

export type Speed = keyof typeof SPEEDS

export const DEFAULT_SPEED: Speed = 'normal'

// Colour-blind friendly palette, indexed by disk size - 1.
export const DISK_COLOURS = [
  '#E8F4FD',
  '#4A90E2',
  '#7ED321',
  '#F5A623',
  '#D0021B',
  '#9013FE',
  '#50E3C2',
  '#B8E986',
  '#F8E71C',
  '#BD10E0',
] as const
