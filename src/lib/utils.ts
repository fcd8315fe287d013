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

import { clsx, type ClassValue } from 'clsx'
import { twMerge } from 'tailwind-merge'

import { DISK_COLOURS, PEG_LABELS } from './config'
import type { Move } from './hanoi'

export function cn(...inputs: ClassValue[]) {
  return twMerge(clsx(inputs))
}

export function formatMove(move: Move): string {
  return `Move disk ${move.diskSize} from ${PEG_LABELS[move.from]} to ${PEG_LABELS[move.to]}`
}

export function diskColour(size: number): string {
  return DISK_COLOURS[size - 1] ?? '#CCCCCC'
}

/** Disk width as a percentage of the widest disk slot. */
export function diskWidthPercent(size: number, diskCount: number): number {
  return Math.round((size / diskCount) * 100)
}
