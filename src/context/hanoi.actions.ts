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

import type { Speed } from '@/lib/config'
import type { HanoiAction } from './hanoi.actions.types'

export const configure = (diskCount: number): HanoiAction => ({ type: 'CONFIGURE', diskCount })
export const start = (): HanoiAction => ({ type: 'START' })
export const step = (): HanoiAction => ({ type: 'STEP' })
export const pause = (): HanoiAction => ({ type: 'PAUSE' })
export const resume = (): HanoiAction => ({ type: 'RESUME' })
export const reset = (): HanoiAction => ({ type: 'RESET' })
export const setSpeed = (speed: Speed): HanoiAction => ({ type: 'SET_SPEED', speed })
export const setHelpOpen = (open: boolean): HanoiAction => ({ type: 'SET_HELP_OPEN', open })
export const clearError = (): HanoiAction => ({ type: 'CLEAR_ERROR' })
