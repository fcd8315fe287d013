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

import { render, screen } from '@testing-library/react'
import userEvent from '@testing-library/user-event'
import { beforeEach, describe, expect, it, vi } from 'vitest'

import { pause, start } from '@/context/hanoi.actions'
import { useHanoiState } from '@/context/hanoi.hooks'
import { initialState } from '@/context/hanoi.reducer'
import type { HanoiState } from '@/context/hanoi.types'
import { useHanoiActions } from '@/hooks/useHanoiActions'
import { createActionMocks, stateAfter, steps } from '@/test/hanoi.fixtures'

import { SettingsFields } from './SettingsFields'

vi.mock('@/context/hanoi.hooks')
vi.mock('@/hooks/useHanoiActions')

const mockUseHanoiState = vi.mocked(useHanoiState)
const mockUseHanoiActions = vi.mocked(useHanoiActions)

const diskSelect = () => screen.getByRole('combobox', { name: /number of disks/i })
const speedSelect = () => screen.getByRole('combobox', { name: /speed/i })

describe('SettingsFields component', () => {
  const mockActions = createActionMocks()

  beforeEach(() => {
    vi.clearAllMocks()
    mockUseHanoiActions.mockReturnValue(mockActions)
  })

  it('offers disk counts from 3 to 10 and the three speeds', () => {
    mockUseHanoiState.mockReturnValue(initialState)
    render(<SettingsFields />)

    const diskOptions = Array.from(diskSelect().querySelectorAll('option'), (o) => o.value)
    expect(diskOptions).toEqual(['3', '4', '5', '6', '7', '8', '9', '10'])
    expect(diskSelect()).toHaveValue('3')

    const speedOptions = Array.from(speedSelect().querySelectorAll('option'), (o) => o.textContent)
    expect(speedOptions).toEqual(['Slow', 'Normal', 'Fast'])
    expect(speedSelect()).toHaveValue('normal')
  })

  it('configures the puzzle when a disk count is picked', async () => {
    const user = userEvent.setup()
    mockUseHanoiState.mockReturnValue(initialState)
    render(<SettingsFields />)

    await user.selectOptions(diskSelect(), '5')
    expect(mockActions.configure).toHaveBeenCalledWith(5)
  })

  it('changes the speed when one is picked', async () => {
    const user = userEvent.setup()
    mockUseHanoiState.mockReturnValue(initialState)
    render(<SettingsFields />)

    await user.selectOptions(speedSelect(), 'Fast')
    expect(mockActions.setSpeed).toHaveBeenCalledWith('fast')
  })

  const playingStates: [string, HanoiState][] = [
    ['running', stateAfter(start())],
    ['paused', stateAfter(start(), ...steps(1), pause())],
  ]

  it.each(playingStates)('locks the disk count while %s', (_phase, state) => {
    mockUseHanoiState.mockReturnValue(state)
    render(<SettingsFields />)
    expect(diskSelect()).toBeDisabled()
    expect(speedSelect()).toBeEnabled()
  })

  it('unlocks the disk count once the run has finished', () => {
    mockUseHanoiState.mockReturnValue(stateAfter(start(), ...steps(7)))
    render(<SettingsFields />)
    expect(diskSelect()).toBeEnabled()
  })
})
