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

import { useHanoiState } from '@/context/hanoi.hooks'
import { initialState } from '@/context/hanoi.reducer'
import { useHanoiActions } from '@/hooks/useHanoiActions'
import { createActionMocks } from '@/test/hanoi.fixtures'

import { ControlPanel } from './ControlPanel'

vi.mock('@/context/hanoi.hooks')
vi.mock('@/hooks/useHanoiActions')

const mockUseHanoiState = vi.mocked(useHanoiState)
const mockUseHanoiActions = vi.mocked(useHanoiActions)

describe('ControlPanel component', () => {
  const mockActions = createActionMocks()

  beforeEach(() => {
    vi.clearAllMocks()
    mockUseHanoiState.mockReturnValue(initialState)
    mockUseHanoiActions.mockReturnValue(mockActions)
  })

  it('renders the settings and playback controls', () => {
    render(<ControlPanel />)

    expect(screen.getByRole('combobox', { name: /number of disks/i })).toBeInTheDocument()
    expect(screen.getByRole('combobox', { name: /speed/i })).toBeInTheDocument()
    expect(screen.getByRole('button', { name: 'Start' })).toBeInTheDocument()
    expect(screen.getByRole('button', { name: 'Reset' })).toBeInTheDocument()
  })

  it('opens the help dialog', async () => {
    const user = userEvent.setup()
    render(<ControlPanel />)

    await user.click(screen.getByRole('button', { name: 'Help' }))
    expect(mockActions.openHelp).toHaveBeenCalledOnce()
  })
})
