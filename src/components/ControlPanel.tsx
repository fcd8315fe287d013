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

import { CircleHelp } from 'lucide-react'
import { Button } from '@/components/ui/button'
import { useHanoiActions } from '@/hooks/useHanoiActions'
import { PlaybackButton } from './controls/PlaybackButton'
import { ResetButton } from './controls/ResetButton'
import { SettingsFields } from './controls/SettingsFields'

export function ControlPanel() {
  const { openHelp } = useHanoiActions()

  return (
    <div className="flex w-full flex-wrap items-center gap-4 rounded-lg border p-3">
      <SettingsFields />
      <div className="flex gap-2">
        <PlaybackButton />
        <ResetButton />
        <Button variant="ghost" onClick={openHelp} onMouseDown={(e) => e.preventDefault()}>
          <CircleHelp className="size-4" />
          Help
        </Button>
      </div>
    </div>
  )
}
