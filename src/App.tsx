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

import { Toaster } from 'sonner'

import { ControlPanel } from '@/components/ControlPanel'
import { HelpDialog } from '@/components/HelpDialog'
import { PlaybackStatus } from '@/components/PlaybackStatus'
import { PuzzleBoard } from '@/components/PuzzleBoard'
import { HanoiProvider } from '@/context/HanoiProvider'

export default function App() {
  return (
    <HanoiProvider>
      <main className="relative mx-auto flex min-h-screen max-w-4xl flex-col items-center gap-4 p-4">
        <h1 className="text-3xl font-bold">Tower of Hanoi</h1>
        <ControlPanel />
        <PlaybackStatus />
        <PuzzleBoard />
        <HelpDialog />
      </main>
      <Toaster richColors position="bottom-center" />
    </HanoiProvider>
  )
}
