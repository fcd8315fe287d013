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

import { X } from 'lucide-react'
import { Button } from '@/components/ui/button'
import { useHanoiState } from '@/context/hanoi.hooks'
import { useHanoiActions } from '@/hooks/useHanoiActions'
import { MAX_DISKS, MIN_DISKS } from '@/lib/config'

/**
 * Usage instructions, shown as an overlay when the Help button is pressed.
 */
export function HelpDialog() {
  const { ui } = useHanoiState()
  const { closeHelp } = useHanoiActions()

  if (!ui.isHelpOpen) {
    return null
  }

  return (
    <div className="absolute inset-0 z-20 flex items-center justify-center">
      <div
        role="dialog"
        aria-modal="true"
        aria-labelledby="help-title"
        className="bg-background/80 flex max-w-lg flex-col gap-3 rounded-lg border p-6 text-sm shadow-2xl backdrop-blur-lg"
      >
        <div className="flex items-center justify-between">
          <h2 id="help-title" className="text-xl font-bold">
            How it works
          </h2>
          <Button variant="ghost" size="icon" onClick={closeHelp} aria-label="Close help">
            <X className="size-4" />
          </Button>
        </div>
        <section>
          <h3 className="font-semibold">Objective</h3>
          <p>Move every disk from peg A to peg C:</p>
          <ul className="list-disc pl-5">
            <li>Only one disk moves at a time.</li>
            <li>Only the top disk of a peg can move.</li>
            <li>A larger disk never rests on a smaller one.</li>
          </ul>
        </section>
        <section>
          <h3 className="font-semibold">Controls</h3>
          <ul className="list-disc pl-5">
            <li>
              Number of disks: {MIN_DISKS} to {MAX_DISKS}.
            </li>
            <li>Speed: slow, normal or fast animation.</li>
            <li>Start / Pause / Resume: control the animation.</li>
            <li>Reset: return every disk to peg A.</li>
          </ul>
        </section>
        <section>
          <h3 className="font-semibold">Keyboard shortcuts</h3>
          <ul className="list-disc pl-5">
            <li>Space: pause or resume</li>
            <li>Enter: start</li>
            <li>R: reset</li>
          </ul>
        </section>
        <p>
          The recursive solution takes 2<sup>n</sup> - 1 moves for n disks, the fewest possible.
        </p>
      </div>
    </div>
  )
}
