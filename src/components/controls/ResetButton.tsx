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

import { Undo2 } from 'lucide-react'
import { Button } from '@/components/ui/button'
import { useHanoiState } from '@/context/hanoi.hooks'
import { useHanoiActions } from '@/hooks/useHanoiActions'
import { cn } from '@/lib/utils'

interface ResetButtonProps {
  readonly className?: string
}

/**
 * Stops the animation and puts every disk back on the first peg. Disabled
 * while the puzzle is already in its starting position.
 */
export function ResetButton({ className }: ResetButtonProps) {
  const { puzzle } = useHanoiState()
  const { reset } = useHanoiActions()

  const isPristine = puzzle.phase === 'idle' && puzzle.cursor === 0

  return (
    <Button
      variant="secondary"
      onClick={reset}
      className={cn('w-28', className)}
      disabled={isPristine}
      title={isPristine ? 'Puzzle is already at the start.' : 'Reset the puzzle'}
      onMouseDown={(e) => e.preventDefault()}
    >
      <Undo2 className="size-4" />
      Reset
    </Button>
  )
}
