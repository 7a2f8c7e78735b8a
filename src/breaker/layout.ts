// Arena layout: the 8x14 target grid for one level.
// Special targets are placed from a generator seeded with a fixed value, so
// the same boundX always yields the same grid no matter what the gameplay
// generator has drawn before.

import type { BonusKind, Target } from './entities'
import { BONUS_KINDS, REFLECTIVE_WALL_COLOR, WALL_COLOR, tierColor, tierForRow, tierPoints } from './entities'
import type { Rng } from './random'
import { createRng, randomInt } from './random'
import {
  BORDER_COLUMNS,
  COLUMNS,
  COUNTER_DURABILITY,
  INDESTRUCTIBLE,
  LAYOUT_SEED,
  ROWS,
  ROWS_PER_TIER,
  TARGET_GAP,
  TARGET_HEIGHT,
  TARGET_START_Y,
} from './constants'

interface RowSpecials {
  counterColumn: number
  bonusColumn: number
  bonusKind: BonusKind
}

export function targetWidth(boundX: number): number {
  return (2 * boundX - (COLUMNS - 1) * TARGET_GAP) / COLUMNS
}

// Column drawn uniformly from the non-border band.
function drawInnerColumn(rng: Rng): number {
  return BORDER_COLUMNS + randomInt(rng, COLUMNS - 2 * BORDER_COLUMNS)
}

function drawRowSpecials(rng: Rng): RowSpecials {
  const counterColumn = drawInnerColumn(rng)
  let bonusColumn = drawInnerColumn(rng)
  while (bonusColumn === counterColumn) {
    bonusColumn = drawInnerColumn(rng)
  }
  const bonusKind = BONUS_KINDS[randomInt(rng, BONUS_KINDS.length)]
  return { counterColumn, bonusColumn, bonusKind }
}

function placeTarget(target: Target, boundX: number): void {
  const width = targetWidth(boundX)
  target.size.x = width
  target.size.y = TARGET_HEIGHT
  target.position.x = -boundX + target.column * (width + TARGET_GAP)
  target.position.y = TARGET_START_Y - target.row * (TARGET_HEIGHT + TARGET_GAP)
}

function createTarget(row: number, column: number, boundX: number, specials: RowSpecials): Target {
  const tier = tierForRow(row, ROWS_PER_TIER)
  const target: Target = {
    position: { x: 0, y: 0 },
    size: { x: 0, y: 0 },
    color: tierColor(tier),
    row,
    column,
    tier,
    active: true,
    points: tierPoints(tier),
    durability: 1,
    maxDurability: 1,
    isWall: false,
    isReflective: false,
    isBonus: false,
    bonusKind: null,
  }
  placeTarget(target, boundX)

  const outer = column === 0 || column === COLUMNS - 1
  const inner = column === 1 || column === COLUMNS - 2
  if (row === 0 && (outer || inner)) {
    target.isWall = true
    target.isReflective = inner
    target.durability = INDESTRUCTIBLE
    target.maxDurability = INDESTRUCTIBLE
    target.color = { ...(inner ? REFLECTIVE_WALL_COLOR : WALL_COLOR) }
  } else if (column === specials.counterColumn) {
    target.durability = COUNTER_DURABILITY
    target.maxDurability = COUNTER_DURABILITY
  } else if (column === specials.bonusColumn) {
    target.isBonus = true
    target.bonusKind = specials.bonusKind
  }
  return target
}

/**
 * Build a fresh grid for the given horizontal bound.
 * Rows are emitted top to bottom, columns left to right; collision
 * resolution relies on this order.
 */
export function buildLevel(boundX: number, seed: number = LAYOUT_SEED): Target[] {
  const rng = createRng(seed)
  const specials: RowSpecials[] = []
  for (let row = 0; row < ROWS; row++) {
    specials.push(drawRowSpecials(rng))
  }

  const targets: Target[] = []
  for (let row = 0; row < ROWS; row++) {
    for (let column = 0; column < COLUMNS; column++) {
      targets.push(createTarget(row, column, boundX, specials[row]))
    }
  }
  return targets
}

// Position-only re-layout after a resize; state, type and color are untouched.
export function relayout(targets: Target[], boundX: number): void {
  for (const target of targets) {
    placeTarget(target, boundX)
  }
}
