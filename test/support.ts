// Shared fixtures for the engine tests
import type { InputSnapshot } from '../src/breaker/engine'
import type { Target } from '../src/breaker/entities'
import type { World } from '../src/breaker/session'
import type { Rng } from '../src/breaker/random'
import { IDLE_INPUT, createWorld, startGame } from '../src/breaker/engine'
import { tierColor } from '../src/breaker/entities'

// 960x540 viewport: boundX = 16/9, boundY = 1
export function playingWorld(gameplaySeed = 7): World {
  const world = createWorld({ gameplaySeed })
  startGame(world)
  return world
}

export function input(partial: Partial<InputSnapshot> = {}): InputSnapshot {
  return { ...IDLE_INPUT, ...partial }
}

// Put the ball in flight at a given position and velocity; speed follows the velocity.
export function fly(world: World, x: number, y: number, vx: number, vy: number): void {
  const { ball } = world
  ball.stuckToPaddle = false
  ball.position = { x, y }
  ball.velocity = { x: vx, y: vy }
  ball.speedMagnitude = Math.hypot(vx, vy)
}

// Breakable third-tier target at (0, 0.5), 0.2 x 0.06
export function makeTarget(overrides: Partial<Target> = {}): Target {
  return {
    position: { x: 0, y: 0.5 },
    size: { x: 0.2, y: 0.06 },
    color: tierColor('third'),
    row: 4,
    column: 5,
    tier: 'third',
    active: true,
    points: 3,
    durability: 1,
    maxDurability: 1,
    isWall: false,
    isReflective: false,
    isBonus: false,
    bonusKind: null,
    ...overrides,
  }
}

// Replays the given values in a loop
export function sequenceRng(values: number[]): Rng {
  let i = 0
  return () => values[i++ % values.length]
}
