// Per-game counters and per-level one-shot flags, plus the World record that
// owns every entity of a running simulation.

import type { Ball, FallingPickup, Paddle, Target } from './entities'
import type { Rng } from './random'
import { INITIAL_LIVES } from './constants'

export type Phase = 'MENU' | 'PLAYING' | 'GAME_OVER'

// Half-extents of the visible arena; one of them is always 1.
export interface Bounds {
  x: number
  y: number
}

export interface LevelFlags {
  // First destructible hit on a top-tier target this level (speed-up spent).
  topTierReached: boolean
  secondTierReached: boolean
  // First ceiling contact already halved the paddle.
  paddleShrunk: boolean
}

export interface SessionState {
  score: number
  lives: number
  level: number
  flags: LevelFlags
}

export interface World {
  phase: Phase
  bounds: Bounds
  session: SessionState
  paddle: Paddle
  ball: Ball
  targets: Target[]
  pickups: FallingPickup[]
  // Gameplay randomness only (launch direction); layout has its own seed.
  rng: Rng
  layoutSeed: number
  quit: boolean
}

export function createLevelFlags(): LevelFlags {
  return { topTierReached: false, secondTierReached: false, paddleShrunk: false }
}

export function createSession(): SessionState {
  return { score: 0, lives: INITIAL_LIVES, level: 1, flags: createLevelFlags() }
}

export function resetLevelFlags(session: SessionState): void {
  session.flags = createLevelFlags()
}

// Walls never count: a level is cleared once every breakable target is gone.
export function isLevelCleared(targets: readonly Target[]): boolean {
  return targets.every((t) => t.isWall || !t.active)
}
