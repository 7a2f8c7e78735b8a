// Entity records owned by the simulation. Each embeds a Rect plus a color;
// collision code dispatches on the record type, never on inheritance.

import type { Color, Rect, Vec2 } from './vec'
import { rgba, darken } from './vec'
import {
  BALL_RADIUS,
  DARKEN_FACTOR,
  INITIAL_BALL_SPEED,
  PADDLE_HEIGHT,
  PADDLE_WIDTH,
  PADDLE_Y,
  PICKUP_FALL_SPEED,
  PICKUP_SIZE,
  TIER_POINTS,
} from './constants'

// Scoring bands, top rows first.
export type Tier = 'top' | 'second' | 'third' | 'bottom'

export const TIERS: readonly Tier[] = ['top', 'second', 'third', 'bottom']

// Pickup effects. Index order is the draw order used by the layout generator.
export type BonusKind =
  | 'life-add'
  | 'life-remove'
  | 'paddle-widen'
  | 'paddle-shrink'
  | 'ball-slow'
  | 'ball-fast'
  | 'straighten'
  | 'widen-angle'

export const BONUS_KINDS: readonly BonusKind[] = [
  'life-add',
  'life-remove',
  'paddle-widen',
  'paddle-shrink',
  'ball-slow',
  'ball-fast',
  'straighten',
  'widen-angle',
]

export interface Paddle extends Rect {
  color: Color
}

export interface Ball extends Rect {
  color: Color
  velocity: Vec2
  // Target speed; velocity is rescaled to it after every change.
  speedMagnitude: number
  stuckToPaddle: boolean
  // Destructible hits since the last reset, drives the speed-up milestones.
  hitCount: number
}

export interface Target extends Rect {
  color: Color
  row: number
  column: number
  tier: Tier
  active: boolean
  points: number
  // Remaining hits, or INDESTRUCTIBLE.
  durability: number
  maxDurability: number
  isWall: boolean
  isReflective: boolean
  isBonus: boolean
  bonusKind: BonusKind | null
}

export interface FallingPickup extends Rect {
  color: Color
  kind: BonusKind
  fallSpeed: number
  active: boolean
}

export const PADDLE_COLOR: Color = rgba(0.8, 0.8, 0.8)
export const BALL_COLOR: Color = rgba(1, 1, 1)
export const WALL_COLOR: Color = rgba(0.5, 0.5, 0.5)
export const REFLECTIVE_WALL_COLOR: Color = rgba(1, 1, 1)

const TIER_COLORS: Record<Tier, Color> = {
  top: rgba(1, 0.2, 0.2),
  second: rgba(1, 0.6, 0.2),
  third: rgba(0.2, 1, 0.2),
  bottom: rgba(1, 1, 0.2),
}

const PICKUP_COLORS: Record<BonusKind, Color> = {
  'life-add': rgba(0.2, 1, 0.2),
  'life-remove': rgba(1, 0.2, 0.2),
  'paddle-widen': rgba(0.2, 0.8, 1),
  'paddle-shrink': rgba(1, 0.5, 0),
  'ball-slow': rgba(1, 1, 0.2),
  'ball-fast': rgba(0.8, 0.2, 1),
  'straighten': rgba(1, 1, 1),
  'widen-angle': rgba(0.6, 0.6, 0.6),
}

export function tierForRow(row: number, rowsPerTier: number): Tier {
  const idx = Math.min(TIERS.length - 1, Math.floor(row / rowsPerTier))
  return TIERS[idx]
}

export function tierPoints(tier: Tier): number {
  return TIER_POINTS[TIERS.indexOf(tier)]
}

export function tierColor(tier: Tier, damaged = false): Color {
  const base = { ...TIER_COLORS[tier] }
  return damaged ? darken(base, DARKEN_FACTOR) : base
}

export function pickupColor(kind: BonusKind): Color {
  return { ...PICKUP_COLORS[kind] }
}

// Paddle centred on x = 0.
export function createPaddle(width = PADDLE_WIDTH): Paddle {
  return {
    position: { x: -width / 2, y: PADDLE_Y },
    size: { x: width, y: PADDLE_HEIGHT },
    color: { ...PADDLE_COLOR },
  }
}

// Ball resting on the paddle, waiting for launch.
export function createBall(paddle: Paddle): Ball {
  const ball: Ball = {
    position: { x: 0, y: 0 },
    size: { x: BALL_RADIUS * 2, y: BALL_RADIUS * 2 },
    color: { ...BALL_COLOR },
    velocity: { x: 0, y: 0 },
    speedMagnitude: INITIAL_BALL_SPEED,
    stuckToPaddle: true,
    hitCount: 0,
  }
  placeOnPaddle(ball, paddle)
  return ball
}

export function placeOnPaddle(ball: Ball, paddle: Paddle): void {
  ball.position.x = paddle.position.x + paddle.size.x / 2 - ball.size.x / 2
  ball.position.y = paddle.position.y + paddle.size.y
}

export function createPickup(kind: BonusKind, at: Vec2): FallingPickup {
  return {
    position: { x: at.x, y: at.y },
    size: { x: PICKUP_SIZE, y: PICKUP_SIZE },
    color: pickupColor(kind),
    kind,
    fallSpeed: PICKUP_FALL_SPEED,
    active: true,
  }
}
