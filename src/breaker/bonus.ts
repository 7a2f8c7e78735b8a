// Falling pickups and the eight modifiers they carry.

import type { BonusKind, FallingPickup, Target } from './entities'
import type { World } from './session'
import { createPickup } from './entities'
import { signOf } from './vec'
import { composeVelocity, setSpeed } from './speed'
import { overlaps, clampPaddle } from './collision'
import {
  BALL_FAST_FACTOR,
  BALL_SLOW_FACTOR,
  MAX_BALL_SPEED,
  MAX_LIVES,
  MIN_BALL_SPEED,
  MIN_LIVES_FROM_PICKUP,
  PADDLE_MAX_ARENA_FRACTION,
  PADDLE_MIN_WIDTH,
  PADDLE_SHRINK_FACTOR,
  PADDLE_WIDEN_FACTOR,
  PICKUP_SIZE,
  STRAIGHTEN_X_RATIO,
  WIDEN_ANGLE_X_RATIO,
} from './constants'

export type PickupOutcome = 'collected' | 'missed'

export interface PickupEvent {
  pickup: FallingPickup
  outcome: PickupOutcome
}

// Pickup appears centred where the bonus target used to be.
export function spawnPickup(world: World, target: Target): FallingPickup | null {
  if (!target.isBonus || target.bonusKind === null) return null
  const at = {
    x: target.position.x + target.size.x / 2 - PICKUP_SIZE / 2,
    y: target.position.y + target.size.y / 2 - PICKUP_SIZE / 2,
  }
  const pickup = createPickup(target.bonusKind, at)
  world.pickups.push(pickup)
  return pickup
}

// Re-aim the ball so its horizontal share is exactly `ratio` of the speed,
// keeping both signs and the magnitude.
function reaim(world: World, ratio: number): void {
  const { ball } = world
  const speed = ball.speedMagnitude
  ball.velocity = composeVelocity(speed, signOf(ball.velocity.x) * ratio * speed, signOf(ball.velocity.y), 0)
}

export function applyModifier(world: World, kind: BonusKind): void {
  const { session, paddle, ball, bounds } = world
  switch (kind) {
    case 'life-add':
      session.lives = Math.min(session.lives + 1, MAX_LIVES)
      break
    case 'life-remove':
      session.lives = Math.max(session.lives - 1, MIN_LIVES_FROM_PICKUP)
      break
    case 'paddle-widen':
      paddle.size.x = Math.min(paddle.size.x * PADDLE_WIDEN_FACTOR, 2 * bounds.x * PADDLE_MAX_ARENA_FRACTION)
      clampPaddle(world)
      break
    case 'paddle-shrink':
      paddle.size.x = Math.max(paddle.size.x * PADDLE_SHRINK_FACTOR, PADDLE_MIN_WIDTH)
      clampPaddle(world)
      break
    case 'ball-slow':
      setSpeed(ball, Math.max(ball.speedMagnitude * BALL_SLOW_FACTOR, MIN_BALL_SPEED), world.rng)
      break
    case 'ball-fast':
      setSpeed(ball, Math.min(ball.speedMagnitude * BALL_FAST_FACTOR, MAX_BALL_SPEED), world.rng)
      break
    case 'straighten':
      if (!ball.stuckToPaddle && Math.abs(ball.velocity.x) > STRAIGHTEN_X_RATIO * ball.speedMagnitude) {
        reaim(world, STRAIGHTEN_X_RATIO)
      }
      break
    case 'widen-angle':
      if (!ball.stuckToPaddle && Math.abs(ball.velocity.x) < WIDEN_ANGLE_X_RATIO * ball.speedMagnitude) {
        reaim(world, WIDEN_ANGLE_X_RATIO)
      }
      break
  }
}

/**
 * Move every active pickup down by one frame, then expire the ones that left
 * the arena and collect the ones touching the paddle. Inactive pickups stay in
 * the list until prunePickups runs.
 */
export function advancePickups(world: World, dt: number): PickupEvent[] {
  const events: PickupEvent[] = []
  for (const pickup of world.pickups) {
    if (!pickup.active) continue
    pickup.position.y -= pickup.fallSpeed * dt
    if (pickup.position.y + pickup.size.y < -world.bounds.y) {
      pickup.active = false
      events.push({ pickup, outcome: 'missed' })
    } else if (overlaps(world.paddle, pickup)) {
      applyModifier(world, pickup.kind)
      pickup.active = false
      events.push({ pickup, outcome: 'collected' })
    }
  }
  return events
}

export function prunePickups(world: World): void {
  world.pickups = world.pickups.filter((p) => p.active)
}
