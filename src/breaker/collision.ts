// Ball collision pipeline: arena edges, then paddle, then at most one target
// per physics step. Everything is axis-aligned rectangle overlap, no sweeps.

import type { FallingPickup, Target } from './entities'
import type { World } from './session'
import type { Rect } from './vec'
import { center, clamp } from './vec'
import { tierColor } from './entities'
import { spawnPickup } from './bonus'
import { composeVelocity, applySpeedUp } from './speed'
import {
  CEILING_SHRINK_FACTOR,
  MIN_BOUNCE_Y_RATIO,
  PADDLE_STEER_CENTER,
  PADDLE_STEER_EDGE,
  TARGET_NUDGE,
} from './constants'

export type Axis = 'x' | 'y'

export interface TargetHit {
  target: Target
  axis: Axis
  destroyed: boolean
  pickup: FallingPickup | null
  speedChanged: boolean
}

// Strict on the far edges: rectangles that only touch do not collide.
export function overlaps(a: Rect, b: Rect): boolean {
  return (
    a.position.x < b.position.x + b.size.x &&
    b.position.x < a.position.x + a.size.x &&
    a.position.y < b.position.y + b.size.y &&
    b.position.y < a.position.y + a.size.y
  )
}

// Axis with the shallower penetration; ties resolve vertically.
export function collisionAxis(ball: Rect, target: Rect): Axis {
  const b = center(ball)
  const t = center(target)
  const penX = (ball.size.x + target.size.x) / 2 - Math.abs(b.x - t.x)
  const penY = (ball.size.y + target.size.y) / 2 - Math.abs(b.y - t.y)
  return penX < penY ? 'x' : 'y'
}

export function clampPaddle(world: World): void {
  const { paddle, bounds } = world
  paddle.position.x = clamp(paddle.position.x, -bounds.x, bounds.x - paddle.size.x)
}

/**
 * Reflect off the left, right and top edges, clamping the ball inside.
 * The first ceiling contact of a level halves the paddle once.
 * The bottom edge is left open: falling through it costs a life.
 */
export function resolveBoundary(world: World): void {
  const { ball, bounds, session } = world
  if (ball.position.x <= -bounds.x) {
    ball.velocity.x = Math.abs(ball.velocity.x)
    ball.position.x = -bounds.x
  } else if (ball.position.x + ball.size.x >= bounds.x) {
    ball.velocity.x = -Math.abs(ball.velocity.x)
    ball.position.x = bounds.x - ball.size.x
  }

  if (ball.position.y + ball.size.y >= bounds.y) {
    ball.velocity.y = -Math.abs(ball.velocity.y)
    ball.position.y = bounds.y - ball.size.y
    if (!session.flags.paddleShrunk) {
      session.flags.paddleShrunk = true
      world.paddle.size.x *= CEILING_SHRINK_FACTOR
      clampPaddle(world)
    }
  }
}

// Steering grows from the centre towards the edges of the paddle.
export function steeringFactor(offset: number): number {
  return PADDLE_STEER_CENTER + (PADDLE_STEER_EDGE - PADDLE_STEER_CENTER) * Math.abs(offset)
}

/**
 * Deflect the ball off the paddle. The exit angle depends only on where the
 * ball hit: centre goes straight up, edges go wide. A ball that is already
 * moving up is ignored so it cannot be caught twice.
 */
export function resolvePaddle(world: World): boolean {
  const { ball, paddle } = world
  if (ball.velocity.y > 0 || !overlaps(ball, paddle)) return false

  ball.position.y = paddle.position.y + paddle.size.y

  const half = paddle.size.x / 2
  const offset = clamp((center(ball).x - center(paddle).x) / half, -1, 1)
  const speed = ball.speedMagnitude
  const vx = offset * steeringFactor(offset) * speed
  ball.velocity = composeVelocity(speed, vx, 1, MIN_BOUNCE_Y_RATIO)
  return true
}

// Place the ball against the face of the target it is closest to on one axis.
function pushOut(world: World, target: Target, axis: Axis, gap: number): void {
  const { ball } = world
  const b = center(ball)
  const t = center(target)
  if (axis === 'x') {
    ball.position.x = b.x < t.x
      ? target.position.x - ball.size.x - gap
      : target.position.x + target.size.x + gap
  } else {
    ball.position.y = b.y < t.y
      ? target.position.y - ball.size.y - gap
      : target.position.y + target.size.y + gap
  }
}

// Send the ball away from the target on one axis and place it against that face.
function bounceOff(world: World, target: Target, axis: Axis, gap: number): void {
  const { ball } = world
  const away = center(ball)[axis] < center(target)[axis] ? -1 : 1
  ball.velocity[axis] = away * Math.abs(ball.velocity[axis])
  pushOut(world, target, axis, gap)
}

function hitTarget(world: World, target: Target): TargetHit {
  const { ball, session } = world
  const axis = collisionAxis(ball, target)

  if (target.isWall) {
    if (target.isReflective) {
      ball.velocity.x = -ball.velocity.x
      ball.velocity.y = -ball.velocity.y
      pushOut(world, target, axis, 0)
    } else {
      bounceOff(world, target, axis, 0)
    }
    return { target, axis, destroyed: false, pickup: null, speedChanged: false }
  }

  bounceOff(world, target, axis, TARGET_NUDGE)

  target.durability--
  let destroyed = false
  let pickup: FallingPickup | null = null
  if (target.durability <= 0) {
    destroyed = true
    target.active = false
    session.score += target.points
    if (target.isBonus) {
      pickup = spawnPickup(world, target)
    }
  } else {
    target.color = tierColor(target.tier, true)
  }

  ball.hitCount++
  const speedChanged = applySpeedUp(ball, session.flags, target, world.rng)
  return { target, axis, destroyed, pickup, speedChanged }
}

/**
 * Resolve the first active target the ball overlaps, in layout order.
 * Any further overlaps wait for the next physics step.
 */
export function resolveTargets(world: World): TargetHit | null {
  const target = world.targets.find((t) => t.active && overlaps(world.ball, t))
  if (!target) return null
  return hitTarget(world, target)
}
