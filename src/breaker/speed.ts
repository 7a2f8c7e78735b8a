// Velocity/speed model. The ball keeps a scalar speedMagnitude apart from its
// direction; every change to either goes through here so that, in flight,
// |velocity| == speedMagnitude.

import type { Ball, Target } from './entities'
import type { LevelFlags } from './session'
import type { Vec2 } from './vec'
import type { Rng } from './random'
import { clamp, magnitude } from './vec'
import { randomSign } from './random'
import {
  LAUNCH_MAX_X_RATIO,
  LAUNCH_MIN_X_RATIO,
  LAUNCH_MIN_Y_RATIO,
  SPEED_INCREMENT,
  SPEED_UP_HITS,
  ZERO_VELOCITY_EPSILON,
} from './constants'

// Build a velocity of length `speed` from a desired horizontal component.
// vx is clamped so the vertical part keeps at least minYRatio * speed.
export function composeVelocity(speed: number, vx: number, signY: -1 | 1, minYRatio: number): Vec2 {
  const minVy = speed * minYRatio
  const maxVx = Math.sqrt(Math.max(0, speed * speed - minVy * minVy))
  const x = clamp(vx, -maxVx, maxVx)
  const y = Math.sqrt(Math.max(0, speed * speed - x * x))
  return { x, y: signY * y }
}

// Fresh upward direction: random side, horizontal share in [min, max] of the speed.
export function launchVelocity(speed: number, rng: Rng): Vec2 {
  const dir = randomSign(rng)
  const ratio = LAUNCH_MIN_X_RATIO + rng() * (LAUNCH_MAX_X_RATIO - LAUNCH_MIN_X_RATIO)
  return composeVelocity(speed, dir * ratio * speed, 1, LAUNCH_MIN_Y_RATIO)
}

// Release a stuck ball. No-op when already in flight.
export function launchBall(ball: Ball, rng: Rng): boolean {
  if (!ball.stuckToPaddle) return false
  ball.stuckToPaddle = false
  ball.velocity = launchVelocity(ball.speedMagnitude, rng)
  return true
}

export function normalizeVelocity(ball: Ball, rng: Rng): void {
  const current = magnitude(ball.velocity)
  if (current > ZERO_VELOCITY_EPSILON) {
    ball.velocity.x = (ball.velocity.x / current) * ball.speedMagnitude
    ball.velocity.y = (ball.velocity.y / current) * ball.speedMagnitude
    return
  }
  if (ball.stuckToPaddle) return
  console.warn(`Ball in flight with zero velocity (|v|=${current}); relaunching upward.`)
  ball.velocity = launchVelocity(ball.speedMagnitude, rng)
}

export function setSpeed(ball: Ball, speed: number, rng: Rng): void {
  ball.speedMagnitude = speed
  normalizeVelocity(ball, rng)
}

/**
 * Speed-up check after a destructible hit. Milestone hit counts and the first
 * contact with each of the two upper tiers each multiply the speed once.
 * Returns true when the speed changed.
 */
export function applySpeedUp(ball: Ball, flags: LevelFlags, target: Target, rng: Rng): boolean {
  let factor = 1
  if (SPEED_UP_HITS.includes(ball.hitCount)) {
    factor *= SPEED_INCREMENT
  }
  if (target.tier === 'second' && !flags.secondTierReached) {
    flags.secondTierReached = true
    factor *= SPEED_INCREMENT
  }
  if (target.tier === 'top' && !flags.topTierReached) {
    flags.topTierReached = true
    factor *= SPEED_INCREMENT
  }
  if (factor === 1) return false
  setSpeed(ball, ball.speedMagnitude * factor, rng)
  return true
}
