// Speed model: launch angles, renormalisation and speed-ups
import { describe, it, expect, vi, afterEach } from 'vitest'
import {
  applySpeedUp,
  composeVelocity,
  launchBall,
  launchVelocity,
  normalizeVelocity,
  setSpeed,
} from '../src/breaker/speed'
import { createBall, createPaddle } from '../src/breaker/entities'
import { createLevelFlags } from '../src/breaker/session'
import { createRng } from '../src/breaker/random'
import { SPEED_INCREMENT } from '../src/breaker/constants'
import { makeTarget, sequenceRng } from './support'

function flyingBall(vx: number, vy: number, speed = Math.hypot(vx, vy)) {
  const ball = createBall(createPaddle())
  ball.stuckToPaddle = false
  ball.velocity = { x: vx, y: vy }
  ball.speedMagnitude = speed
  return ball
}

afterEach(() => {
  vi.restoreAllMocks()
})

describe('Speed', () => {
  describe('composeVelocity', () => {
    it('keeps the requested magnitude', () => {
      const v = composeVelocity(2, 1.2, 1, 0.1)
      expect(v.x).toBe(1.2)
      expect(v.y).toBeCloseTo(1.6, 12)
    })

    it('clamps the horizontal part to leave a minimum vertical share', () => {
      const v = composeVelocity(1, 5, 1, 0.1)
      expect(v.x).toBeCloseTo(Math.sqrt(0.99), 12)
      expect(v.y).toBeCloseTo(0.1, 12)
    })

    it('honours the vertical sign', () => {
      const v = composeVelocity(1, -0.6, -1, 0)
      expect(v.x).toBe(-0.6)
      expect(v.y).toBeCloseTo(-0.8, 12)
    })
  })

  describe('launch', () => {
    it('draws the side first, then the angle', () => {
      const v = launchVelocity(1, sequenceRng([0.9, 0.5]))
      expect(v.x).toBeCloseTo(0.5, 12)
      expect(v.y).toBeCloseTo(Math.sqrt(0.75), 12)
    })

    it('goes left on a low draw', () => {
      const v = launchVelocity(1, sequenceRng([0.1]))
      expect(v.x).toBeCloseTo(-0.26, 12)
      expect(v.y).toBeGreaterThan(0)
    })

    it('always launches upward within the angle range', () => {
      const rng = createRng(11)
      for (let i = 0; i < 500; i++) {
        const v = launchVelocity(1.5, rng)
        expect(Math.hypot(v.x, v.y)).toBeCloseTo(1.5, 9)
        expect(Math.abs(v.x)).toBeGreaterThanOrEqual(0.2 * 1.5 - 1e-9)
        expect(Math.abs(v.x)).toBeLessThanOrEqual(0.8 * 1.5 + 1e-9)
        expect(v.y).toBeGreaterThanOrEqual(0.3 * 1.5 - 1e-9)
      }
    })

    it('releases a stuck ball once', () => {
      const ball = createBall(createPaddle())
      const rng = sequenceRng([0.9, 0.5])
      expect(launchBall(ball, rng)).toBe(true)
      expect(ball.stuckToPaddle).toBe(false)
      const velocity = { ...ball.velocity }

      expect(launchBall(ball, rng)).toBe(false)
      expect(ball.velocity).toEqual(velocity)
    })
  })

  describe('normalizeVelocity', () => {
    it('rescales the direction to the stored speed', () => {
      const ball = flyingBall(3, 4, 2)
      normalizeVelocity(ball, createRng(1))
      expect(ball.velocity.x).toBeCloseTo(1.2, 12)
      expect(ball.velocity.y).toBeCloseTo(1.6, 12)
    })

    it('leaves a stuck ball at rest', () => {
      const ball = createBall(createPaddle())
      normalizeVelocity(ball, createRng(1))
      expect(ball.velocity).toEqual({ x: 0, y: 0 })
    })

    it('relaunches a ball in flight with no velocity and warns', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
      const ball = flyingBall(0, 0, 1)
      normalizeVelocity(ball, sequenceRng([0.9, 0.5]))
      expect(warn).toHaveBeenCalledTimes(1)
      expect(ball.velocity.x).toBeCloseTo(0.5, 12)
      expect(ball.velocity.y).toBeCloseTo(Math.sqrt(0.75), 12)
    })

    it('setSpeed changes the magnitude only', () => {
      const ball = flyingBall(-0.6, 0.8)
      setSpeed(ball, 2.5, createRng(1))
      expect(ball.speedMagnitude).toBe(2.5)
      expect(ball.velocity.x).toBeCloseTo(-1.5, 12)
      expect(ball.velocity.y).toBeCloseTo(2, 12)
    })
  })

  describe('applySpeedUp', () => {
    it('speeds up on the 4th and 12th destructible hits', () => {
      const rng = createRng(1)
      const flags = createLevelFlags()
      const target = makeTarget()
      const ball = flyingBall(0.6, 0.8)
      const changes: number[] = []
      for (let hit = 1; hit <= 14; hit++) {
        ball.hitCount = hit
        if (applySpeedUp(ball, flags, target, rng)) changes.push(hit)
      }
      expect(changes).toEqual([4, 12])
      expect(ball.speedMagnitude).toBeCloseTo(SPEED_INCREMENT * SPEED_INCREMENT, 12)
    })

    it('speeds up on the first contact with each upper tier', () => {
      const rng = createRng(1)
      const flags = createLevelFlags()
      const ball = flyingBall(0, 1)
      ball.hitCount = 1

      expect(applySpeedUp(ball, flags, makeTarget({ tier: 'second' }), rng)).toBe(true)
      expect(flags.secondTierReached).toBe(true)
      expect(applySpeedUp(ball, flags, makeTarget({ tier: 'second' }), rng)).toBe(false)
      expect(applySpeedUp(ball, flags, makeTarget({ tier: 'top' }), rng)).toBe(true)
      expect(flags.topTierReached).toBe(true)
      expect(ball.speedMagnitude).toBeCloseTo(SPEED_INCREMENT * SPEED_INCREMENT, 12)
      expect(ball.velocity.y).toBeCloseTo(ball.speedMagnitude, 12)
    })

    it('compounds a milestone with a first tier contact', () => {
      const flags = createLevelFlags()
      const ball = flyingBall(0, 1)
      ball.hitCount = 4
      applySpeedUp(ball, flags, makeTarget({ tier: 'top' }), createRng(1))
      expect(ball.speedMagnitude).toBeCloseTo(SPEED_INCREMENT * SPEED_INCREMENT, 12)
    })
  })
})
