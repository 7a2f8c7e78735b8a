// Frame-stepped brick breaker engine: MENU -> PLAYING -> GAME_OVER -> MENU.
// update() is the whole simulation for one frame: it reads (world, input, dt),
// mutates the world it is given and never waits on anything. createEngine()
// wraps one world for a host loop, queueing resizes and notifying listeners.

import type { Color, Vec2 } from './vec'
import type { Bounds, Phase, World } from './session'
import { createBall, createPaddle, placeOnPaddle } from './entities'
import { buildLevel, relayout } from './layout'
import { createRng, timeSeed } from './random'
import { createSession, isLevelCleared, resetLevelFlags } from './session'
import { launchBall } from './speed'
import { clampPaddle, resolveBoundary, resolvePaddle, resolveTargets } from './collision'
import { advancePickups, prunePickups } from './bonus'
import {
  CEILING_SHRINK_FACTOR,
  DEFAULT_VIEWPORT_HEIGHT,
  DEFAULT_VIEWPORT_WIDTH,
  LAYOUT_SEED,
  MAX_FRAME_DT,
  PADDLE_MAX_ARENA_FRACTION,
  PADDLE_SPEED,
  PADDLE_WIDTH,
} from './constants'

export interface Viewport {
  width: number
  height: number
}

// One frame of host input. Held keys for movement; the rest are edges the
// host has already debounced.
export interface InputSnapshot {
  left: boolean
  right: boolean
  launch: boolean
  start: boolean
  acknowledge: boolean
  quit: boolean
}

export const IDLE_INPUT: Readonly<InputSnapshot> = {
  left: false,
  right: false,
  launch: false,
  start: false,
  acknowledge: false,
  quit: false,
}

export interface EngineOptions {
  viewport?: Viewport
  layoutSeed?: number
  // Defaults to wall-clock time.
  gameplaySeed?: number
}

export interface RectView {
  position: Vec2
  size: Vec2
  color: Color
}

export interface FrameView {
  phase: Phase
  bounds: Bounds
  targets: RectView[]
  pickups: RectView[]
  paddle: RectView | null
  ball: RectView | null
  score: number
  lives: number
  level: number
}

export interface Engine {
  step(dt: number, input?: InputSnapshot): FrameView
  resize(width: number, height: number): void
  view(): FrameView
  onUpdate(cb: (view: FrameView) => void): void
  shouldQuit(): boolean
  // Live state for tests and debugging; hosts draw from view().
  readonly world: Readonly<World>
}

function assertSeed(name: string, seed: number): void {
  if (!Number.isInteger(seed)) {
    throw new Error(`Invalid ${name}: expected an integer, got ${seed}`)
  }
}

/**
 * Arena half-extents for a viewport. The shorter side always spans [-1, 1];
 * a zero or negative dimension is treated as 1 pixel.
 */
export function computeBounds(width: number, height: number): Bounds {
  if (!Number.isFinite(width) || !Number.isFinite(height)) {
    throw new Error(`Invalid viewport: ${width}x${height}`)
  }
  const w = width > 0 ? width : 1
  const h = height > 0 ? height : 1
  const aspect = w / h
  return w >= h ? { x: aspect, y: 1 } : { x: 1, y: 1 / aspect }
}

// Negative, NaN or stalled-frame deltas never reach the physics.
export function sanitizeDelta(dt: number): number {
  if (!Number.isFinite(dt) || dt < 0) return 0
  return Math.min(dt, MAX_FRAME_DT)
}

export function createWorld(options: EngineOptions = {}): World {
  const viewport = options.viewport ?? { width: DEFAULT_VIEWPORT_WIDTH, height: DEFAULT_VIEWPORT_HEIGHT }
  const layoutSeed = options.layoutSeed ?? LAYOUT_SEED
  const gameplaySeed = options.gameplaySeed ?? timeSeed()
  assertSeed('layoutSeed', layoutSeed)
  assertSeed('gameplaySeed', gameplaySeed)

  const paddle = createPaddle()
  return {
    phase: 'MENU',
    bounds: computeBounds(viewport.width, viewport.height),
    session: createSession(),
    paddle,
    ball: createBall(paddle),
    targets: [],
    pickups: [],
    rng: createRng(gameplaySeed),
    layoutSeed,
    quit: false,
  }
}

// New paddle and a ball stuck to it. A paddle that already hit the ceiling
// this level stays short.
export function resetPaddleAndBall(world: World): void {
  const width = world.session.flags.paddleShrunk ? PADDLE_WIDTH * CEILING_SHRINK_FACTOR : PADDLE_WIDTH
  world.paddle = createPaddle(width)
  clampPaddle(world)
  world.ball = createBall(world.paddle)
}

export function startGame(world: World): void {
  world.session = createSession()
  world.targets = buildLevel(world.bounds.x, world.layoutSeed)
  world.pickups = []
  resetPaddleAndBall(world)
  world.phase = 'PLAYING'
}

// Score and lives carry over; everything else is rebuilt.
export function advanceLevel(world: World): void {
  world.session.level++
  resetLevelFlags(world.session)
  world.targets = buildLevel(world.bounds.x, world.layoutSeed)
  world.pickups = []
  resetPaddleAndBall(world)
}

// Targets, score, level and flags survive a lost life.
export function loseLife(world: World): void {
  world.session.lives = Math.max(0, world.session.lives - 1)
  if (world.session.lives === 0) {
    world.phase = 'GAME_OVER'
    return
  }
  resetPaddleAndBall(world)
}

// A widened paddle is re-capped against the new arena before it is clamped.
export function resizeWorld(world: World, width: number, height: number): void {
  world.bounds = computeBounds(width, height)
  relayout(world.targets, world.bounds.x)
  world.paddle.size.x = Math.min(world.paddle.size.x, 2 * world.bounds.x * PADDLE_MAX_ARENA_FRACTION)
  clampPaddle(world)
  if (world.ball.stuckToPaddle) {
    placeOnPaddle(world.ball, world.paddle)
  }
}

function movePaddle(world: World, input: InputSnapshot, dt: number): void {
  const dir = (input.right ? 1 : 0) - (input.left ? 1 : 0)
  if (dir === 0) return
  world.paddle.position.x += dir * PADDLE_SPEED * dt
  clampPaddle(world)
}

function playFrame(world: World, input: InputSnapshot, dt: number): void {
  const { ball } = world
  movePaddle(world, input, dt)

  if (ball.stuckToPaddle) {
    placeOnPaddle(ball, world.paddle)
    if (input.launch) launchBall(ball, world.rng)
  }

  if (!ball.stuckToPaddle) {
    ball.position.x += ball.velocity.x * dt
    ball.position.y += ball.velocity.y * dt

    resolveBoundary(world)
    resolvePaddle(world)
    resolveTargets(world)

    if (ball.position.y + ball.size.y < -world.bounds.y) {
      loseLife(world)
      if (world.phase === 'GAME_OVER') return
    }
  }

  advancePickups(world, dt)
  prunePickups(world)

  if (isLevelCleared(world.targets)) {
    advanceLevel(world)
  }
}

/**
 * Advance the simulation by one frame. Quit wins over everything; start and
 * acknowledge only mean something in MENU and GAME_OVER respectively.
 */
export function update(world: World, input: InputSnapshot, dt: number): World {
  if (world.quit) return world
  if (input.quit) {
    world.quit = true
    return world
  }

  switch (world.phase) {
    case 'MENU':
      if (input.start) startGame(world)
      break
    case 'GAME_OVER':
      if (input.acknowledge) world.phase = 'MENU'
      break
    case 'PLAYING':
      playFrame(world, input, sanitizeDelta(dt))
      break
  }
  return world
}

function rectView(r: RectView): RectView {
  return {
    position: { ...r.position },
    size: { ...r.size },
    color: { ...r.color },
  }
}

// Detached copy of everything the renderer and HUD need.
export function frameView(world: World): FrameView {
  const inGame = world.phase !== 'MENU'
  return {
    phase: world.phase,
    bounds: { ...world.bounds },
    targets: inGame ? world.targets.filter((t) => t.active).map(rectView) : [],
    pickups: inGame ? world.pickups.filter((p) => p.active).map(rectView) : [],
    paddle: inGame ? rectView(world.paddle) : null,
    ball: inGame ? rectView(world.ball) : null,
    score: world.session.score,
    lives: world.session.lives,
    level: world.session.level,
  }
}

export function createEngine(options: EngineOptions = {}): Engine {
  const world = createWorld(options)
  let pendingViewport: Viewport | null = null
  const listeners: Array<(view: FrameView) => void> = []

  function notify(view: FrameView) {
    listeners.forEach((cb) => cb(view))
  }

  function onUpdate(cb: (view: FrameView) => void) {
    listeners.push(cb)
  }

  // Applied at the start of the next step, never in the middle of physics.
  function resize(width: number, height: number) {
    computeBounds(width, height) // validate eagerly
    pendingViewport = { width, height }
  }

  function step(dt: number, input: InputSnapshot = IDLE_INPUT): FrameView {
    if (pendingViewport) {
      resizeWorld(world, pendingViewport.width, pendingViewport.height)
      pendingViewport = null
    }
    update(world, input, dt)
    const view = frameView(world)
    notify(view)
    return view
  }

  return {
    step,
    resize,
    view: () => frameView(world),
    onUpdate,
    shouldQuit: () => world.quit,
    world,
  }
}
