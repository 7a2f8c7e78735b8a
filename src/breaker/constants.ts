// Simulation configuration constants.
// World units: the visible height spans [-1, 1] on landscape viewports, the
// width scales with the aspect ratio (see computeBounds in engine.ts).

/** Default viewport width (pixels) used until the host reports a resize */
export const DEFAULT_VIEWPORT_WIDTH = 960

/** Default viewport height (pixels) */
export const DEFAULT_VIEWPORT_HEIGHT = 540

// --- Arena grid ---

/** Number of target rows */
export const ROWS = 8

/** Number of targets per row */
export const COLUMNS = 14

/** Columns on each side of the grid reserved for row-0 walls; specials never land there */
export const BORDER_COLUMNS = 2

/** Bottom edge of row 0 (world units) */
export const TARGET_START_Y = 0.85

/** Target height (world units) */
export const TARGET_HEIGHT = 0.06

/** Gap between neighbouring targets, both axes (world units) */
export const TARGET_GAP = 0.01

/** Rows sharing one scoring tier */
export const ROWS_PER_TIER = 2

/** Points per tier, top rows first */
export const TIER_POINTS = [7, 5, 3, 1] as const

/** Durability sentinel for targets that can never be destroyed */
export const INDESTRUCTIBLE = -1

/** Hits needed by the one reinforced target of each row */
export const COUNTER_DURABILITY = 2

/** Fixed seed for special-target placement, independent of gameplay randomness */
export const LAYOUT_SEED = 42

// --- Paddle ---

/** Paddle width at the start of a life (world units) */
export const PADDLE_WIDTH = 0.25

/** Paddle height (world units) */
export const PADDLE_HEIGHT = 0.04

/** Paddle bottom edge (world units) */
export const PADDLE_Y = -0.9

/** Paddle speed (world units/second) */
export const PADDLE_SPEED = 1.5

/** Width multiplier applied once on the first ceiling contact */
export const CEILING_SHRINK_FACTOR = 0.5

/** Horizontal steering at the paddle centre, as a fraction of ball speed per unit of offset */
export const PADDLE_STEER_CENTER = 0.5

/** Horizontal steering at the paddle edges */
export const PADDLE_STEER_EDGE = 0.9

/** Minimum vertical component after a paddle bounce, as a fraction of ball speed */
export const MIN_BOUNCE_Y_RATIO = 0.1

// --- Ball ---

/** Ball radius (world units); the ball is simulated as a square of twice this size */
export const BALL_RADIUS = 0.02

/** Ball speed at the start of every life (world units/second) */
export const INITIAL_BALL_SPEED = 1.0

/** Speed multiplier for hit-count milestones and first tier contacts */
export const SPEED_INCREMENT = 1.19

/** Destructible-hit counts that trigger a speed-up within a level */
export const SPEED_UP_HITS: readonly number[] = [4, 12]

/** Launch: smallest horizontal share of the speed */
export const LAUNCH_MIN_X_RATIO = 0.2

/** Launch: largest horizontal share of the speed */
export const LAUNCH_MAX_X_RATIO = 0.8

/** Launch: smallest vertical share of the speed */
export const LAUNCH_MIN_Y_RATIO = 0.3

/** Distance the ball is pushed outside a destructible target after a hit */
export const TARGET_NUDGE = 0.001

/** Velocities shorter than this are treated as zero when normalizing */
export const ZERO_VELOCITY_EPSILON = 1e-4

// --- Session ---

/** Lives at the start of a game */
export const INITIAL_LIVES = 3

/** Upper bound for lives gained from pickups */
export const MAX_LIVES = 5

/** Lower bound for lives lost to pickups */
export const MIN_LIVES_FROM_PICKUP = 1

/** Longest frame the simulation integrates at once (seconds) */
export const MAX_FRAME_DT = 0.05

// --- Pickups ---

/** Pickup side length (world units) */
export const PICKUP_SIZE = BALL_RADIUS * 1.5

/** Pickup fall speed (world units/second) */
export const PICKUP_FALL_SPEED = 1.0

/** paddle-widen multiplier */
export const PADDLE_WIDEN_FACTOR = 1.25

/** Largest paddle width as a fraction of the arena width (2 * boundX) */
export const PADDLE_MAX_ARENA_FRACTION = 0.75

/** paddle-shrink multiplier */
export const PADDLE_SHRINK_FACTOR = 0.75

/** Smallest paddle width reachable through pickups */
export const PADDLE_MIN_WIDTH = PADDLE_WIDTH * 0.25

/** ball-slow multiplier */
export const BALL_SLOW_FACTOR = 0.8

/** ball-fast multiplier */
export const BALL_FAST_FACTOR = 1.2

/** Slowest speed reachable through pickups */
export const MIN_BALL_SPEED = INITIAL_BALL_SPEED * 0.5

/** Fastest speed reachable through pickups */
export const MAX_BALL_SPEED = INITIAL_BALL_SPEED * 3.0

/** straighten: horizontal share of the speed the ball is brought down to */
export const STRAIGHTEN_X_RATIO = 0.2

/** widen-angle: horizontal share of the speed the ball is brought up to */
export const WIDEN_ANGLE_X_RATIO = 0.7

/** Color multiplier for damaged reinforced targets */
export const DARKEN_FACTOR = 0.7
