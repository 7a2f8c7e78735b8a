// Plain value types shared by every entity, plus the few float helpers the
// collision and speed code needs.

export interface Vec2 {
  x: number
  y: number
}

// RGBA, each channel in [0, 1].
export interface Color {
  r: number
  g: number
  b: number
  a: number
}

// Axis-aligned rectangle; position is the bottom-left corner.
export interface Rect {
  position: Vec2
  size: Vec2
}

export function rgba(r: number, g: number, b: number, a = 1): Color {
  return { r, g, b, a }
}

export function clamp(v: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, v))
}

export function magnitude(v: Vec2): number {
  return Math.sqrt(v.x * v.x + v.y * v.y)
}

export function center(r: Rect): Vec2 {
  return { x: r.position.x + r.size.x / 2, y: r.position.y + r.size.y / 2 }
}

// 0 counts as positive.
export function signOf(n: number): -1 | 1 {
  return n < 0 ? -1 : 1
}

export function darken(c: Color, factor: number): Color {
  return { r: c.r * factor, g: c.g * factor, b: c.b * factor, a: c.a }
}
