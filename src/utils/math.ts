import type { Vector2 } from '@/types/sim'

export const distanceSquared = (a: Vector2, b: Vector2) => {
  const dx = a.x - b.x
  const dy = a.y - b.y
  return dx * dx + dy * dy
}

export const distance = (a: Vector2, b: Vector2) => Math.sqrt(distanceSquared(a, b))

export const TAU = Math.PI * 2
