import { Heading, Position } from './components'
import type { SimulationContext } from './types'

import type { FlockStats } from '@/types/sim'

export function summarizeFlock(ctx: SimulationContext): FlockStats {
  const count = ctx.agents.size
  if (!count) {
    return { agents: 0, meanHeading: 0, polarization: 0, centroid: { x: 0, y: 0 }, outOfBounds: 0 }
  }

  const halfWidth = ctx.config.bounds.x / 2
  const halfHeight = ctx.config.bounds.y / 2
  let sumCos = 0
  let sumSin = 0
  let sumX = 0
  let sumY = 0
  let outOfBounds = 0

  ctx.agents.forEach((entity) => {
    const angle = Heading.angle[entity]
    sumCos += Math.cos(angle)
    sumSin += Math.sin(angle)
    const x = Position.x[entity]
    const y = Position.y[entity]
    sumX += x
    sumY += y
    if (Math.abs(x) > halfWidth || Math.abs(y) > halfHeight) outOfBounds++
  })

  return {
    agents: count,
    // Circular mean, so headings that drifted by whole turns still average sensibly.
    meanHeading: Math.atan2(sumSin, sumCos),
    polarization: Math.hypot(sumCos, sumSin) / count,
    centroid: { x: sumX / count, y: sumY / count },
    outOfBounds,
  }
}
