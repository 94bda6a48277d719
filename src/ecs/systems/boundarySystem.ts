import { Heading, Position } from '../components'
import { commitHeadings, createPendingHeadings } from '../pending'
import { blendToward, distanceWeight } from '../steering'
import type { SimulationContext } from '../types'

interface EdgeCheck {
  // Bearing pointing back into the world.
  away: number
  distanceTo: (x: number, y: number, halfWidth: number, halfHeight: number) => number
}

// Checked in this order; a later edge overwrites an earlier edge's update.
const EDGES: readonly EdgeCheck[] = [
  // bottom
  { away: Math.PI / 2, distanceTo: (_x, y, _hw, hh) => y + hh },
  // top
  { away: (3 * Math.PI) / 2, distanceTo: (_x, y, _hw, hh) => hh - y },
  // left
  { away: 0, distanceTo: (x, _y, hw) => x + hw },
]

const RIGHT_EDGE: EdgeCheck = { away: Math.PI, distanceTo: (x, _y, hw) => hw - x }

export function boundarySystem(ctx: SimulationContext) {
  const { bounds, separationDistance, separationSensitivity, avoidRightEdge } = ctx.config
  const halfWidth = bounds.x / 2
  const halfHeight = bounds.y / 2
  const edges = avoidRightEdge ? [...EDGES, RIGHT_EDGE] : EDGES
  const pending = createPendingHeadings()

  ctx.agents.forEach((entity, id) => {
    const x = Position.x[entity]
    const y = Position.y[entity]
    const heading = Heading.angle[entity]

    edges.forEach((check) => {
      const edgeDistance = check.distanceTo(x, y, halfWidth, halfHeight)
      if (!(edgeDistance < separationDistance)) return
      pending.set(id, blendToward(heading, check.away, distanceWeight(separationSensitivity, edgeDistance)))
    })
  })

  commitHeadings(ctx, pending)
}
