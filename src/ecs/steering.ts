// Two-branch angular blends. Separation subtracts and the other rules add; the
// branches are not symmetric, and the heading is not wrapped afterwards.

export function blendAway(heading: number, away: number, k: number) {
  const diff = away - heading
  if (Math.abs(diff) < Math.PI) {
    return heading - diff * k
  }
  return heading - (heading - away) * k
}

export function blendToward(heading: number, target: number, k: number) {
  const diff = target - heading
  if (Math.abs(diff) < Math.PI) {
    return heading + diff * k
  }
  return heading + (heading - target) * k
}

// Turn strength for distance-weighted rules. cbrt(0) is 0, so a zero distance yields an unbounded factor.
export const distanceWeight = (sensitivity: number, dist: number) => sensitivity / Math.cbrt(dist)
