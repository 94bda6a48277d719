import { initWorld, runTicks, snapshotWorld } from '../src/ecs/world'
import { DEFAULT_WORLD_CONFIG, type WorldConfig } from '../src/types/sim'

type ProbeResult = {
  label: string
  tick: number
  polarization: number
  outOfBounds: number
  msPerTick: number
}

function runProbe(label: string, patch: Partial<WorldConfig>, steps = 2_000): ProbeResult {
  const ctx = initWorld({ ...DEFAULT_WORLD_CONFIG, ...patch, rngSeed: 1337 })
  let totalMs = 0

  for (let i = 0; i < steps; i += 500) {
    const timings = runTicks(ctx, Math.min(500, steps - i))
    totalMs += Object.values(timings).reduce((sum, value) => sum + value, 0)
    const snap = snapshotWorld(ctx)
    console.log(
      `[${label}] tick=${snap.tick} polarization=${snap.stats.polarization.toFixed(3)} outside=${snap.stats.outOfBounds}`,
    )
  }

  const snap = snapshotWorld(ctx)
  return {
    label,
    tick: snap.tick,
    polarization: snap.stats.polarization,
    outOfBounds: snap.stats.outOfBounds,
    msPerTick: totalMs / Math.max(1, steps),
  }
}

const results: ProbeResult[] = [
  runProbe('reference', {}),
  runProbe('aligned', { alignmentSensitivity: 0.05 }),
  runProbe('cohesive', { alignmentSensitivity: 0.05, cohesionSensitivity: 0.02 }),
  runProbe('walled', { avoidRightEdge: true }),
]

for (const r of results) {
  console.log(
    [
      r.label.padEnd(10),
      `tick=${r.tick}`,
      `polarization=${r.polarization.toFixed(3)}`,
      `outside=${r.outOfBounds}`,
      `ms/tick=${r.msPerTick.toFixed(4)}`,
    ].join(' '),
  )
}
