import type { TelemetryData } from '@/state/telemetryStore'

export function formatStatus(data: TelemetryData) {
  const { stats } = data
  const tickMs = Object.values(data.timings).reduce((sum, value) => sum + value, 0)
  return [
    `tick=${data.tick}`,
    `agents=${stats.agents}`,
    `heading=${stats.meanHeading.toFixed(3)}`,
    `polarization=${stats.polarization.toFixed(3)}`,
    `centroid=(${stats.centroid.x.toFixed(1)}, ${stats.centroid.y.toFixed(1)})`,
    `outside=${stats.outOfBounds}`,
    `step=${tickMs.toFixed(3)}ms`,
  ].join(' ')
}
