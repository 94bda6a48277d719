import { get } from 'svelte/store'

import { controlsFromEnv, logEveryFromEnv, worldConfigFromEnv } from '@/config/env'
import { disposeWorld, initWorld } from '@/ecs/world'
import { formatStatus } from '@/sim/format'
import { createSimulationLoop } from '@/sim/loop'
import { setMaxTicks, setPaused, togglePause } from '@/state/controlStore'
import { telemetryStore } from '@/state/telemetryStore'
import { createLogger } from '@/utils/log'

const log = createLogger('sim')

const config = worldConfigFromEnv()
const logEvery = logEveryFromEnv()
const controls = controlsFromEnv()
setPaused(controls.paused)
setMaxTicks(controls.maxTicks)

const world = initWorld(config)
log.info(
  `world ${config.bounds.x}x${config.bounds.y}, ${world.agents.size} boids, seed ${config.rngSeed}, ${config.timeStepMs}ms between ticks`,
)

const loop = createSimulationLoop(world, {
  onFrame: (frame) => {
    if (frame.tick % logEvery !== 0) return
    const telemetry = get(telemetryStore)
    if (telemetry) log.info(formatStatus(telemetry))
  },
})

const shutdown = (signal: string) => {
  log.info(`received ${signal}, stopping`)
  loop.stop()
}
process.once('SIGINT', () => shutdown('SIGINT'))
process.once('SIGTERM', () => shutdown('SIGTERM'))
process.on('SIGUSR2', () => {
  togglePause()
  log.info('toggled pause')
})

// A paused loop has no timer pending, so hold the process open until the loop finishes.
const keepAlive = setInterval(() => undefined, 60_000)
loop.start()
const result = await loop.finished
clearInterval(keepAlive)
process.removeAllListeners('SIGUSR2')
disposeWorld(world)
if (result.reason === 'error') {
  process.exitCode = 1
}
