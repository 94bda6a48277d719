import { get, type Readable, type Writable } from 'svelte/store'

import { summarizeFlock } from '@/ecs/analytics'
import type { SimulationContext } from '@/ecs/types'
import { renderView, stepWorld } from '@/ecs/world'
import { controlStore } from '@/state/controlStore'
import { latestFrame } from '@/state/simStore'
import { telemetryStore, type TelemetryData } from '@/state/telemetryStore'
import type { ControlState, RenderFrame } from '@/types/sim'
import { createLogger } from '@/utils/log'

const log = createLogger('sim')

export type LoopStopReason = 'stopped' | 'max-ticks' | 'error'

export interface LoopResult {
  reason: LoopStopReason
  // Ticks run by this loop, not the world's absolute tick.
  ticks: number
  error?: unknown
}

export interface SimulationLoopOptions {
  controls?: Readable<ControlState>
  frames?: Writable<RenderFrame | null>
  telemetry?: Writable<TelemetryData | null>
  onFrame?: (frame: RenderFrame) => void
}

export interface SimulationLoop {
  start(): void
  stop(): void
  isRunning(): boolean
  readonly finished: Promise<LoopResult>
}

/**
 * Drives `stepWorld` with a fixed pause of `config.timeStepMs` between ticks.
 *
 * The pause does not account for the time a tick takes, so wall-clock pacing
 * drifts. Ticks never overlap and the frame/telemetry stores are written only
 * after a tick has committed.
 */
export function createSimulationLoop(ctx: SimulationContext, options: SimulationLoopOptions = {}): SimulationLoop {
  const controls$ = options.controls ?? controlStore
  const frames = options.frames ?? latestFrame
  const telemetry = options.telemetry ?? telemetryStore

  let controls = get(controls$)
  let loopHandle: ReturnType<typeof setTimeout> | null = null
  let loopActive = false
  let done = false
  let ticksRun = 0
  let unsubscribe: (() => void) | null = null
  let resolveFinished: (result: LoopResult) => void = () => undefined

  const finished = new Promise<LoopResult>((resolve) => {
    resolveFinished = resolve
  })

  function publish(timings: Record<string, number>) {
    const frame: RenderFrame = { tick: ctx.tick, agents: renderView(ctx) }
    frames.set(frame)
    telemetry.set({ tick: ctx.tick, timings, stats: summarizeFlock(ctx) })
    options.onFrame?.(frame)
  }

  function reachedLimit() {
    return controls.maxTicks !== null && ticksRun >= controls.maxTicks
  }

  function runLoop() {
    loopHandle = null
    if (done || controls.paused) return
    try {
      const timings = stepWorld(ctx)
      ticksRun++
      publish(timings)
    } catch (error) {
      log.error(`tick ${ctx.tick} failed`, error)
      finish({ reason: 'error', ticks: ticksRun, error })
      return
    }
    if (reachedLimit()) {
      finish({ reason: 'max-ticks', ticks: ticksRun })
      return
    }
    scheduleLoop()
  }

  function scheduleLoop() {
    if (!loopActive || done || controls.paused || loopHandle !== null) return
    loopHandle = setTimeout(runLoop, Math.max(0, ctx.config.timeStepMs))
  }

  function clearPending() {
    if (loopHandle !== null) {
      clearTimeout(loopHandle)
      loopHandle = null
    }
  }

  function finish(result: LoopResult) {
    if (done) return
    done = true
    loopActive = false
    clearPending()
    unsubscribe?.()
    unsubscribe = null
    log.info(`loop finished after ${result.ticks} ticks (${result.reason})`)
    resolveFinished(result)
  }

  return {
    start() {
      if (loopActive || done) return
      loopActive = true
      controls = get(controls$)
      if (reachedLimit()) {
        finish({ reason: 'max-ticks', ticks: ticksRun })
        return
      }
      unsubscribe = controls$.subscribe((value) => {
        controls = value
        if (controls.paused) {
          clearPending()
        } else if (reachedLimit()) {
          finish({ reason: 'max-ticks', ticks: ticksRun })
        } else {
          scheduleLoop()
        }
      })
    },
    stop() {
      finish({ reason: 'stopped', ticks: ticksRun })
    },
    isRunning() {
      return loopActive && !done
    },
    finished,
  }
}
