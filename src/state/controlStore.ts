import { writable } from 'svelte/store'

import type { ControlState } from '@/types/sim'
import { DEFAULT_CONTROLS } from '@/types/sim'

// Read by the simulation loop on every change; pausing clears its pending tick.
export const controlStore = writable<ControlState>(DEFAULT_CONTROLS)

export function setPaused(paused: boolean) {
  controlStore.update((current) => ({ ...current, paused }))
}

export function togglePause() {
  controlStore.update((current) => ({ ...current, paused: !current.paused }))
}

// null runs until stopped. Negative or fractional limits are floored to a whole tick count.
export function setMaxTicks(maxTicks: number | null) {
  const limit = maxTicks === null ? null : Math.max(0, Math.floor(maxTicks))
  controlStore.update((current) => ({ ...current, maxTicks: limit }))
}

export function resetControls() {
  controlStore.set(DEFAULT_CONTROLS)
}
