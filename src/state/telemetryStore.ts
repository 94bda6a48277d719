import { writable } from 'svelte/store'

import type { FlockStats } from '@/types/sim'

export interface TelemetryData {
  tick: number
  timings: Record<string, number>
  stats: FlockStats
}

export const telemetryStore = writable<TelemetryData | null>(null)
