import { writable } from 'svelte/store'

import type { RenderFrame } from '@/types/sim'

// Written by the loop only after a tick has fully committed.
export const latestFrame = writable<RenderFrame | null>(null)
