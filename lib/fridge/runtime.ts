import { loadFridgeConfig } from '@/lib/config'
import { createFridgeServices, type FridgeServices } from './services'

let services: FridgeServices | null = null

/**
 * Process-wide services for route handlers, so the recipe limiter and cache
 * are shared across requests. Configuration is read on first use.
 */
export function getFridgeServices(): FridgeServices {
  if (!services) {
    services = createFridgeServices(loadFridgeConfig())
  }
  return services
}

export function resetFridgeServices(): void {
  services = null
}
