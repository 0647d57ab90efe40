/**
 * Platform client factory
 * Creates the appropriate platform client based on type
 */

import type { IPlatformClient, PlatformType } from './types'
import { DiscordPlatformClient } from './discord/client'
import { DemoPlatformClient } from './demo/client'

export interface PlatformSettings {
  discordToken: string
  demoIntervalMs: number
}

export const PLATFORM_TYPES: readonly PlatformType[] = ['discord', 'demo']

export function isPlatformType(value: string): value is PlatformType {
  return PLATFORM_TYPES.some((type) => type === value)
}

/**
 * Create a platform client instance
 */
export function createPlatformClient(type: PlatformType, settings: PlatformSettings): IPlatformClient {
  switch (type) {
    case 'discord':
      return new DiscordPlatformClient(settings.discordToken)

    case 'demo':
      return new DemoPlatformClient({ intervalMs: settings.demoIntervalMs })
  }
}
