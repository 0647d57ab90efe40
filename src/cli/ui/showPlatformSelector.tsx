/**
 * Ask for a platform before the main app starts
 */

import React from 'react'
import { render } from 'ink'
import { PlatformSelector } from './PlatformSelector'
import type { PlatformType } from '@/platforms/types'

/**
 * Resolves with the chosen platform, or null when the user backs out
 */
export async function showPlatformSelector(hasDiscordToken: boolean): Promise<PlatformType | null> {
  return new Promise((resolve) => {
    const instance = render(
      <PlatformSelector
        hasDiscordToken={hasDiscordToken}
        onSelect={(platform) => {
          instance.unmount()
          resolve(platform)
        }}
        onExit={() => {
          instance.unmount()
          resolve(null)
        }}
      />,
      { exitOnCtrlC: false }
    )
  })
}
