/**
 * Platform selector component
 * Shown at startup when PARLEY_PLATFORM is not set
 */

import React, { useState } from 'react'
import { Box, Text, useInput } from 'ink'
import type { PlatformType } from '@/platforms/types'

interface PlatformOption {
  value: PlatformType
  label: string
  description: string
}

export const PLATFORM_OPTIONS: PlatformOption[] = [
  {
    value: 'discord',
    label: 'Discord',
    description: 'Channels and DMs visible to your bot',
  },
  {
    value: 'demo',
    label: 'Demo',
    description: 'Offline sample conversations, no account needed',
  },
]

interface PlatformSelectorProps {
  /** Whether DISCORD_BOT_TOKEN is configured */
  hasDiscordToken: boolean
  onSelect: (platform: PlatformType) => void
  onExit: () => void
}

export const PlatformSelector: React.FC<PlatformSelectorProps> = ({ hasDiscordToken, onSelect, onExit }) => {
  const [selectedIndex, setSelectedIndex] = useState(hasDiscordToken ? 0 : 1)

  useInput((input, key) => {
    if (key.upArrow || input === 'k') {
      setSelectedIndex((prev) => (prev > 0 ? prev - 1 : PLATFORM_OPTIONS.length - 1))
    } else if (key.downArrow || input === 'j') {
      setSelectedIndex((prev) => (prev < PLATFORM_OPTIONS.length - 1 ? prev + 1 : 0))
    } else if (key.return) {
      onSelect(PLATFORM_OPTIONS[selectedIndex].value)
    } else if (key.escape || input === 'q' || (key.ctrl && input === 'c')) {
      onExit()
    }
  })

  return (
    <Box flexDirection="column" padding={1}>
      <Box marginBottom={1}>
        <Text bold color="cyan">
          Select a platform:
        </Text>
      </Box>

      {PLATFORM_OPTIONS.map((option, index) => {
        const isSelected = index === selectedIndex
        const missingToken = option.value === 'discord' && !hasDiscordToken

        return (
          <Box key={option.value} marginBottom={1}>
            <Box width={3}>
              <Text color={isSelected ? 'green' : 'gray'}>{isSelected ? '▶ ' : '  '}</Text>
            </Box>
            <Box flexDirection="column">
              <Text bold color={isSelected ? 'white' : 'gray'}>
                {option.label}
              </Text>
              <Text color="gray">{option.description}</Text>
              {missingToken && <Text color="yellow">DISCORD_BOT_TOKEN is not set</Text>}
            </Box>
          </Box>
        )
      })}

      <Box marginTop={1} borderStyle="single" borderColor="gray" paddingX={1}>
        <Text dimColor>↑/↓: Navigate • Enter: Select • Esc: Exit</Text>
      </Box>
    </Box>
  )
}
