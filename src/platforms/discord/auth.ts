/**
 * Discord authentication and connection management
 */

import { Client, DiscordAPIError, DiscordjsErrorCodes, Events, IntentsBitField, Partials } from 'discord.js'
import { FatalAuthError, TransientBackendError, errorMessage } from '@/helpers/errors'

/**
 * Create and configure a Discord client with required intents.
 * DM channels arrive as partials until their first message is fetched.
 */
export function createDiscordClient(): Client {
  return new Client({
    intents: [
      IntentsBitField.Flags.Guilds,
      IntentsBitField.Flags.GuildMessages,
      IntentsBitField.Flags.DirectMessages,
      IntentsBitField.Flags.MessageContent,
    ],
    partials: [Partials.Channel, Partials.Message],
  })
}

function isTokenError(error: unknown): boolean {
  if (error instanceof DiscordAPIError) return error.status === 401
  if (error instanceof Error && 'code' in error) {
    return error.code === DiscordjsErrorCodes.TokenInvalid || error.code === DiscordjsErrorCodes.TokenMissing
  }
  return false
}

/**
 * Classify a discord.js failure: rejected credentials are fatal, anything
 * else is worth retrying.
 */
export function toBackendError(error: unknown, action: string): FatalAuthError | TransientBackendError {
  if (error instanceof FatalAuthError || error instanceof TransientBackendError) return error
  if (isTokenError(error)) {
    return new FatalAuthError(`Discord rejected the bot token while trying to ${action}`)
  }
  return new TransientBackendError(`Could not ${action}: ${errorMessage(error)}`, error)
}

/**
 * Authenticate and connect to Discord
 * @throws FatalAuthError when the token is missing or rejected
 */
export async function connectDiscord(client: Client, token: string): Promise<void> {
  if (!token) {
    throw new FatalAuthError('DISCORD_BOT_TOKEN is not set')
  }

  return new Promise((resolve, reject) => {
    client.once(Events.ClientReady, () => {
      resolve()
    })

    client.once(Events.Error, (error) => {
      reject(toBackendError(error, 'connect'))
    })

    client.login(token).catch((error: unknown) => {
      reject(toBackendError(error, 'log in'))
    })
  })
}

/**
 * Disconnect from Discord
 */
export async function disconnectDiscord(client: Client): Promise<void> {
  await client.destroy()
}
