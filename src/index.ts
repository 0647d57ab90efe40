import config from '@/helpers/env'
import { configureLogger, createLogger } from '@/helpers/logger'
import type { LogLevel } from '@/helpers/logger'
import { FatalAuthError, errorMessage } from '@/helpers/errors'
import { createPlatformClient, isPlatformType } from '@/platforms/factory'
import type { IPlatformClient, PlatformType } from '@/platforms/types'
import { ConversationStore } from '@/cli/store'
import { SearchIndex } from '@/cli/search'
import { UpdateReconciler } from '@/cli/reconciler'
import { ActionDispatcher } from '@/cli/dispatcher'
import { createTextMetrics } from '@/cli/text-metrics'
import { renderApp } from '@/cli/ui/App'
import { showPlatformSelector } from '@/cli/ui/showPlatformSelector'

const log = createLogger('main')

function isLogLevel(value: string): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error'
}

async function resolvePlatform(): Promise<PlatformType | null> {
  if (isPlatformType(config.PARLEY_PLATFORM)) return config.PARLEY_PLATFORM
  return showPlatformSelector(config.DISCORD_BOT_TOKEN !== '')
}

async function connect(client: IPlatformClient): Promise<boolean> {
  console.log(`Connecting to ${client.type}...`)
  try {
    await client.connect()
    return true
  } catch (error) {
    log.error(`Connect failed: ${errorMessage(error)}`)
    if (error instanceof FatalAuthError) {
      console.error(`✗ ${error.message}`)
    } else {
      console.error(`✗ Could not connect: ${errorMessage(error)}`)
    }
    return false
  }
}

async function main(): Promise<number> {
  configureLogger({
    filePath: config.PARLEY_LOG_FILE,
    level: isLogLevel(config.PARLEY_LOG_LEVEL) ? config.PARLEY_LOG_LEVEL : 'info',
    truncate: true,
  })

  const platform = await resolvePlatform()
  if (!platform) return 0

  const client = createPlatformClient(platform, {
    discordToken: config.DISCORD_BOT_TOKEN,
    demoIntervalMs: config.PARLEY_DEMO_INTERVAL_MS,
  })
  if (!(await connect(client))) return 1

  const store = new ConversationStore({ messageWindow: config.PARLEY_MESSAGE_WINDOW })
  const search = new SearchIndex(store)
  const reconciler = new UpdateReconciler({
    client,
    store,
    conversationLimit: config.PARLEY_CONVERSATION_LIMIT,
    messageLimit: config.PARLEY_MESSAGE_LIMIT,
    retry: {
      baseDelayMs: config.PARLEY_RETRY_BASE_MS,
      maxDelayMs: config.PARLEY_RETRY_MAX_MS,
      maxAttempts: config.PARLEY_RETRY_ATTEMPTS,
    },
    onFatal: (error) => {
      log.error(`Session ended: ${error.message}`)
    },
  })

  let exitRequested: () => void = () => undefined
  const exited = new Promise<void>((resolve) => {
    exitRequested = resolve
  })

  const dispatcher = new ActionDispatcher({
    store,
    search,
    actions: reconciler,
    onExit: () => exitRequested(),
  })

  const app = renderApp({
    store,
    search,
    dispatcher,
    reconciler,
    metrics: createTextMetrics(),
    frameMs: config.PARLEY_FRAME_MS,
  })

  reconciler.start().catch((error: unknown) => {
    log.error(`Initial sync failed: ${errorMessage(error)}`)
  })

  await exited

  app.unmount()
  reconciler.stop()
  search.dispose()
  try {
    await client.disconnect()
  } catch (error) {
    log.warn(`Disconnect failed: ${errorMessage(error)}`)
  }
  log.info('Exited')
  return 0
}

main()
  .then((code) => {
    process.exit(code)
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', errorMessage(error))
    process.exit(1)
  })
