import * as dotenv from 'dotenv'
import { cleanEnv, str, num } from 'envalid'
import { cwd } from 'process'
import { resolve, join } from 'path'
import { homedir } from 'os'

dotenv.config({ path: resolve(cwd(), '.env') })

// eslint-disable-next-line node/no-process-env
export default cleanEnv(process.env, {
  DISCORD_BOT_TOKEN: str({ default: '' }),
  PARLEY_PLATFORM: str({ choices: ['', 'discord', 'demo'], default: '' }), // Empty: ask with the platform selector
  PARLEY_CONVERSATION_LIMIT: num({ default: 100 }),
  PARLEY_MESSAGE_LIMIT: num({ default: 50 }), // Messages per window fetch
  PARLEY_MESSAGE_WINDOW: num({ default: 200 }), // Messages kept in memory per conversation
  PARLEY_FRAME_MS: num({ default: 33 }),
  PARLEY_RETRY_BASE_MS: num({ default: 1000 }),
  PARLEY_RETRY_MAX_MS: num({ default: 30000 }),
  PARLEY_RETRY_ATTEMPTS: num({ default: 5 }),
  PARLEY_LOG_FILE: str({ default: join(homedir(), '.parley.log') }),
  PARLEY_LOG_LEVEL: str({ choices: ['debug', 'info', 'warn', 'error'], default: 'info' }),
  PARLEY_DEMO_INTERVAL_MS: num({ default: 0 }), // Demo backend: scripted message interval, 0 disables
})
