import { config as loadEnv } from 'dotenv'
import * as path from 'node:path'

import { getConfigDir, readSettings, settingsExist } from './settings.js'
import { configSchema, type ChatCmdConfig } from './schema.js'

/** Parses comma-separated list env values. */
export function parseCsv(input: string | undefined): string[] {
  if (!input) return []
  return input
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean)
}

function parseBool(input: string | undefined): boolean | undefined {
  if (input === undefined || input.trim() === '') return undefined
  return input.trim().toLowerCase() === 'true'
}

function parseNumber(input: string | undefined): number | undefined {
  if (input === undefined || input.trim() === '') return undefined
  return Number(input)
}

/** Drops `undefined` entries so schema defaults apply. */
function defined(record: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(record).filter(([, value]) => value !== undefined))
}

/** Maps `CHATCMD_*` variables onto the config shape. */
export function configFromEnv(env: NodeJS.ProcessEnv): unknown {
  const prefixes = parseCsv(env.CHATCMD_PREFIXES)
  const adminIds = parseCsv(env.CHATCMD_ADMIN_IDS)
  const allowFrom = parseCsv(env.CHATCMD_CLI_ALLOW_FROM)

  return defined({
    prefixes: prefixes.length > 0 ? prefixes : undefined,
    caseInsensitive: parseBool(env.CHATCMD_CASE_INSENSITIVE),
    ignoreExtraArguments: parseBool(env.CHATCMD_IGNORE_EXTRA_ARGUMENTS),
    ownerId: env.CHATCMD_OWNER_ID || undefined,
    selfId: env.CHATCMD_SELF_ID || undefined,
    adminIds: adminIds.length > 0 ? adminIds : undefined,
    maxMessageLength: parseNumber(env.CHATCMD_MAX_MESSAGE_LENGTH),
    logLevel: env.CHATCMD_LOG_LEVEL || undefined,
    directoryPath: env.CHATCMD_DIRECTORY_PATH || undefined,
    channels: {
      cli: defined({
        enabled: parseBool(env.CHATCMD_CLI_ENABLED),
        allowFrom: allowFrom.length > 0 ? allowFrom : undefined,
        senderId: env.CHATCMD_CLI_SENDER_ID || undefined,
        chatId: env.CHATCMD_CLI_CHAT_ID || undefined
      })
    }
  })
}

/**
 * Loads runtime configuration.
 *
 * If a `~/.chatcmd/settings.json` file exists it takes priority.
 * Otherwise falls back to `.env` / environment variables.
 */
export function loadConfig(): ChatCmdConfig {
  // Load env from ~/.chatcmd/.env first, then a local .env.
  loadEnv({ path: path.join(getConfigDir(), '.env') })
  loadEnv()

  if (settingsExist()) {
    return configSchema.parse(readSettings())
  }

  return configSchema.parse(configFromEnv(process.env))
}
