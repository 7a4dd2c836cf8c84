import { z } from 'zod'

const cliChannelSchema = z.object({
  enabled: z.boolean().default(true),
  allowFrom: z.array(z.string()).default([]),
  senderId: z.string().default('local-user'),
  chatId: z.string().default('local-chat')
})

/**
 * Runtime configuration schema for chatcmd.
 */
export const configSchema = z.object({
  prefixes: z.array(z.string().min(1)).min(1).default(['!']),
  caseInsensitive: z.boolean().default(true),
  ignoreExtraArguments: z.boolean().default(true),
  ownerId: z.string().optional(),
  selfId: z.string().optional(),
  adminIds: z.array(z.string()).default([]),
  maxMessageLength: z.number().int().positive().default(500),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  directoryPath: z.string().optional(),
  channels: z
    .object({
      cli: cliChannelSchema.default({})
    })
    .default({})
})

export type ChatCmdConfig = z.infer<typeof configSchema>
