import * as fs from 'node:fs/promises'
import { z } from 'zod'

import type { CommandContext } from '../commands/context.js'
import type { Entity, EntityKind, EntityResolver } from '../commands/types.js'

const entitySchema = z.object({
  kind: z.enum(['user', 'channel', 'clip']),
  id: z.string().min(1),
  name: z.string().min(1),
  data: z.record(z.unknown()).optional()
})

const directorySchema = z.object({
  entities: z.array(entitySchema)
})

/**
 * In-process entity directory. Users match by id first, then by login (case-insensitive);
 * channels and clips match by id or name.
 */
export class InMemoryDirectory implements EntityResolver {
  private readonly entities: Entity[]

  constructor(entities: Entity[] = []) {
    this.entities = [...entities]
  }

  add(entity: Entity): void {
    this.entities.push(entity)
  }

  async resolveEntity(_ctx: CommandContext, kind: EntityKind, raw: string): Promise<Entity | undefined> {
    const candidates = this.entities.filter((e) => e.kind === kind)
    const byId = candidates.find((e) => e.id === raw)
    if (byId) return byId
    const lowered = raw.toLowerCase()
    return candidates.find((e) => e.name.toLowerCase() === lowered)
  }

  get size(): number {
    return this.entities.length
  }
}

/** Reads and validates a directory JSON file (`{ "entities": [...] }`). */
export async function loadDirectory(filePath: string): Promise<InMemoryDirectory> {
  const raw = await fs.readFile(filePath, 'utf-8')
  const parsed = directorySchema.parse(JSON.parse(raw))
  return new InMemoryDirectory(parsed.entities)
}
