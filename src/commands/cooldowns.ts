import type { CommandContext } from './context.js'
import { CommandError, CommandOnCooldown, CooldownKeyError } from './errors.js'
import type { Awaitable } from './types.js'

/**
 * Built-in key rules:
 * - `global`: one shared key
 * - `user`: per sender, across chats
 * - `channel`: per chat, shared by everyone in it
 * - `chatter`: per sender within a chat
 */
export type BucketType = 'global' | 'user' | 'channel' | 'chatter'

/** Custom key rule. Returning `null` exempts the invocation from this cooldown. */
export type BucketKey = (ctx: CommandContext) => Awaitable<string | null>

export type Bucket = BucketType | BucketKey

export type CooldownAlgorithm = 'fixed-window' | 'gcra'

export interface CooldownSpec {
  bucket: Bucket
  /** Attempts admitted per period. */
  rate: number
  periodMs: number
  algorithm?: CooldownAlgorithm
  /** GCRA only: attempts admitted back to back. Defaults to `rate`. */
  burst?: number
}

export function bucketKey(bucket: BucketType, ctx: CommandContext): string {
  const { message } = ctx
  switch (bucket) {
    case 'global':
      return 'global'
    case 'user':
      return `user:${message.senderId}`
    case 'channel':
      return `channel:${message.channel}:${message.chatId}`
    case 'chatter':
      return `chatter:${message.channel}:${message.chatId}:${message.senderId}`
  }
}

export type CooldownVerdict = { allowed: true; commit(): void } | { allowed: false; retryAfterMs: number }

type Step<S> = { allowed: true; state: S } | { allowed: false; retryAfterMs: number }

const PRUNE_THRESHOLD = 1024

/**
 * Keyed rate-limit state for one declared cooldown.
 *
 * {@link check} computes the outcome without touching stored state; the caller applies it
 * through `commit()` only once every cooldown in the set has allowed the attempt.
 */
export abstract class Cooldown<S = unknown> {
  private readonly states = new Map<string, S>()

  constructor(
    readonly bucket: Bucket,
    readonly rate: number,
    readonly periodMs: number
  ) {
    if (!Number.isInteger(rate) || rate < 1) {
      throw new RangeError(`Cooldown rate must be an integer >= 1, got ${rate}.`)
    }
    if (!(periodMs > 0)) {
      throw new RangeError(`Cooldown period must be positive, got ${periodMs}.`)
    }
  }

  protected abstract step(state: S | undefined, now: number): Step<S>

  protected abstract isStale(state: S, now: number): boolean

  async key(ctx: CommandContext): Promise<string | null> {
    if (typeof this.bucket === 'function') return this.bucket(ctx)
    return bucketKey(this.bucket, ctx)
  }

  check(key: string, now: number): CooldownVerdict {
    const outcome = this.step(this.states.get(key), now)
    if (!outcome.allowed) return outcome
    return {
      allowed: true,
      commit: () => {
        this.states.set(key, outcome.state)
        if (this.states.size > PRUNE_THRESHOLD) this.prune(now)
      }
    }
  }

  /** Milliseconds until `key` would be admitted, 0 when it would be now. */
  retryAfter(key: string, now: number): number {
    const outcome = this.step(this.states.get(key), now)
    return outcome.allowed ? 0 : outcome.retryAfterMs
  }

  /** Drops keys whose state no longer limits anything. */
  prune(now: number): void {
    for (const [key, state] of this.states) {
      if (this.isStale(state, now)) this.states.delete(key)
    }
  }

  /** Clears one key, or every key. */
  reset(key?: string): void {
    if (key === undefined) this.states.clear()
    else this.states.delete(key)
  }

  get size(): number {
    return this.states.size
  }
}

interface Window {
  count: number
  start: number
}

/**
 * Fixed-window counter: at most `rate` attempts per window of `periodMs`,
 * the window opening at the first attempt after the previous one expired.
 * A window covers `[start, start + periodMs]`; the first admitted instant is one past it.
 */
export class FixedWindowCooldown extends Cooldown<Window> {
  protected step(state: Window | undefined, now: number): Step<Window> {
    if (!state || now > state.start + this.periodMs) {
      return { allowed: true, state: { count: 1, start: now } }
    }
    if (state.count + 1 > this.rate) {
      return { allowed: false, retryAfterMs: state.start + this.periodMs - now + 1 }
    }
    return { allowed: true, state: { count: state.count + 1, start: state.start } }
  }

  protected isStale(state: Window, now: number): boolean {
    return now > state.start + this.periodMs
  }
}

/**
 * Generic Cell Rate Algorithm. Stores one theoretical arrival time (TAT) per key.
 *
 * With emission interval `T = periodMs / rate` and tolerance `tau = T * (burst - 1)`,
 * an attempt at `now` conforms when `now >= TAT` or `TAT - now <= tau`.
 */
export class GcraCooldown extends Cooldown<number> {
  readonly burst: number

  constructor(bucket: Bucket, rate: number, periodMs: number, burst: number = rate) {
    super(bucket, rate, periodMs)
    if (!Number.isInteger(burst) || burst < 1) {
      throw new RangeError(`Cooldown burst must be an integer >= 1, got ${burst}.`)
    }
    this.burst = burst
  }

  get emissionInterval(): number {
    return this.periodMs / this.rate
  }

  get tolerance(): number {
    return this.emissionInterval * (this.burst - 1)
  }

  protected step(tat: number | undefined, now: number): Step<number> {
    const interval = this.emissionInterval
    if (tat === undefined || now >= tat) {
      return { allowed: true, state: Math.max(tat ?? now, now) + interval }
    }
    if (tat - now <= this.tolerance) {
      return { allowed: true, state: tat + interval }
    }
    return { allowed: false, retryAfterMs: tat - this.tolerance - now }
  }

  protected isStale(tat: number, now: number): boolean {
    return now >= tat
  }
}

export function createCooldown(spec: CooldownSpec): Cooldown {
  if (spec.algorithm === 'gcra') return new GcraCooldown(spec.bucket, spec.rate, spec.periodMs, spec.burst)
  return new FixedWindowCooldown(spec.bucket, spec.rate, spec.periodMs)
}

export type Clock = () => number

/**
 * Evaluates every cooldown attached to a command as one unit.
 */
export class CooldownManager {
  constructor(
    readonly command: string,
    readonly cooldowns: readonly Cooldown[],
    private readonly now: Clock = Date.now
  ) {}

  /**
   * Admits the attempt or throws `CommandOnCooldown` with the longest wait.
   *
   * Keys are computed first (they may suspend); the checks and commits that follow run
   * without suspending, so concurrent invocations for one key cannot both pass on the
   * last unit of budget. Nothing is charged unless every cooldown allows the attempt.
   */
  async acquire(ctx: CommandContext): Promise<void> {
    if (this.cooldowns.length === 0) return

    const keyed = await Promise.all(
      this.cooldowns.map(async (cooldown) => ({ cooldown, key: await this.keyFor(cooldown, ctx) }))
    )
    ctx.signal.throwIfAborted()

    const now = this.now()
    const verdicts: CooldownVerdict[] = []
    for (const { cooldown, key } of keyed) {
      if (key !== null) verdicts.push(cooldown.check(key, now))
    }

    let retryAfterMs = 0
    for (const verdict of verdicts) {
      if (!verdict.allowed) retryAfterMs = Math.max(retryAfterMs, verdict.retryAfterMs)
    }
    if (verdicts.some((verdict) => !verdict.allowed)) {
      throw new CommandOnCooldown(this.command, retryAfterMs)
    }

    for (const verdict of verdicts) {
      if (verdict.allowed) verdict.commit()
    }
  }

  private async keyFor(cooldown: Cooldown, ctx: CommandContext): Promise<string | null> {
    try {
      return await cooldown.key(ctx)
    } catch (error) {
      if (error instanceof CommandError) throw error
      throw new CooldownKeyError(this.command, { cause: error })
    }
  }
}
