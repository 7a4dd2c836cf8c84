import type { Parameter } from './command.js'
import type { CommandContext } from './context.js'
import { convertArgument } from './converters.js'
import { ArgumentParsingFailed, MissingRequiredArgument } from './errors.js'
import { restFrom, type TokenizedInput } from './tokenizer.js'
import type { BoundArgs } from './types.js'

function fallback(param: Parameter): unknown {
  if (param.hasDefault) return param.default
  if (param.optional) return undefined
  throw new MissingRequiredArgument(param.name)
}

/**
 * Binds tokenized input to parameters in declared order, converting as it goes so the
 * first bad value stops the walk before later values are converted.
 *
 * An optional positional parameter whose converter rejects the next token binds its
 * default (or `undefined`) and leaves the token for the following parameter. Tokens still
 * unclaimed when the consume-rest parameter is reached open its span.
 */
export async function bindArguments(
  ctx: CommandContext,
  parameters: readonly Parameter[],
  input: TokenizedInput,
  options: { ignoreExtra: boolean } = { ignoreExtra: true }
): Promise<BoundArgs> {
  const args: BoundArgs = {}
  let cursor = 0

  for (const param of parameters) {
    let raw: string | undefined
    switch (param.kind) {
      case 'positional':
        raw = input.positional[cursor]?.value
        break
      case 'special':
        raw = input.specials.get(param.name)?.value
        break
      case 'rest': {
        const unclaimed = input.positional[cursor]
        raw = unclaimed ? restFrom(input, unclaimed.start)?.value : input.rest?.value
        cursor = input.positional.length
        break
      }
    }

    if (raw === undefined) {
      args[param.name] = fallback(param)
      continue
    }

    const converted = await convertArgument(ctx, param.name, param.converter, raw)
    if (converted.absent) {
      args[param.name] = param.hasDefault ? param.default : undefined
      continue
    }
    args[param.name] = converted.value
    if (param.kind === 'positional') cursor += 1
  }

  const extra = input.positional[cursor]
  if (!options.ignoreExtra && extra) {
    throw new ArgumentParsingFailed(`Too many arguments, starting with "${extra.value}"`, extra.start)
  }

  return args
}
