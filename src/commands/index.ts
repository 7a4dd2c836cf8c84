export { command, CommandBuilder } from './builder.js'
export type { ParamOptions } from './builder.js'
export { Command, DEFAULT_DELIMITER } from './command.js'
export type { Component, Parameter } from './command.js'
export { Invocation, isBound } from './context.js'
export type { CommandContext, DispatchState, InvocationOutcome } from './context.js'
export {
  ConverterRegistry,
  bool,
  channel,
  clip,
  converter,
  float,
  int,
  optional,
  str,
  toConverter,
  union,
  user
} from './converters.js'
export type { Converter, ConverterClass, ConverterFn, ConverterTypeMap, TypeName, TypeSpec } from './converters.js'
export { Cooldown, CooldownManager, FixedWindowCooldown, GcraCooldown, createCooldown } from './cooldowns.js'
export type { Bucket, BucketKey, BucketType, CooldownAlgorithm, CooldownSpec } from './cooldowns.js'
export { Dispatcher } from './dispatcher.js'
export type { DispatcherOptions, ErrorReporter, PrefixOption, PrefixResolver } from './dispatcher.js'
export * from './errors.js'
export { adminOnly, guard, hasRole, inChat, isOwner } from './guards.js'
export type { Guard, GuardLike, GuardPredicate } from './guards.js'
export { CommandRegistry } from './registry.js'
export type { CommandRegistryOptions, Resolution } from './registry.js'
export { ChatErrorReporter, describeFailure } from './reporting.js'
export { setupCommands } from './setup.js'
export type { CommandDependencies, SetupCommandsOptions } from './setup.js'
export { tokenize } from './tokenizer.js'
export type { Token, TokenizedInput, TokenizerOptions } from './tokenizer.js'
export type {
  BoundArgs,
  CommandDefinition,
  ComponentDefinition,
  Entity,
  EntityKind,
  EntityResolver,
  ErrorHandler,
  InvokeHook,
  MessageSender,
  ParameterDefinition,
  ParameterKind
} from './types.js'
export { echoCommand, helpCommand, IntRange, pingCommand, rollCommand } from './definitions/utility.js'
export { configCommand, configGetCommand, configSetCommand, RuntimeSettings } from './definitions/config.js'
export { shoutoutCommand } from './definitions/moderation.js'
