/**
 * Command Definitions
 *
 * Builds CommandSpec trees from plain definition objects. Subcommands start
 * from a copy of their parent's converters and parser settings as they
 * stand when the subcommand is defined.
 */

import { InitializationError } from '../errors/index.js';
import type { ArgSpecBuilder } from '../model/arg-spec.js';
import { propertyBinding, unmatchedArgsSetter } from '../model/bindings.js';
import { CommandSpec } from '../model/command-spec.js';
import { OptionSpec } from '../model/option-spec.js';
import { PositionalParamSpec } from '../model/positional-param-spec.js';
import { Range } from '../model/range.js';
import { camelCase, stripPrefix } from '../utils.js';
import type {
  ArgDefinition,
  CommandDefinition,
  OptionDefinition,
  PositionalDefinition,
  SubcommandDefinition,
} from './types.js';

type Target = Record<string, unknown> | undefined;

/**
 * Build the CommandSpec tree described by `definition`
 *
 * @throws {InitializationError} If the definition is invalid
 */
export function defineCommand(definition: CommandDefinition): CommandSpec {
  const spec = new CommandSpec({ name: definition.name, parser: definition.parser });
  return populate(spec, definition);
}

function defineSubcommand(parent: CommandSpec, definition: SubcommandDefinition): void {
  const spec = new CommandSpec({ name: definition.name, converters: parent.converters.clone() });
  spec.parser.initFrom(parent.parser);
  if (definition.parser) {
    spec.parser.apply(definition.parser);
  }
  populate(spec, definition);
  parent.addSubcommand(definition.name, spec);
}

function populate(spec: CommandSpec, definition: CommandDefinition): CommandSpec {
  const target = definition.target;
  spec.withAliases(...(definition.aliases ?? []));
  if (definition.version !== undefined) {
    spec.withVersion(...(typeof definition.version === 'string' ? [definition.version] : definition.version));
  }
  spec.withHelpCommand(definition.helpCommand ?? false);
  if (definition.defaultValueProvider) {
    spec.withDefaultValueProvider(definition.defaultValueProvider);
  }
  if (definition.converters) {
    spec.converters.registerAll(definition.converters);
  }

  for (const [name, mixin] of Object.entries(definition.mixins ?? {})) {
    spec.addMixin(name, defineCommand(mixin));
  }
  for (const option of definition.options ?? []) {
    spec.addOption(buildOption(option, target));
  }
  for (const positional of definition.positionals ?? []) {
    spec.addPositional(buildPositional(positional, target));
  }
  if (definition.mixinStandardHelpOptions) {
    spec.mixinStandardHelpOptions();
  }
  for (const subcommand of definition.subcommands ?? []) {
    defineSubcommand(spec, subcommand);
  }

  if (definition.unmatched !== undefined) {
    if (!target) {
      throw new InitializationError(
        `Command '${spec.name}' binds unmatched arguments to '${definition.unmatched}' but has no target`
      );
    }
    spec.addUnmatchedArgsBinding(unmatchedArgsSetter(propertyBinding(target, definition.unmatched)));
  }
  return spec;
}

// ─────────────────────────────────────────────────────────────
// Arguments
// ─────────────────────────────────────────────────────────────

function buildOption(definition: OptionDefinition, target: Target): OptionSpec {
  const longest = [...definition.names].sort((a, b) => b.length - a.length)[0] ?? '';
  const builder = OptionSpec.builder(...definition.names)
    .usageHelp(definition.usageHelp ?? false)
    .versionHelp(definition.versionHelp ?? false)
    .help(definition.help ?? false);
  return configure(builder, definition, target, camelCase(stripPrefix(longest))).build();
}

function buildPositional(definition: PositionalDefinition, target: Target): PositionalParamSpec {
  const builder = PositionalParamSpec.builder();
  if (definition.index !== undefined) {
    builder.index(definition.index);
  }
  const key = camelCase((definition.paramLabel ?? 'PARAM').toLowerCase());
  // positionals that need at least one value are required unless stated otherwise
  const requiredByDefault = Range.from(definition.arity ?? '1').min > 0;
  return configure(builder, definition, target, key, requiredByDefault).build();
}

/**
 * Apply the shared settings. With a target the value is bound to
 * `definition.property` (or `key`), whose current value becomes the
 * initial value unless one is given.
 */
function configure<B extends ArgSpecBuilder<B>>(
  builder: B,
  definition: ArgDefinition,
  target: Target,
  key: string,
  requiredByDefault = false
): B {
  if (definition.arity !== undefined) {
    builder.arity(definition.arity);
  }
  if (definition.type !== undefined) {
    builder.type(definition.type);
  }
  if (definition.container !== undefined) {
    builder.container(definition.container, ...(definition.auxiliaryTypes ?? []));
  } else if (definition.auxiliaryTypes !== undefined) {
    builder.auxiliaryTypes(...definition.auxiliaryTypes);
  }
  if (definition.split !== undefined) {
    builder.splitRegex(definition.split);
  }
  if (definition.paramLabel !== undefined) {
    builder.paramLabel(definition.paramLabel);
  }
  if (definition.description !== undefined) {
    builder.description(...(typeof definition.description === 'string' ? [definition.description] : definition.description));
  }
  if (definition.converters !== undefined) {
    builder.converters(...definition.converters);
  }
  if (definition.completionCandidates !== undefined) {
    builder.completionCandidates(definition.completionCandidates);
  }
  builder
    .required(definition.required ?? requiredByDefault)
    .defaultValue(definition.defaultValue)
    .hidden(definition.hidden ?? false)
    .interactive(definition.interactive ?? false);

  if (target) {
    const property = definition.property ?? key;
    builder.binding(propertyBinding(target, property));
    if (definition.initialValue === undefined && property in target) {
      builder.initialValue(target[property]);
    }
  }
  if (definition.initialValue !== undefined) {
    builder.initialValue(definition.initialValue);
  }
  return builder;
}
