/**
 * Command resolution.
 *
 * Turns a step's command template into a concrete argv by substituting
 * `{placeholder}` references with run parameters and engine variables.
 */

import { ArgumentTemplate, CommandTemplate } from '../domain/flow';
import { EngineError, createTypedError } from '../domain/errors';

export const APPEND_FLAG = '--append';
export const OVERWRITE_FLAG = '--overwrite';

export interface ResolvedCommand {
  program: string;
  args: string[];
  env: Record<string, string>;
}

/** Variant switches chosen by the skip policy. */
export interface CommandVariant {
  append: boolean;
  overwriteFlag: boolean;
}

const PLACEHOLDER = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

type Values = Readonly<Record<string, unknown>>;

function stringify(value: unknown): string | undefined {
  if (value === undefined || value === null || value === '') return undefined;
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return undefined;
}

/** Substitute placeholders; returns undefined if any placeholder has no value. */
export function substitute(template: string, values: Values): string | undefined {
  let complete = true;
  const result = template.replace(PLACEHOLDER, (_match, name: string) => {
    const value = stringify(values[name]);
    if (value === undefined) {
      complete = false;
      return '';
    }
    return value;
  });
  return complete ? result : undefined;
}

function isTruthy(value: unknown): boolean {
  if (typeof value === 'string') return value.length > 0 && value !== 'false';
  return Boolean(value);
}

function resolveArgument(arg: ArgumentTemplate, values: Values): string[] {
  if (typeof arg === 'string') {
    const resolved = substitute(arg, values);
    if (resolved === undefined) {
      throw new EngineError(
        createTypedError({
          code: 'VALIDATION.TEMPLATE',
          message: `Unresolved placeholder in argument "${arg}"`,
          details: { template: arg },
        }),
      );
    }
    return [resolved];
  }
  if ('option' in arg) {
    const resolved = substitute(arg.value, values);
    return resolved === undefined ? [] : [arg.option, resolved];
  }
  return isTruthy(values[arg.when]) ? [arg.flag] : [];
}

/**
 * Resolve a command template.
 * `values` holds the flow parameters merged with engine variables
 * (interpreter, scripts directory, run directory).
 */
export function resolveCommand(
  template: CommandTemplate,
  values: Values,
  variant: CommandVariant = { append: false, overwriteFlag: false },
): ResolvedCommand {
  const program = resolveArgument(template.program, values)[0];
  const args = template.args.flatMap((arg) => resolveArgument(arg, values));
  if (variant.append) args.push(APPEND_FLAG);
  if (variant.overwriteFlag) args.push(OVERWRITE_FLAG);

  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(template.env ?? {})) {
    env[key] = substitute(value, values) ?? value;
  }
  return { program, args, env };
}

/** Render a command for the run log. Arguments with whitespace are quoted. */
export function formatCommand(command: Pick<ResolvedCommand, 'program' | 'args'>): string {
  return [command.program, ...command.args]
    .map((part) => (/[\s"']/.test(part) ? JSON.stringify(part) : part))
    .join(' ');
}
