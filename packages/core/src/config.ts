import { z } from 'zod';
import { ConsoleError, ErrorCode } from './errors.js';

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const loggerSchema = z.custom<Logger>(
  (value) =>
    typeof value === 'object' &&
    value !== null &&
    ['debug', 'info', 'warn', 'error'].every(
      (level) => typeof Reflect.get(value, level) === 'function',
    ),
  { message: 'expected an object with debug, info, warn and error functions' },
);

export const consoleOptionsSchema = z.object({
  /** Lower clamp of the computed console width, in columns; never below 80. */
  minimumWidth: z.number().int().min(80).default(80),
  /** Entries kept in the input history; the oldest is dropped first. */
  historySize: z.number().int().positive().default(200),
  /** Terminator appended by writeLine. */
  newLine: z.enum(['\n', '\r\n']).default('\r\n'),
  logger: loggerSchema.default(() => console),
});

export type ConsoleOptions = z.input<typeof consoleOptionsSchema>;
export type ResolvedConsoleOptions = z.output<typeof consoleOptionsSchema>;

export function resolveOptions(options: ConsoleOptions = {}): ResolvedConsoleOptions {
  const result = consoleOptionsSchema.safeParse(options);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join('.') || 'options';
    throw new ConsoleError(ErrorCode.EINVAL, `${field}: ${issue?.message ?? 'invalid value'}`);
  }
  return result.data;
}
