/**
 * Configuration for the sample output.
 *
 * The output is configured by a query-string shaped argument such as
 * `port=9000&namespace=k6`. Keys are case-insensitive; unknown keys,
 * repeated keys and malformed percent-encoding are rejected.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';

/** Default pull-endpoint TCP port. */
export const DEFAULT_PORT = 5656;

/** Default flush interval in milliseconds. */
export const DEFAULT_FLUSH_INTERVAL_MS = 1000;

/**
 * Parsed option set.
 */
export interface OutputOptions {
  /** Pull-endpoint TCP port; 0 picks an ephemeral port */
  port: number;
  /** Interface to bind; empty means all interfaces */
  host: string;
  /** First identity prefix segment */
  namespace: string;
  /** Second identity prefix segment */
  subsystem: string;
}

export const DEFAULT_OUTPUT_OPTIONS: Readonly<OutputOptions> = {
  port: DEFAULT_PORT,
  host: '',
  namespace: '',
  subsystem: '',
};

const OPTION_KEYS = ['port', 'host', 'namespace', 'subsystem'] as const;

type OptionKey = (typeof OPTION_KEYS)[number];

const optionsSchema = z
  .object({
    port: z
      .string()
      .regex(/^\d+$/, 'must be a decimal integer')
      .transform(Number)
      .pipe(z.number().int().min(0).max(65535, 'must be at most 65535')),
    host: z.string(),
    namespace: z.string(),
    subsystem: z.string(),
  })
  .partial()
  .strict();

/**
 * Parses the option string into a complete option set.
 * @throws ConfigurationError on malformed input or invalid values
 */
export function parseConfigArgument(arg: string): OutputOptions {
  if (arg.trim() === '') {
    return { ...DEFAULT_OUTPUT_OPTIONS };
  }

  const result = optionsSchema.safeParse(parseQuery(arg));
  if (!result.success) {
    const issue = result.error.issues[0];
    if (issue && issue.path.length > 0) {
      const option = issue.path.join('.');
      throw new ConfigurationError(`Invalid option "${option}": ${issue.message}`, { option });
    }
    throw new ConfigurationError(`Invalid options: ${result.error.message}`);
  }

  return { ...DEFAULT_OUTPUT_OPTIONS, ...result.data };
}

/**
 * Listener address in `host:port` form.
 */
export function formatAddress(options: Pick<OutputOptions, 'host' | 'port'>): string {
  return `${options.host}:${options.port}`;
}

function parseQuery(arg: string): Partial<Record<OptionKey, string>> {
  const values: Partial<Record<OptionKey, string>> = {};

  for (const pair of arg.split('&')) {
    if (pair === '') {
      continue;
    }
    if (pair.includes(';')) {
      throw new ConfigurationError(`Invalid semicolon separator in option string: "${pair}"`);
    }

    const separator = pair.indexOf('=');
    const rawKey = separator === -1 ? pair : pair.slice(0, separator);
    const rawValue = separator === -1 ? '' : pair.slice(separator + 1);

    const key = decode(rawKey);
    const option = OPTION_KEYS.find((name) => name === key.toLowerCase());
    if (option === undefined) {
      throw new ConfigurationError(`Unknown option "${key}"`, { option: key });
    }
    if (values[option] !== undefined) {
      throw new ConfigurationError(`Option "${option}" given more than once`, { option });
    }

    values[option] = decode(rawValue);
  }

  return values;
}

function decode(component: string): string {
  try {
    return decodeURIComponent(component.replace(/\+/g, ' '));
  } catch (error) {
    throw new ConfigurationError(`Malformed escape in option string: "${component}"`, {
      cause: error instanceof Error ? error : undefined,
    });
  }
}
