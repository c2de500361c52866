import { ConfigurationError } from './signatureTypes.js';
import type { TypeDesc } from './signatureTypes.js';
import { isTypeDesc } from './typeDesc.js';

export type MethodOptions = {
  /** Declared state type, e.g. `Rc<Counter>`. */
  state?: TypeDesc;
  /** Script-facing name. */
  name?: string;
  promise?: boolean;
  fast?: boolean;
};

export const METHOD_OPTION_KEYS = ['state', 'name', 'promise', 'fast'] as const;

type MethodOptionKey = (typeof METHOD_OPTION_KEYS)[number];

function isOptionKey(key: string): key is MethodOptionKey {
  return (METHOD_OPTION_KEYS as readonly string[]).includes(key);
}

const JS_IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

/**
 * Validates a raw option record (from an attribute or a config object).
 *
 * Every problem is a build-time ConfigurationError; nothing here is deferred
 * to call time.
 */
export function parseMethodOptions(
  raw: Record<string, unknown>,
  fnName?: string,
): MethodOptions {
  const where = fnName ? ` (fn=${fnName})` : '';
  const out: MethodOptions = {};

  for (const [key, value] of Object.entries(raw)) {
    if (!isOptionKey(key)) {
      throw new ConfigurationError(
        `Unknown option \`${key}\`${where}: expected \`state = Type\`, \`name = "jsName"\`, \`promise\`, or \`fast\``,
      );
    }

    switch (key) {
      case 'state':
        if (!isTypeDesc(value)) {
          throw new ConfigurationError(`Option \`state\` must be a type${where}`);
        }
        out.state = value;
        break;
      case 'name':
        if (typeof value !== 'string' || !JS_IDENTIFIER.test(value)) {
          throw new ConfigurationError(
            `Option \`name\` must be a valid identifier${where}, got ${JSON.stringify(value)}`,
          );
        }
        out.name = value;
        break;
      case 'promise':
      case 'fast':
        if (typeof value !== 'boolean') {
          throw new ConfigurationError(`Option \`${key}\` is a flag${where}`);
        }
        out[key] = value;
        break;
    }
  }

  return out;
}
