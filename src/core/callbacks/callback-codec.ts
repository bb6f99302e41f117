import { CallbackActionName } from '../domain/enums';

export const CALLBACK_SEPARATOR = ':';

/**
 * Decoded callback token
 */
export interface DecodedCallback {
  name: string;
  args: string[];
}

/**
 * Callback action resolved from a token. Unrecognized names are kept so
 * the router can log them.
 */
export type CallbackAction =
  | { kind: CallbackActionName; args: string[] }
  | { kind: 'unknown'; name: string; args: string[] };

const KNOWN_ACTIONS: ReadonlySet<string> = new Set(
  Object.values(CallbackActionName),
);

function isActionName(name: string): name is CallbackActionName {
  return KNOWN_ACTIONS.has(name);
}

/**
 * Join an action name and its arguments into a callback token.
 *
 * Separators inside arguments are not escaped; callers must not pass them.
 */
export function encodeCallback(name: string, ...args: string[]): string {
  return [name, ...args].join(CALLBACK_SEPARATOR);
}

/**
 * Split a callback token into name and arguments. Never throws.
 */
export function decodeCallback(token: string | null | undefined): DecodedCallback {
  const [name, ...args] = (token ?? '').split(CALLBACK_SEPARATOR);
  return { name, args };
}

export function isAction(token: string | null | undefined, name: string): boolean {
  return (token ?? '') === name;
}

/**
 * True for the bare name and for the name followed by arguments,
 * e.g. "payments_page:last:3" for "payments_page"
 */
export function hasActionPrefix(
  token: string | null | undefined,
  name: string,
): boolean {
  const value = token ?? '';
  return value === name || value.startsWith(`${name}${CALLBACK_SEPARATOR}`);
}

export function parseCallbackAction(
  token: string | null | undefined,
): CallbackAction {
  const { name, args } = decodeCallback(token);

  if (isActionName(name)) {
    return { kind: name, args };
  }

  return { kind: 'unknown', name, args };
}
