// Request admission
// Validates and sanitizes inbound text before any dependency is touched

import { AdmissionError } from '../utils/errors.js';

export const DEFAULT_MAX_INPUT_LENGTH = 5000;

export interface Request {
  readonly id: string;
  readonly rawInput: string;
  readonly sanitizedInput: string;
  readonly receivedAt: Date;
}

export interface AdmissionOptions {
  maxLength?: number;
  now?: () => Date;
}

// C0 controls except \t \n \r, DEL, and C1 controls
const CONTROL_CHARACTERS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F-\u009F]/g;
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

const strictUtf8 = new TextDecoder('utf-8', { fatal: true });

export function stripControlCharacters(input: string): string {
  return input.replace(CONTROL_CHARACTERS, '');
}

/**
 * Admit raw text. `declaredLength` is the size the transport announced, when it
 * announced one; both it and the actual length must stay under the ceiling.
 *
 * The returned Request has no id yet; the correlator assigns one.
 */
export function admit(
  rawInput: string,
  declaredLength?: number,
  options: AdmissionOptions = {},
): Request {
  const maxLength = options.maxLength ?? DEFAULT_MAX_INPUT_LENGTH;

  if (rawInput.length === 0) {
    throw new AdmissionError('Empty', 'Message must not be empty');
  }

  const length = Math.max(rawInput.length, declaredLength ?? 0);
  if (length > maxLength) {
    throw new AdmissionError('TooLong', `Message exceeds the maximum length of ${maxLength} characters (got ${length})`);
  }

  if (LONE_SURROGATE.test(rawInput)) {
    throw new AdmissionError('InvalidEncoding', 'Message is not valid UTF-8 text');
  }

  const sanitizedInput = stripControlCharacters(rawInput);
  if (sanitizedInput.trim().length === 0) {
    throw new AdmissionError('Empty', 'Message is empty after sanitization');
  }

  return Object.freeze({
    id: '',
    rawInput,
    sanitizedInput,
    receivedAt: (options.now ?? (() => new Date()))(),
  });
}

/** Admit a raw byte payload, rejecting anything that is not well-formed UTF-8. */
export function admitBytes(payload: Uint8Array, options: AdmissionOptions = {}): Request {
  let text: string;
  try {
    text = strictUtf8.decode(payload);
  } catch {
    throw new AdmissionError('InvalidEncoding', 'Message is not valid UTF-8 text');
  }
  return admit(text, undefined, options);
}
