export type InputRejection = 'empty_input' | 'invalid_encoding' | 'control_characters' | 'input_too_long';

export type SanitizedInput = { ok: true; text: string } | { ok: false; reason: InputRejection };

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;
// Tab is allowed inside a line; every other C0 control, including an embedded newline, is not.
const CONTROL_CHARACTER = /[\u0000-\u0008\u000A-\u001F\u007F]/;

const decoder = new TextDecoder('utf-8', { fatal: true });

const decode = (raw: string | Uint8Array): string | null => {
  if (typeof raw === 'string') {
    return LONE_SURROGATE.test(raw) ? null : raw;
  }
  try {
    return decoder.decode(raw);
  } catch {
    return null;
  }
};

export const sanitizeInput = (raw: string | Uint8Array, maxBytes: number): SanitizedInput => {
  const decoded = decode(raw);
  if (decoded === null) return { ok: false, reason: 'invalid_encoding' };

  const text = decoded.trim();
  if (!text) return { ok: false, reason: 'empty_input' };
  if (CONTROL_CHARACTER.test(text)) return { ok: false, reason: 'control_characters' };
  if (Buffer.byteLength(text, 'utf8') > maxBytes) return { ok: false, reason: 'input_too_long' };

  return { ok: true, text };
};
