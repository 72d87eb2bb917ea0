/**
 * Parameter Codec
 *
 * Wire format of the grow controller's line protocol:
 *   outbound  "key"            read a parameter
 *             "key=value"      write a parameter
 *   inbound   "key::value"     current value
 *
 * Write commands are echoed with the assignment still on the key
 * ("out-a:voltage=5::5.00"). Unknown or rejected keys come back with a
 * JSON error payload as the value. Nothing here throws: a line that cannot
 * be decoded is dropped by returning null.
 */

export const REPLY_DELIMITER = '::';
export const BATCH_SEPARATOR = ';';

/** Parameter key → latest value, as the device reported it */
export type ParameterSnapshot = Record<string, string>;

export interface ParameterUpdate {
  key: string;
  value: string;
}

export function encodeCommand(key: string, value?: string | number | boolean): string {
  if (value === undefined) return key;
  return `${key}=${formatValue(value)}`;
}

/** Booleans travel as 1/0 */
export function formatValue(value: string | number | boolean): string {
  if (typeof value === 'boolean') return value ? '1' : '0';
  return String(value);
}

/**
 * Split a reply at the first "::". Anything after it, including further
 * delimiters, is the value.
 */
export function decodeLine(line: string): ParameterUpdate | null {
  const idx = line.indexOf(REPLY_DELIMITER);
  if (idx === -1) return null;
  return {
    key: line.slice(0, idx).trim(),
    value: line.slice(idx + REPLY_DELIMITER.length).trim(),
  };
}

export function isErrorPayload(value: string): boolean {
  return value.startsWith('{"error"');
}

/**
 * Decode a reply into a usable parameter value: strips an echoed
 * assignment from the key and drops device error payloads.
 */
export function decodeReply(line: string): ParameterUpdate | null {
  const decoded = decodeLine(line);
  if (!decoded) return null;

  const assignIdx = decoded.key.indexOf('=');
  const key = (assignIdx === -1 ? decoded.key : decoded.key.slice(0, assignIdx)).trim();
  if (key.length === 0) return null;
  if (isErrorPayload(decoded.value)) return null;

  return { key, value: decoded.value };
}

export function splitLines(text: string): string[] {
  return text
    .split(/\r\n|\r|\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/** Decode a multi-value response body (newline- or ';'-separated replies) */
export function decodeResponse(text: string): ParameterSnapshot {
  const result: ParameterSnapshot = {};
  for (const line of splitLines(text)) {
    for (const part of line.split(BATCH_SEPARATOR)) {
      const update = decodeReply(part);
      if (update) {
        result[update.key] = update.value;
      }
    }
  }
  return result;
}

/** A key the wire format can carry: no whitespace, ';', '=' or '::' */
export function isValidParameterKey(key: string): boolean {
  return key.length > 0 && !/[\s;=]/.test(key) && !key.includes(REPLY_DELIMITER);
}

/**
 * A single "key" or "key=value" command. A value must not contain ';',
 * line breaks or '::', which would split it into several commands or
 * replies on the way to the device.
 */
export function isValidCommand(command: string): boolean {
  const assignIdx = command.indexOf('=');
  if (assignIdx === -1) return isValidParameterKey(command);

  const value = command.slice(assignIdx + 1);
  return isValidParameterKey(command.slice(0, assignIdx))
    && value.length > 0
    && !/[;\r\n]/.test(value)
    && !value.includes(REPLY_DELIMITER);
}

/** Key a command reads or writes ("fan:enabled=1" → "fan:enabled") */
export function commandKey(command: string): string {
  const assignIdx = command.indexOf('=');
  return (assignIdx === -1 ? command : command.slice(0, assignIdx)).trim();
}
