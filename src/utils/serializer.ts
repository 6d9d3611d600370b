/**
 * JSON serialization for wire messages.
 *
 * Wire messages are JSON documents encoded as UTF-8 bytes. Binary fields (the ESDL
 * documents) are written as tagged base64 objects and restored on parse.
 */

interface TaggedValue {
  __type: string;
  value: unknown;
}

function isTaggedValue(value: unknown): value is TaggedValue {
  return (
    value !== null &&
    typeof value === 'object' &&
    '__type' in value &&
    typeof value.__type === 'string' &&
    'value' in value
  );
}

/**
 * Replacer for JSON.stringify that writes a Uint8Array (or Buffer) as
 * `{ "__type": "Bytes", "value": <base64> }`.
 *
 * JSON.stringify applies `Buffer#toJSON` before calling the replacer, so the untouched
 * value is read back from the holder object.
 */
export function jsonReplacer(this: unknown, key: string, value: unknown): unknown {
  const raw: unknown =
    this !== null && typeof this === 'object' ? Reflect.get(this, key) : value;

  if (raw instanceof Uint8Array) {
    return { __type: 'Bytes', value: Buffer.from(raw).toString('base64') };
  }
  return value;
}

/**
 * Reviver for JSON.parse that restores the bytes written by `jsonReplacer`.
 */
export function jsonReviver(_key: string, value: unknown): unknown {
  if (isTaggedValue(value) && value.__type === 'Bytes' && typeof value.value === 'string') {
    return new Uint8Array(Buffer.from(value.value, 'base64'));
  }
  return value;
}

/**
 * Serialize a value to a JSON string, tagging binary fields.
 */
export function serialize(value: unknown): string {
  return JSON.stringify(value, jsonReplacer);
}

/**
 * Deserialize a JSON string, restoring tagged binary fields.
 */
export function deserialize(json: string): unknown {
  return JSON.parse(json, jsonReviver);
}

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Serialize a value to UTF-8 encoded JSON bytes.
 */
export function serializeToBytes(value: unknown): Uint8Array {
  return encoder.encode(serialize(value));
}

/**
 * Deserialize UTF-8 encoded JSON bytes.
 *
 * @throws TypeError if the bytes are not valid UTF-8, SyntaxError if they are not JSON
 */
export function deserializeFromBytes(bytes: Uint8Array): unknown {
  return deserialize(decoder.decode(bytes));
}
