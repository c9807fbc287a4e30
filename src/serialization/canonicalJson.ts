import { createHash } from 'blake3-wasm';

type CanonicalScalar = null | boolean | number | string;

export type CanonicalValue =
  | CanonicalScalar
  | CanonicalValue[]
  | { [key: string]: CanonicalValue };

export type CanonicalJsonWriteOptions = {
  indent?: number;
};

const textEncoder = new TextEncoder();

const bytesToHex = (bytes: Uint8Array): string => {
  let result = '';
  for (let i = 0; i < bytes.length; i++) {
    result += bytes[i].toString(16).padStart(2, '0');
  }
  return result;
};

export const hashBytes = (bytes: Uint8Array): string =>
  bytesToHex(createHash().update(bytes).digest());

const canonicalNumber = (value: number): number => {
  if (!Number.isFinite(value)) {
    throw new TypeError(`Canonical JSON cannot encode non-finite numbers (received ${value})`);
  }
  return Object.is(value, -0) ? 0 : value;
};

const isPlainObject = (value: object): value is Record<string, unknown> => {
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
};

const toCanonical = (value: unknown, inArray: boolean): CanonicalValue | undefined => {
  if (value === null) {
    return null;
  }
  switch (typeof value) {
    case 'number':
      return canonicalNumber(value);
    case 'string':
    case 'boolean':
      return value;
    case 'undefined':
    case 'function':
    case 'symbol':
      return inArray ? null : undefined;
    case 'bigint':
      throw new TypeError('Canonical JSON does not support bigint values');
    default:
      break;
  }
  if (Array.isArray(value)) {
    return value.map((entry) => toCanonical(entry, true) ?? null);
  }
  if (ArrayBuffer.isView(value) && !(value instanceof DataView)) {
    return Array.from(value as ArrayLike<number>, canonicalNumber);
  }
  if (value && typeof value === 'object' && isPlainObject(value)) {
    const result: { [key: string]: CanonicalValue } = {};
    for (const key of Object.keys(value).sort()) {
      const entry = toCanonical(value[key], false);
      if (entry !== undefined) {
        result[key] = entry;
      }
    }
    return result;
  }
  throw new TypeError('Unsupported canonical JSON value encountered during serialization');
};

/**
 * Deterministic JSON: object keys sorted, `-0` written as `0`, non-finite numbers rejected.
 */
export const writeCanonicalJson = (
  value: unknown,
  options: CanonicalJsonWriteOptions = {},
): string => {
  const canonical = toCanonical(value, false) ?? null;
  const indent =
    typeof options.indent === 'number' && options.indent > 0 ? Math.min(options.indent, 10) : 0;
  return indent > 0 ? JSON.stringify(canonical, null, indent) : JSON.stringify(canonical);
};

export const readCanonicalJson = (text: string): CanonicalValue => {
  const parsed: unknown = JSON.parse(text);
  const canonical = toCanonical(parsed, false);
  return canonical ?? null;
};

export const hashCanonicalJsonString = (json: string): string =>
  hashBytes(textEncoder.encode(json));

export const hashCanonicalJson = (
  value: unknown,
  options: CanonicalJsonWriteOptions = {},
): { json: string; hash: string } => {
  const json = writeCanonicalJson(value, options);
  return { json, hash: hashCanonicalJsonString(json) };
};
