/**
 * Tollgate Runtime Host — Call-Data Types
 *
 * The scalar types a contract function may declare, their array forms, and
 * the JavaScript values that carry them:
 *
 *   address, bytes4, bytes32, string  → string
 *   uint256, uint64                   → bigint
 *   uint8                             → number
 *   bool                              → boolean
 *   bytes                             → Uint8Array
 */

export const SCALAR_TYPES = [
  'address',
  'uint256',
  'uint64',
  'uint8',
  'bool',
  'bytes',
  'bytes4',
  'bytes32',
  'string',
] as const;

export type ScalarType = (typeof SCALAR_TYPES)[number];
export type ArrayType = `${ScalarType}[]`;
export type AbiType = ScalarType | ArrayType;

export type AbiScalar = string | bigint | number | boolean | Uint8Array;
export type AbiValue = AbiScalar | ReadonlyArray<AbiScalar>;

const SCALAR_SET: ReadonlySet<string> = new Set<string>(SCALAR_TYPES);

export function isScalarType(type: string): type is ScalarType {
  return SCALAR_SET.has(type);
}

export function isAbiType(type: string): type is AbiType {
  if (type.endsWith('[]')) {
    return isScalarType(type.slice(0, -2));
  }
  return isScalarType(type);
}

/** The element type of an array type, or null for scalars. */
export function elementType(type: AbiType): ScalarType | null {
  if (!type.endsWith('[]')) return null;
  const inner = type.slice(0, -2);
  return isScalarType(inner) ? inner : null;
}

export function isScalarValue(value: AbiValue): value is AbiScalar {
  return !Array.isArray(value);
}
