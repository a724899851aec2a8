import type { DecodeError, FieldValidationError, Safe } from '@thorkit/utils'

export type KindError = FieldValidationError | DecodeError

/**
 * Values accepted on the encoding side of a profile.
 */
export type ProfileValue =
  | bigint
  | number
  | string
  | Uint8Array
  | null
  | undefined
  | readonly ProfileValue[]
  | ProfileRecord

export interface ProfileRecord {
  readonly [field: string]: ProfileValue
}

export type DecodedScalar = bigint | Uint8Array

/**
 * Values produced on the decoding side of a profile.
 */
export type DecodedValue = DecodedScalar | DecodedValue[] | DecodedRecord

export interface DecodedRecord {
  [field: string]: DecodedValue
}

/**
 * A leaf field codec. Options are bound when the kind is created.
 */
export interface ScalarKind {
  readonly type: 'scalar'
  readonly name: string
  encode(value: ProfileValue, path: string): Safe<Uint8Array, KindError>
  decode(bytes: Uint8Array, path: string): Safe<DecodedScalar, KindError>
}

export interface ArrayKind {
  readonly type: 'array'
  readonly item: Kind
}

export interface StructKind {
  readonly type: 'struct'
  readonly fields: readonly Profile[]
}

export type Kind = ScalarKind | ArrayKind | StructKind

export interface Profile {
  readonly name: string
  readonly kind: Kind
}
