import {
  DecodeError,
  ErrorCode,
  FieldValidationError,
  isSafeError,
  type Safe,
  safeError,
  safeResult,
} from '@thorkit/utils'
import { decode } from './decode'
import { encode } from './encode'
import type {
  DecodedRecord,
  DecodedValue,
  Kind,
  KindError,
  Profile,
  ProfileRecord,
  ProfileValue,
} from './kinds/types'
import type { RLPInput, RLPNode } from './types'

function isProfileList(value: ProfileValue): value is readonly ProfileValue[] {
  return Array.isArray(value)
}

function isProfileRecord(value: ProfileValue): value is ProfileRecord {
  return (
    typeof value === 'object' &&
    value !== null &&
    !(value instanceof Uint8Array) &&
    !Array.isArray(value)
  )
}

function structureError(path: string, message: string) {
  return safeError(new DecodeError(message, { path }))
}

/**
 * Walks `kind` against `value`, producing the nested list handed to RLP.
 */
export function packValue(
  kind: Kind,
  value: ProfileValue,
  path: string,
): Safe<RLPInput, KindError> {
  switch (kind.type) {
    case 'scalar':
      return kind.encode(value, path)
    case 'array': {
      if (!isProfileList(value)) {
        return safeError(new FieldValidationError('expected array', { path }))
      }
      const items: RLPInput[] = []
      for (let i = 0; i < value.length; i++) {
        const res = packValue(kind.item, value[i], `${path}[${i}]`)
        if (isSafeError(res)) return res
        items.push(res[1])
      }
      return safeResult(items)
    }
    case 'struct': {
      if (!isProfileRecord(value)) {
        return safeError(new FieldValidationError('expected object', { path }))
      }
      const fields: RLPInput[] = []
      for (const field of kind.fields) {
        const res = packValue(field.kind, value[field.name], `${path}.${field.name}`)
        if (isSafeError(res)) return res
        fields.push(res[1])
      }
      return safeResult(fields)
    }
  }
}

/**
 * Zips a decoded RLP node tree positionally against `kind`.
 */
export function unpackValue(
  kind: Kind,
  node: RLPNode,
  path: string,
): Safe<DecodedValue, KindError> {
  switch (kind.type) {
    case 'scalar':
      if (!(node instanceof Uint8Array)) {
        return structureError(path, 'expected byte string, got list')
      }
      return kind.decode(node, path)
    case 'array': {
      if (node instanceof Uint8Array) {
        return structureError(path, 'expected list, got byte string')
      }
      const items: DecodedValue[] = []
      for (let i = 0; i < node.length; i++) {
        const res = unpackValue(kind.item, node[i], `${path}[${i}]`)
        if (isSafeError(res)) return res
        items.push(res[1])
      }
      return safeResult(items)
    }
    case 'struct': {
      if (node instanceof Uint8Array) {
        return structureError(path, 'expected list, got byte string')
      }
      if (node.length !== kind.fields.length) {
        return structureError(
          path,
          `expected ${kind.fields.length} fields, got ${node.length}`,
        )
      }
      const record: DecodedRecord = {}
      for (let i = 0; i < kind.fields.length; i++) {
        const field = kind.fields[i]
        const res = unpackValue(field.kind, node[i], `${path}.${field.name}`)
        if (isSafeError(res)) return res
        record[field.name] = res[1]
      }
      return safeResult(record)
    }
  }
}

export function encodeObject(
  value: ProfileValue,
  profile: Profile,
): Safe<Uint8Array, KindError> {
  const res = packValue(profile.kind, value, profile.name)
  if (isSafeError(res)) return res
  return safeResult(encode(res[1]))
}

/**
 * Parses raw RLP bytes and decodes them against `profile`.
 */
export function decodeObject(
  bytes: Uint8Array,
  profile: Profile,
): Safe<DecodedValue, KindError> {
  const node = parseRLP(bytes, profile.name)
  if (isSafeError(node)) return node
  return unpackValue(profile.kind, node[1], profile.name)
}

export function parseRLP(
  bytes: Uint8Array,
  path: string,
): Safe<RLPNode, DecodeError> {
  try {
    return safeResult(decode(bytes))
  } catch (err) {
    if (err instanceof DecodeError) return safeError(err)
    return safeError(
      new DecodeError('invalid RLP', {
        code: ErrorCode.INVALID_RLP,
        path,
        cause: err,
      }),
    )
  }
}
