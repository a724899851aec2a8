import { DecodeError } from '@thorkit/utils'
import type { DecodedRecord, DecodedValue } from './kinds/types'

export function isDecodedRecord(value: DecodedValue): value is DecodedRecord {
  return (
    typeof value === 'object' &&
    !(value instanceof Uint8Array) &&
    !Array.isArray(value)
  )
}

function mismatch(name: string, expected: string): DecodeError {
  return new DecodeError(`expected ${expected} at field ${name}`)
}

export function asRecord(value: DecodedValue, name: string): DecodedRecord {
  if (!isDecodedRecord(value)) throw mismatch(name, 'record')
  return value
}

export function getBigInt(record: DecodedRecord, name: string): bigint {
  const value = record[name]
  if (typeof value !== 'bigint') throw mismatch(name, 'integer')
  return value
}

export function getNumber(record: DecodedRecord, name: string): number {
  return Number(getBigInt(record, name))
}

export function getBytes(record: DecodedRecord, name: string): Uint8Array {
  const value = record[name]
  if (!(value instanceof Uint8Array)) throw mismatch(name, 'bytes')
  return value
}

export function getList(record: DecodedRecord, name: string): DecodedValue[] {
  const value = record[name]
  if (!Array.isArray(value)) throw mismatch(name, 'list')
  return value
}
