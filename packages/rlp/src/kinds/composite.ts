import type { ArrayKind, Kind, Profile, StructKind } from './types'

export function arrayKind(item: Kind): ArrayKind {
  return { type: 'array', item }
}

export function structKind(fields: readonly Profile[]): StructKind {
  return { type: 'struct', fields }
}

export function profile(name: string, kind: Kind): Profile {
  return { name, kind }
}
