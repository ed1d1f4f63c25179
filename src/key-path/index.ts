export { appendPath, appendedMode } from './append'
export { keyPaths, type KeyPathBuilder, type WritablePath } from './create'
export {
  eraseAll,
  eraseValue,
  isSamePath,
  narrowValue,
  readAs,
  resolves,
} from './erasure'
export { isReadonly, isReferenceWritable, isWritable } from './guards'
export type {
  AnyKeyPath,
  KeyPath,
  KeyPathErasure,
  KeyPathMode,
  PartialKeyPath,
  ReadonlyKeyPath,
  ReferenceWritableKeyPath,
  SomeKeyPath,
  WritableKeyPath,
} from './types'
