import { isRegistered, tryFindDescriptor, hasImplementationOf } from './lookup';
import { tryResolveInstance } from './try-resolve';
import { removeFirst, removeAll, removeAllOf, removeWhere } from './remove';
import {
  addIfAbsent,
  addSingletonIfAbsent,
  addScopedIfAbsent,
  addTransientIfAbsent,
  addOrReplace,
  addWhen,
} from './add';
import { replaceAll } from './replace';

export { assertArgument, assertWritable } from './assert';
export { isRegistered, tryFindDescriptor, hasImplementationOf } from './lookup';
export { tryResolveInstance } from './try-resolve';
export { removeFirst, removeAll, removeAllOf, removeWhere } from './remove';
export {
  addIfAbsent,
  addSingletonIfAbsent,
  addScopedIfAbsent,
  addTransientIfAbsent,
  addOrReplace,
  addWhen,
} from './add';
export { replaceAll } from './replace';

export const utils = {
  isRegistered,
  tryFindDescriptor,
  hasImplementationOf,
  tryResolveInstance,
  removeFirst,
  removeAll,
  removeAllOf,
  removeWhere,
  addIfAbsent,
  addSingletonIfAbsent,
  addScopedIfAbsent,
  addTransientIfAbsent,
  addOrReplace,
  addWhen,
  replaceAll,
};
