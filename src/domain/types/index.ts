/**
 * @module synthwire/domain/types
 * @description Declared type model
 */

export {
  NONE,
  classType,
  forwardRef,
  noneType,
  complexType,
  isClass,
  isDeclaredType,
  describeType,
} from './DeclaredType';

export type {
  AnyClass,
  NoneMarker,
  ClassType,
  ForwardType,
  NoneType,
  ComplexType,
  DeclaredType,
  MergedHierarchyView,
} from './DeclaredType';
