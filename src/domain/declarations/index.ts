/**
 * @module synthwire/domain/declarations
 * @description Declaration store, abstract markers and annotation providers
 */

export { Declare, readOwnDeclarations } from './Declare';
export type { TypeSource, TypeThunk, RawDeclaration } from './Declare';

export { Abstract, isAbstractClass, isAbstractDescriptor } from './Abstract';

export { TypeRegistry, typeRegistry, registerType } from './TypeRegistry';

export { ResolvedAnnotationProvider, RawAnnotationProvider } from './AnnotationProvider';
export type { AnnotationProvider } from './AnnotationProvider';
