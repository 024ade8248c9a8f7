/**
 * @module synthwire/domain/classification
 * @description Implementation status of declared attributes
 */

export {
  ImplementationStatus,
  ImplementationClassifier,
  implementationClassifier,
  needsImplementation,
  classify,
} from './ImplementationClassifier';
