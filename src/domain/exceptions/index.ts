/**
 * synthwire - Exception Module
 */

export {
  SynthesisException,
  ConfigurationError,
  DeferredResolutionError,
  ForwardingError,
  FactoryConstructionError,
  DeclarationError,
} from './exceptions';
