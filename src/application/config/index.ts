/**
 * @module synthwire/application/config
 */

export {
  configureSynthesis,
  getSynthesisSettings,
  resetSynthesisSettings,
  LOG_LEVEL_ENV,
} from './SynthesisSettings';
export type { SynthesisSettings } from './SynthesisSettings';
