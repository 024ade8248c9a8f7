/**
 * @fileoverview Unit tests for the Forwarding Synthesizer
 *
 * Tests attribute selection by prefix, stacking of passes, idempotence and
 * the reluctant failure policy.
 */

import 'reflect-metadata';

import {
  Declare,
  DeclarationError,
  Forward,
  ForwardingError,
  applyForwarding,
} from '../../../src';
import { handlesAttribute } from '../../../src/infrastructure/synthesis';
import type { ILogger } from '../../../src';

// ============================================================================
// Test Fixtures
// ============================================================================

class ModuleSettings {
  @Declare() timeout!: number;
}

class AppModule {
  @Declare() settings!: ModuleSettings;
  @Declare() timeout!: number;
  @Declare() namespace!: string;
}

@Forward('_module')
@Forward('_settings')
class Controller {
  @Declare() _module!: AppModule;
  @Declare() _settings!: ModuleSettings;
  @Declare() _timeout!: number;
  @Declare() _namespace!: string;
  @Declare() _missing!: number;
}

class RuntimeConfig {
  region = 'eu';
}

class RuntimeModule {
  name = 'billing';
}

@Forward('_module')
@Forward('_config')
class Gateway {
  @Declare() _config!: RuntimeConfig;
  @Declare() _module!: RuntimeModule;
  @Declare() _region!: string;
}

function createModule(): AppModule {
  const settings = new ModuleSettings();
  settings.timeout = 30;

  const module = new AppModule();
  module.settings = settings;
  module.timeout = 99;
  module.namespace = 'billing';
  return module;
}

function createLogger(): jest.Mocked<ILogger> {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

// ============================================================================
// Tests
// ============================================================================

describe('ForwardingSynthesizer', () => {
  describe('handlesAttribute', () => {
    it('should select names by prefix', () => {
      expect(handlesAttribute('_timeout', '_')).toBe(true);
      expect(handlesAttribute('timeout', '_')).toBe(false);
      expect(handlesAttribute('cfg_timeout', 'cfg_')).toBe(true);
    });

    it('should select public names for the empty prefix', () => {
      expect(handlesAttribute('timeout', '')).toBe(true);
      expect(handlesAttribute('_timeout', '')).toBe(false);
    });
  });

  describe('Forwarded Properties', () => {
    it('should read through the base reference', () => {
      const controller = new Controller();
      controller._module = createModule();

      expect(controller._namespace).toBe('billing');
    });

    it('should install read-only accessors on the prototype', () => {
      const descriptor = Object.getOwnPropertyDescriptor(Controller.prototype, '_namespace');

      expect(descriptor?.get).toBeInstanceOf(Function);
      expect(descriptor?.set).toBeUndefined();
    });

    it('should reject assignment to forwarded properties', () => {
      const controller = new Controller();

      expect(() => {
        controller._namespace = 'other';
      }).toThrow(TypeError);
    });

    it('should throw ForwardingError while the base reference is unset', () => {
      const controller = new Controller();

      expect(() => controller._namespace).toThrowErrorType(ForwardingError);
      expect(() => controller._namespace).toThrow(
        "Cannot read Controller._namespace: base reference '_module' is not set",
      );
    });
  });

  describe('Stacking', () => {
    it('should keep attributes satisfied by an earlier pass', () => {
      const controller = new Controller();
      controller._module = createModule();

      // AppModule.timeout is 99; the first pass bound _timeout to _settings
      expect(controller._timeout).toBe(30);
    });

    it('should let later passes satisfy earlier base references', () => {
      const controller = new Controller();
      const module = createModule();
      controller._module = module;

      expect(controller._settings).toBe(module.settings);
    });

    it('should accept base references deferred by an earlier pass', () => {
      const gateway = new Gateway();
      const module = new RuntimeModule();

      gateway._config = new RuntimeConfig();
      gateway._module = module;

      expect(gateway._module).toBe(module);
      expect(gateway._region).toBe('eu');
    });

    it('should skip attributes no pass can prove', () => {
      expect(Object.prototype.hasOwnProperty.call(Controller.prototype, '_missing')).toBe(false);
      expect(Object.prototype.hasOwnProperty.call(Controller.prototype, '_module')).toBe(false);
    });
  });

  describe('Idempotence', () => {
    it('should not change anything when applied again', () => {
      class Panel {
        @Declare() _settings!: ModuleSettings;
        @Declare() _timeout!: number;
      }
      applyForwarding(Panel, '_settings');
      const before = Object.getOwnPropertyDescriptor(Panel.prototype, '_timeout');
      const namesBefore = Object.getOwnPropertyNames(Panel.prototype);

      applyForwarding(Panel, '_settings');

      expect(Object.getOwnPropertyNames(Panel.prototype)).toEqual(namesBefore);
      expect(Object.getOwnPropertyDescriptor(Panel.prototype, '_timeout')?.get).toBe(before?.get);
    });

    it('should return the decorated class', () => {
      class Widget {
        @Declare() _settings!: ModuleSettings;
      }

      expect(applyForwarding(Widget, '_settings')).toBe(Widget);
    });
  });

  describe('Options', () => {
    it('should strip a custom prefix', () => {
      class Job {
        @Declare() settings!: ModuleSettings;
        @Declare() cfg_timeout!: number;
      }
      applyForwarding(Job, 'settings', { prefix: 'cfg_' });

      const job = new Job();
      job.settings = createModule().settings;

      expect(job.cfg_timeout).toBe(30);
    });

    it('should forward public names with the empty prefix', () => {
      class Worker {
        @Declare() module!: AppModule;
        @Declare() namespace!: string;
        @Declare() _timeout!: number;
      }
      applyForwarding(Worker, 'module', { prefix: '' });

      const worker = new Worker();
      worker.module = createModule();

      expect(worker.namespace).toBe('billing');
      expect(Object.prototype.hasOwnProperty.call(Worker.prototype, '_timeout')).toBe(false);
    });

    it('should install nothing for dynamic bases when deferral is disallowed', () => {
      class Env {
        region = 'eu';
      }
      class Deployer {
        @Declare() _env!: Env;
        @Declare() _region!: string;
      }
      applyForwarding(Deployer, '_env', { allowDeferred: false });

      expect(Object.prototype.hasOwnProperty.call(Deployer.prototype, '_region')).toBe(false);
    });

    it('should report decisions to the logger', () => {
      const logger = createLogger();
      class Scheduler {
        @Declare() _settings!: ModuleSettings;
        @Declare() _timeout!: number;
        @Declare() _interval!: number;
      }
      applyForwarding(Scheduler, '_settings', { logger });

      expect(logger.debug).toHaveBeenCalledWith('Scheduler._timeout forwarded from _settings.timeout');
      expect(logger.debug).toHaveBeenCalledWith(
        "Scheduler._interval not forwarded from _settings: ModuleSettings does not expose 'interval'",
      );
      expect(logger.error).not.toHaveBeenCalled();
    });
  });

  describe('Side Effects', () => {
    it('should not invoke getters of the base while decorating', () => {
      let reads = 0;
      class Source {
        get level(): number {
          reads += 1;
          return 3;
        }
      }
      class Consumer {
        @Declare() _source!: Source;
        @Declare() _level!: number;
      }

      applyForwarding(Consumer, '_source');
      expect(reads).toBe(0);

      const consumer = new Consumer();
      consumer._source = new Source();
      expect(consumer._level).toBe(3);
      expect(reads).toBe(1);
    });

    it('should not run Symbol.hasInstance hooks while decorating', () => {
      let checks = 0;
      class Required {
        static [Symbol.hasInstance](): boolean {
          checks += 1;
          return false;
        }
      }
      class SpecialRequired extends Required {}
      class Provider {
        @Declare() required!: SpecialRequired;
      }
      class Consumer {
        @Declare() _base!: Provider;
        @Declare() _required!: Required;
      }

      applyForwarding(Consumer, '_base');

      expect(checks).toBe(0);
      expect(Object.prototype.hasOwnProperty.call(Consumer.prototype, '_required')).toBe(true);
    });
  });

  describe('Decorator', () => {
    it('should reject functions that are not classes', () => {
      expect(() => Forward('_settings')(() => undefined)).toThrowErrorType(DeclarationError);
    });
  });
});
