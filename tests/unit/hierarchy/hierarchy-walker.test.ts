/**
 * @fileoverview Unit tests for the Hierarchy Walker
 *
 * Tests overlay order across ancestors, type sources accepted by @Declare,
 * and the silent fallback from the resolved to the raw annotation provider.
 */

import 'reflect-metadata';

import {
  Declare,
  DeclarationError,
  HierarchyWalker,
  NONE,
  RawAnnotationProvider,
  ResolvedAnnotationProvider,
  TypeRegistry,
  classType,
  collect,
  complexType,
  forwardRef,
  linearize,
  noneType,
  registerType,
} from '../../../src';

// ============================================================================
// Test Fixtures
// ============================================================================

class Engine {}
class TurboEngine extends Engine {}
class Wheel {}

interface VehicleOptions {
  color: string;
}

class Vehicle {
  @Declare() engine!: Engine;
  @Declare() wheels!: number;
}

class Car extends Vehicle {
  @Declare() seats!: number;
  @Declare() engine!: TurboEngine;
}

class SportsCar extends Car {
  @Declare() spoiler!: boolean;
}

class Dashboard {
  @Declare('Speedometer') gauge!: object;
  @Declare() label!: string;
}

class Garage {
  @Declare(() => Wheel) spare!: object;
  @Declare(NONE) nothing!: undefined;
  @Declare(complexType('Map<string, number>')) counts!: Map<string, number>;
  @Declare() options!: VehicleOptions;
}

class Workshop {
  @Declare(() => {
    throw new Error('not defined yet');
  })
  tool!: object;
}

// ============================================================================
// Tests
// ============================================================================

describe('HierarchyWalker', () => {
  describe('linearize', () => {
    it('should list prototypes most-derived first without Object.prototype', () => {
      expect(linearize(SportsCar)).toEqual([SportsCar.prototype, Car.prototype, Vehicle.prototype]);
    });

    it('should return only the own prototype for a root class', () => {
      expect(linearize(Engine)).toEqual([Engine.prototype]);
    });
  });

  describe('Overlay Rule', () => {
    it('should merge declarations of all ancestors', () => {
      const view = collect(SportsCar);

      expect([...view.keys()]).toEqual(['engine', 'wheels', 'seats', 'spoiler']);
    });

    it('should let the most-derived re-declaration win', () => {
      expect(collect(Car).get('engine')).toEqual(classType(TurboEngine));
      expect(collect(Vehicle).get('engine')).toEqual(classType(Engine));
    });

    it('should read primitive design types as their wrapper classes', () => {
      const view = collect(SportsCar);

      expect(view.get('wheels')).toEqual(classType(Number));
      expect(view.get('spoiler')).toEqual(classType(Boolean));
    });

    it('should return an empty view for undecorated classes', () => {
      expect(collect(Wheel).size).toBe(0);
    });

    it('should memoize fully resolved views', () => {
      expect(collect(Car)).toBe(collect(Car));
    });
  });

  describe('Type Sources', () => {
    it('should evaluate thunks lazily', () => {
      expect(collect(Garage).get('spare')).toEqual(classType(Wheel));
    });

    it('should map NONE to the none type', () => {
      expect(collect(Garage).get('nothing')).toBe(noneType());
    });

    it('should keep explicit declared types as given', () => {
      expect(collect(Garage).get('counts')).toEqual(complexType('Map<string, number>'));
    });

    it('should describe interface types as complex', () => {
      expect(collect(Garage).get('options')).toEqual(complexType('Object'));
    });
  });

  describe('Provider Fallback', () => {
    it('should keep unknown names as forward references', () => {
      const view = collect(Dashboard);

      expect(view.get('gauge')).toEqual(forwardRef('Speedometer'));
      expect(view.get('label')).toEqual(classType(String));
    });

    it('should not memoize views read by the raw provider', () => {
      expect(collect(Dashboard)).not.toBe(collect(Dashboard));
    });

    it('should describe throwing thunks as complex types', () => {
      expect(collect(Workshop).get('tool')).toEqual(complexType('unresolved type thunk'));
    });

    it('should bind forward references once the name is registered', () => {
      class Speedometer {}
      registerType(Speedometer);

      const view = collect(Dashboard);

      expect(view.get('gauge')).toEqual(classType(Speedometer));
      expect(collect(Dashboard)).toBe(view);
    });

    it('should never bind ambiguous names', () => {
      const registry = new TypeRegistry();
      class First {}
      class Second {}
      registry.register(First, 'Clock');
      registry.register(Second, 'Clock');

      class Alarm {
        @Declare('Clock') clock!: object;
      }
      const walker = new HierarchyWalker([new ResolvedAnnotationProvider(registry), new RawAnnotationProvider()]);

      expect(registry.isAmbiguous('Clock')).toBe(true);
      expect(walker.collect(Alarm).get('clock')).toEqual(forwardRef('Clock'));
    });

    it('should resolve names through the walker registry only', () => {
      const registry = new TypeRegistry();
      class Odometer {}
      registry.register(Odometer, 'Odometer');

      class Cluster {
        @Declare('Odometer') odometer!: object;
      }
      const walker = new HierarchyWalker([new ResolvedAnnotationProvider(registry), new RawAnnotationProvider()]);

      expect(walker.collect(Cluster).get('odometer')).toEqual(classType(Odometer));
      expect(collect(Cluster).get('odometer')).toEqual(forwardRef('Odometer'));
    });
  });

  describe('Declaration Errors', () => {
    it('should reject static members', () => {
      expect(() => {
        class Registry {
          @Declare() static shared: number;
        }
        return Registry;
      }).toThrowErrorType(DeclarationError);
    });
  });
});
