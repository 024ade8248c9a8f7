/**
 * synthwire - Basic Example
 *
 * Demonstrates the core concepts:
 * - @Forward() read-through properties, static and deferred
 * - @Composition() factory properties with caching
 * - Transitive wiring of dependencies to the composition root
 * - Configuration errors at decoration time
 */

import 'reflect-metadata';

import {
  Abstract,
  CachingStrategy,
  Composition,
  ConfigurationError,
  Declare,
  Forward,
  applyComposition,
  configureSynthesis,
  createConsoleLogger,
} from '../src/index';

configureSynthesis({ logger: createConsoleLogger('debug') });

// ==================== Configuration ====================

class DatabaseConfig {
  host = 'localhost';
  port = 5432;
  timeout = 30;
}

class CacheConfig {
  @Declare() ttlSeconds = 60;
  @Declare() namespace = 'users';
}

// ==================== Services ====================

@Forward('_config')
class DatabaseService {
  @Declare() _config!: DatabaseConfig;
  @Declare() _host!: string;
  @Declare() _port!: number;
  @Declare() _timeout!: number;

  connect(): string {
    return `Connected to ${this._host}:${this._port} (timeout: ${this._timeout}s)`;
  }
}

@Forward('_cache')
class UserRepository {
  @Declare() _cache!: CacheConfig;
  @Declare() _ttlSeconds!: number;
  @Declare() _namespace!: string;
  @Declare() database!: DatabaseService;

  describe(): string {
    return `${this._namespace} cached for ${this._ttlSeconds}s via ${this.database.connect()}`;
  }
}

// ==================== Composition Root ====================

@Composition(CachingStrategy.NotThreadSafe)
class AppModule {
  @Declare() config!: DatabaseConfig;
  @Declare() cache!: CacheConfig;
  @Declare() database!: DatabaseService;
  @Declare() users!: UserRepository;
}

@Abstract()
class MessageQueue {}

class BrokenModule {
  @Declare() queue!: MessageQueue;
}

// ==================== Main Application ====================

function main(): void {
  console.log('═══════════════════════════════════════════════════════════');
  console.log('  synthwire - Object Graph Demo');
  console.log('═══════════════════════════════════════════════════════════\n');

  const app = new AppModule();

  console.log('--- Forwarded configuration ---');
  console.log(app.database.connect());
  console.log();

  console.log('--- Transitive wiring ---');
  console.log(app.users.describe());
  console.log('Shared database:', app.users.database === app.database);
  console.log();

  console.log('--- Greedy failure ---');
  try {
    applyComposition(BrokenModule);
  } catch (error) {
    if (!(error instanceof ConfigurationError)) {
      throw error;
    }
    console.log(error.message);
  }

  console.log('\n═══════════════════════════════════════════════════════════');
  console.log('  Demo Complete!');
  console.log('═══════════════════════════════════════════════════════════\n');
}

main();
