import { DataFactory } from 'rdf-data-factory';
import { ExtendedDataFactory } from '../../types/interfaces';
import { LogLevel } from '../monitoring/Logger';

/**
 * Configuration options for the query builder
 */
export interface QueryBuilderConfig {
  dataFactory: ExtendedDataFactory;
  /** Reject offset/limit values that are not non-negative integers instead of coercing them */
  strictSlice: boolean;
  /** Reject queries that set DISTINCT and REDUCED together */
  exclusiveProjectionModifiers: boolean;
  /** Log every rendered query at debug level */
  debug: boolean;
  /** Minimum level applied to the shared Logger by QueryBuilder; left alone when unset */
  logLevel?: LogLevel;
  /** Turns the shared Logger's counters on or off through QueryBuilder; left alone when unset */
  enableMetrics?: boolean;
}

const DEFAULT_CONFIG: QueryBuilderConfig = {
  dataFactory: new DataFactory(),
  strictSlice: false,
  exclusiveProjectionModifiers: false,
  debug: false,
};

/**
 * Configuration manager for the query builder
 */
export class Configuration {
  private config: QueryBuilderConfig;

  constructor(userConfig: Partial<QueryBuilderConfig> = {}) {
    this.config = {
      ...DEFAULT_CONFIG,
      ...userConfig,
    };
  }

  /**
   * Get the complete configuration
   */
  public getConfig(): QueryBuilderConfig {
    return { ...this.config };
  }

  /**
   * Get a specific configuration value
   */
  public get<K extends keyof QueryBuilderConfig>(key: K): QueryBuilderConfig[K] {
    return this.config[key];
  }

  /**
   * Update configuration values
   */
  public update(updates: Partial<QueryBuilderConfig>): void {
    this.config = {
      ...this.config,
      ...updates,
    };
  }
}
