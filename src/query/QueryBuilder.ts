import { QueryBuilderConfig, Configuration } from '../shared/config/Configuration';
import { Logger } from '../shared/monitoring/Logger';
import { QueryInitializer, QueryOptions, VariableLike } from '../types/interfaces';
import { Query } from './Query';

/**
 * Creates queries that share one configuration.
 */
export class QueryBuilder {
  private readonly configuration: Configuration;

  /**
   * `logLevel` and `enableMetrics`, when set, are applied to the shared
   * {@link Logger}. That logger is process-wide, so the last builder to set
   * them wins for every builder and query.
   */
  constructor(config: Partial<QueryBuilderConfig> | Configuration = {}) {
    this.configuration = config instanceof Configuration ? config : new Configuration(config);
    const logLevel = this.configuration.get('logLevel');
    if (logLevel) {
      Logger.getInstance({ minLevel: logLevel });
    }
    const enableMetrics = this.configuration.get('enableMetrics');
    if (enableMetrics !== undefined) {
      Logger.getInstance({ enableMetrics });
    }
  }

  public getConfiguration(): Configuration {
    return this.configuration;
  }

  public create(form: string, options?: QueryOptions, init?: QueryInitializer<Query>): Query {
    return new Query(form, options, init, this.configuration);
  }

  public ask(options?: QueryOptions): Query {
    return this.create('ask', options);
  }

  public select(...variables: VariableLike[]): Query {
    return this.create('select').select(...variables);
  }

  public selectWith(options: QueryOptions, ...variables: VariableLike[]): Query {
    return this.create('select', options).select(...variables);
  }
}

let defaultBuilder: QueryBuilder | undefined;

function getDefaultBuilder(): QueryBuilder {
  if (!defaultBuilder) {
    defaultBuilder = new QueryBuilder();
  }
  return defaultBuilder;
}

/**
 * Start an ASK query with the default configuration.
 */
export function ask(options?: QueryOptions): Query {
  return getDefaultBuilder().ask(options);
}

/**
 * Start a SELECT query with the default configuration. No variables means `SELECT *`.
 */
export function select(...variables: VariableLike[]): Query {
  return getDefaultBuilder().select(...variables);
}

export function selectWith(options: QueryOptions, ...variables: VariableLike[]): Query {
  return getDefaultBuilder().selectWith(options, ...variables);
}
