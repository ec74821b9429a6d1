import * as RDF from '@rdfjs/types';
import { Algebra } from 'sparqlalgebrajs';
import {
  QueryForm,
  QueryInitializer,
  QueryOptions,
  QueryState,
  TripleLike,
  VariableLike,
} from '../types/interfaces';
import { Pattern } from '../pattern/Pattern';
import { variable } from '../pattern/terms';
import { Configuration } from '../shared/config/Configuration';
import { ValidationError } from '../shared/errors/QueryBuilderError';
import { Logger } from '../shared/monitoring/Logger';
import { SliceValidator, VariableNameValidator } from '../shared/validation/InputValidator';
import { renderQuery } from './QuerySerializer';
import { QueryAlgebraConverter } from './QueryAlgebra';

/**
 * Values accepted by OFFSET and LIMIT before integer conversion
 */
export type SliceValue = number | string | bigint;

// A single keyword, so the form cannot carry other query text
const FORM_KEYWORD = /^[a-z]+$/;

const inspectCustom: unique symbol = Symbol.for('nodejs.util.inspect.custom');

let nextQueryId = 1;

function normalizeForm(form: string): QueryForm {
  const normalized = form.toLowerCase();
  if (!FORM_KEYWORD.test(normalized)) {
    throw new ValidationError(`Invalid query form: ${form}`, { form });
  }
  return normalized;
}

/**
 * A SPARQL ASK or SELECT query under construction.
 *
 * Every mutator changes this instance in place and returns it, so calls chain:
 *
 * ```ts
 * Query.select('name')
 *   .where(['?person', namedNode('http://xmlns.com/foaf/0.1/name'), '?name'])
 *   .order('name')
 *   .limit(10)
 *   .render();
 * // SELECT ?name WHERE { ?person <http://xmlns.com/foaf/0.1/name> ?name . } ORDER BY ?name LIMIT 10
 * ```
 */
export class Query implements QueryState {
  public readonly id: number;
  private currentForm: QueryForm;
  private readonly queryOptions: QueryOptions;
  private variableMap: Map<string, RDF.Variable> = new Map();
  private readonly patternList: Pattern[] = [];
  private readonly configuration: Configuration;
  private readonly logger: Logger;

  /**
   * @param form A form keyword in any letter case. Only `ask` and `select` get
   *   form-specific handling; other keywords are printed as given.
   * @param options Initial modifiers, applied through the mutators
   * @param init Called with the new query before the constructor returns
   * @throws {ValidationError} When the form is not a single keyword, or an option fails its mutator's checks
   */
  constructor(
    form: string = 'ask',
    options: QueryOptions = {},
    init?: QueryInitializer<Query>,
    configuration: Configuration = new Configuration(),
  ) {
    this.id = nextQueryId++;
    this.configuration = configuration;
    this.logger = Logger.getInstance();
    this.currentForm = normalizeForm(form);

    this.queryOptions = {};
    const { distinct, reduced, orderBy, offset, limit } = options;
    if (distinct !== undefined) this.distinct(distinct);
    if (reduced !== undefined) this.reduced(reduced);
    if (orderBy) this.order(...orderBy);
    this.slice(offset, limit);

    if (init) {
      init(this);
    }
  }

  public static ask(options?: QueryOptions, configuration?: Configuration): Query {
    return new Query('ask', options, undefined, configuration);
  }

  public static select(...variables: VariableLike[]): Query {
    return new Query('select').select(...variables);
  }

  /**
   * Like {@link Query.select}, with initial modifiers.
   */
  public static selectWith(options: QueryOptions, ...variables: VariableLike[]): Query {
    return new Query('select', options).select(...variables);
  }

  public get form(): QueryForm {
    return this.currentForm;
  }

  public get options(): Readonly<QueryOptions> {
    return this.queryOptions;
  }

  public get variables(): ReadonlyMap<string, RDF.Variable> {
    return this.variableMap;
  }

  public get patterns(): readonly Pattern[] {
    return this.patternList;
  }

  public ask(): this {
    this.currentForm = 'ask';
    return this;
  }

  /**
   * Switch to SELECT and replace the projection with the given variables.
   * No variables means `SELECT *`.
   */
  public select(...variables: VariableLike[]): this {
    const dataFactory = this.configuration.get('dataFactory');
    const variableMap = new Map<string, RDF.Variable>();
    for (const name of variables) {
      const term = variable(name, dataFactory);
      variableMap.set(term.value, term);
    }
    this.currentForm = 'select';
    this.variableMap = variableMap;
    return this;
  }

  /**
   * Append patterns to the WHERE block. Tuples are turned into patterns first;
   * if any of them is malformed nothing is appended.
   *
   * @throws {ArgumentShapeError} When a tuple is not a `[subject, predicate, object]` triple
   */
  public where(...patterns: (Pattern | TripleLike)[]): this {
    const dataFactory = this.configuration.get('dataFactory');
    const coerced = patterns.map((pattern) =>
      pattern instanceof Pattern ? pattern : Pattern.from(pattern, dataFactory));
    this.patternList.push(...coerced);
    return this;
  }

  public order(...variables: VariableLike[]): this {
    this.queryOptions.orderBy = variables.map((name) =>
      typeof name === 'string' ? VariableNameValidator.normalize(name) : name.value);
    return this;
  }

  public orderBy(...variables: VariableLike[]): this {
    return this.order(...variables);
  }

  public distinct(state = true): this {
    if (state && this.queryOptions.reduced) {
      this.checkProjectionModifiers('DISTINCT', 'REDUCED');
    }
    this.queryOptions.distinct = state;
    return this;
  }

  public reduced(state = true): this {
    if (state && this.queryOptions.distinct) {
      this.checkProjectionModifiers('REDUCED', 'DISTINCT');
    }
    this.queryOptions.reduced = state;
    return this;
  }

  public offset(start: SliceValue): this {
    return this.slice(start, undefined);
  }

  public limit(length: SliceValue): this {
    return this.slice(undefined, length);
  }

  /**
   * Set OFFSET and/or LIMIT. An absent argument leaves its modifier as it was.
   *
   * @throws {ValidationError} In strict mode, when a value is not a non-negative integer
   */
  public slice(start?: SliceValue | null, length?: SliceValue | null): this {
    const offset = start === undefined || start === null ? undefined : this.toInteger(start, 'OFFSET');
    const limit = length === undefined || length === null ? undefined : this.toInteger(length, 'LIMIT');
    if (offset !== undefined) this.queryOptions.offset = offset;
    if (limit !== undefined) this.queryOptions.limit = limit;
    return this;
  }

  public render(): string {
    const sparql = renderQuery(this);
    this.logger.incrementMetric('queries_rendered_total');
    if (this.configuration.get('debug')) {
      this.logger.debug('Rendered SPARQL query', { queryId: this.id, sparql });
    }
    return sparql;
  }

  public toString(): string {
    return this.render();
  }

  /**
   * Convert to SPARQL algebra.
   */
  public toAlgebra(): Algebra.Operation {
    return new QueryAlgebraConverter(this.configuration.get('dataFactory')).convert(this);
  }

  public inspect(): string {
    return `#<Query:0x${this.id.toString(16)}(${this.render()})>`;
  }

  /**
   * Write {@link Query.inspect} to the diagnostic log.
   */
  public inspectToLog(): void {
    this.logger.warn(this.inspect());
  }

  public [inspectCustom](): string {
    return this.inspect();
  }

  private toInteger(value: SliceValue, modifier: string): number {
    return this.configuration.get('strictSlice')
      ? SliceValidator.toStrictInteger(value, modifier)
      : SliceValidator.toInteger(value);
  }

  private checkProjectionModifiers(enabling: string, existing: string): void {
    if (this.configuration.get('exclusiveProjectionModifiers')) {
      throw new ValidationError(`${enabling} cannot be combined with ${existing}`, {
        queryId: this.id,
        enabling,
        existing,
      });
    }
    this.logger.warn(`${enabling} and ${existing} are both set`, { queryId: this.id });
  }
}
