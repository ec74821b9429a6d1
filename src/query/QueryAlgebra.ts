import * as RDF from '@rdfjs/types';
import { Algebra, Factory as SparqlAlgebraFactory } from 'sparqlalgebrajs';
import { ExtendedDataFactory, QueryState } from '../types/interfaces';
import { ValidationError } from '../shared/errors/QueryBuilderError';

/**
 * Converts built queries into SPARQL algebra, for engines that consume
 * `sparqlalgebrajs` operations rather than query text.
 */
export class QueryAlgebraConverter {
  private readonly dataFactory: ExtendedDataFactory;
  private readonly algebraFactory: SparqlAlgebraFactory;

  constructor(dataFactory: ExtendedDataFactory) {
    this.dataFactory = dataFactory;
    this.algebraFactory = new SparqlAlgebraFactory(dataFactory);
  }

  /**
   * @throws {ValidationError} For forms other than ASK and SELECT
   */
  public convert(query: QueryState): Algebra.Operation {
    const bgp = this.algebraFactory.createBgp(
      query.patterns.map((pattern) =>
        this.algebraFactory.createPattern(pattern.subject, pattern.predicate, pattern.object)),
    );

    let operation: Algebra.Operation = bgp;
    const orderBy = query.options.orderBy || [];
    if (orderBy.length > 0) {
      operation = this.algebraFactory.createOrderBy(
        operation,
        orderBy.map((name) => this.algebraFactory.createTermExpression(this.dataFactory.variable(name))),
      );
    }

    if (query.form === 'ask') {
      return this.algebraFactory.createAsk(this.wrapSlice(operation, query));
    }
    if (query.form !== 'select') {
      throw new ValidationError(`No algebra for query form: ${query.form}`, { form: query.form });
    }

    operation = this.algebraFactory.createProject(operation, this.projectedVariables(query));

    if (query.options.distinct) {
      operation = this.algebraFactory.createDistinct(operation);
    }
    if (query.options.reduced) {
      operation = this.algebraFactory.createReduced(operation);
    }

    return this.wrapSlice(operation, query);
  }

  /**
   * Explicit projection, or for `SELECT *` every pattern variable in order of first appearance.
   */
  private projectedVariables(query: QueryState): RDF.Variable[] {
    if (query.variables.size > 0) {
      return [...query.variables.values()];
    }
    const names: string[] = [];
    for (const pattern of query.patterns) {
      for (const name of pattern.variables()) {
        if (!names.includes(name)) {
          names.push(name);
        }
      }
    }
    return names.map((name) => this.dataFactory.variable(name));
  }

  private wrapSlice(operation: Algebra.Operation, query: QueryState): Algebra.Operation {
    const { offset, limit } = query.options;
    if (offset === undefined && limit === undefined) {
      return operation;
    }
    return this.algebraFactory.createSlice(operation, offset || 0, limit);
  }
}
