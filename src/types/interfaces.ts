import * as RDF from "@rdfjs/types";
import { Pattern } from "../pattern/Pattern";

/**
 * SPARQL query forms the builder knows how to shape
 */
export type KnownQueryForm = 'ask' | 'select';

/**
 * A lower-cased query form keyword. Forms other than `ask` and `select` are
 * carried through and printed, but get no form-specific handling.
 */
export type QueryForm = KnownQueryForm | (string & {});

/**
 * Result modifiers of a query
 */
export interface QueryOptions {
  distinct?: boolean;
  reduced?: boolean;
  /** Variable names, without the `?` sigil */
  orderBy?: string[];
  offset?: number;
  limit?: number;
}

/**
 * A variable given either by name (`name`, `?name` or `$name`) or as an RDF/JS term
 */
export type VariableLike = string | RDF.Variable;

/**
 * Shorthand accepted wherever a pattern component is expected.
 * Strings starting with `?` or `$` are variables; other strings are plain literals.
 */
export type TermLike = RDF.Term | string | number | boolean;

/**
 * A `[subject, predicate, object]` tuple before coercion into a Pattern.
 * Typed loosely so that arity can be checked at run time.
 */
export type TripleLike = readonly TermLike[];

/**
 * Callback run against a freshly constructed query
 */
export type QueryInitializer<Q> = (query: Q) => void;

/**
 * Extended DataFactory interface that includes variable creation
 */
export interface ExtendedDataFactory extends RDF.DataFactory {
  variable(value: string): RDF.Variable;
}

/**
 * Read-only view of a query, as consumed by the serializer and algebra conversion
 */
export interface QueryState {
  readonly form: QueryForm;
  readonly variables: ReadonlyMap<string, RDF.Variable>;
  readonly patterns: readonly Pattern[];
  readonly options: Readonly<QueryOptions>;
}
