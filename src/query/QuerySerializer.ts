import * as RDF from '@rdfjs/types';
import { QueryState } from '../types/interfaces';
import { renderTerm } from '../pattern/terms';

function renderProjection(variables: ReadonlyMap<string, RDF.Variable>): string {
  if (variables.size === 0) {
    return '*';
  }
  return [...variables.values()].map(renderTerm).join(' ');
}

/**
 * Render a query as SPARQL text.
 *
 * Tokens are emitted in the order SPARQL requires: form, projection modifiers,
 * projection, WHERE block, ORDER BY, OFFSET, LIMIT. Projection and its
 * modifiers are only written for SELECT.
 */
export function renderQuery(query: QueryState): string {
  const { options } = query;
  const buffer: string[] = [query.form.toUpperCase()];

  if (query.form === 'select') {
    if (options.distinct) buffer.push('DISTINCT');
    if (options.reduced) buffer.push('REDUCED');
    buffer.push(renderProjection(query.variables));
  }

  buffer.push('WHERE {');
  buffer.push(...query.patterns.map((pattern) => pattern.toString()));
  buffer.push('}');

  if (options.orderBy && options.orderBy.length > 0) {
    buffer.push('ORDER BY', ...options.orderBy.map((name) => `?${name}`));
  }

  if (options.offset !== undefined) buffer.push(`OFFSET ${options.offset}`);
  if (options.limit !== undefined) buffer.push(`LIMIT ${options.limit}`);

  return buffer.join(' ');
}
