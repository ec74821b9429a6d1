import * as RDF from '@rdfjs/types';
import { DataFactory } from 'rdf-data-factory';
import { ExtendedDataFactory, TermLike, VariableLike } from '../types/interfaces';
import { ArgumentShapeError } from '../shared/errors/QueryBuilderError';
import { IriValidator, VariableNameValidator } from '../shared/validation/InputValidator';

const XSD = 'http://www.w3.org/2001/XMLSchema#';
const XSD_STRING = `${XSD}string`;
const RDF_LANG_STRING = 'http://www.w3.org/1999/02/22-rdf-syntax-ns#langString';

const defaultFactory: ExtendedDataFactory = new DataFactory();

const LITERAL_ESCAPES: Record<string, string> = {
  '\\': '\\\\',
  '"': '\\"',
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
  '\b': '\\b',
  '\f': '\\f',
};

/**
 * Create a named node after checking the IRI can be written as an IRIREF.
 */
export function namedNode(iri: string, dataFactory: ExtendedDataFactory = defaultFactory): RDF.NamedNode {
  IriValidator.validateIri(iri);
  return dataFactory.namedNode(iri);
}

/**
 * Create a variable from `name`, `?name` or `$name`.
 */
export function variable(name: VariableLike, dataFactory: ExtendedDataFactory = defaultFactory): RDF.Variable {
  if (typeof name !== 'string') {
    VariableNameValidator.validateName(name.value);
    return name;
  }
  return dataFactory.variable(VariableNameValidator.normalize(name));
}

/**
 * Create a literal with an optional language tag or datatype IRI.
 */
export function literal(
  value: string,
  languageOrDatatype?: string | RDF.NamedNode,
  dataFactory: ExtendedDataFactory = defaultFactory,
): RDF.Literal {
  if (typeof languageOrDatatype === 'string' && !languageOrDatatype.includes(':')) {
    return dataFactory.literal(value, languageOrDatatype);
  }
  const datatype = typeof languageOrDatatype === 'string'
    ? namedNode(languageOrDatatype, dataFactory)
    : languageOrDatatype;
  return dataFactory.literal(value, datatype);
}

function numericLiteral(value: number, dataFactory: ExtendedDataFactory): RDF.Literal {
  if (!Number.isFinite(value)) {
    throw new ArgumentShapeError('Cannot use a non-finite number as a pattern component', { value });
  }
  const lexical = String(value);
  if (/e/i.test(lexical)) {
    return dataFactory.literal(lexical, dataFactory.namedNode(`${XSD}double`));
  }
  const datatype = Number.isInteger(value) ? 'integer' : 'decimal';
  return dataFactory.literal(lexical, dataFactory.namedNode(`${XSD}${datatype}`));
}

/**
 * Coerce a pattern component shorthand into an RDF/JS term.
 */
export function toTerm(value: TermLike, dataFactory: ExtendedDataFactory = defaultFactory): RDF.Term {
  switch (typeof value) {
    case 'string':
      if (value.startsWith('?') || value.startsWith('$')) {
        return variable(value, dataFactory);
      }
      return dataFactory.literal(value);
    case 'number':
      return numericLiteral(value, dataFactory);
    case 'boolean':
      return dataFactory.literal(String(value), dataFactory.namedNode(`${XSD}boolean`));
    default:
      return value;
  }
}

function renderLiteral(term: RDF.Literal): string {
  const lexical = `"${term.value.replace(/[\\"\n\r\t\b\f]/g, (char) => LITERAL_ESCAPES[char])}"`;
  if (term.language) {
    return `${lexical}@${term.language}`;
  }
  const datatype = term.datatype.value;
  if (datatype === XSD_STRING || datatype === RDF_LANG_STRING) {
    return lexical;
  }
  return `${lexical}^^<${datatype}>`;
}

/**
 * Render a term in SPARQL surface syntax.
 *
 * @throws {ArgumentShapeError} for terms that cannot appear in a triple pattern
 */
export function renderTerm(term: RDF.Term): string {
  switch (term.termType) {
    case 'Variable':
      return `?${term.value}`;
    case 'NamedNode':
      return `<${term.value}>`;
    case 'BlankNode':
      return `_:${term.value}`;
    case 'Literal':
      return renderLiteral(term);
    default:
      throw new ArgumentShapeError(`A ${term.termType} cannot be used in a triple pattern`, {
        termType: term.termType,
      });
  }
}
