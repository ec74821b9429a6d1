import * as RDF from '@rdfjs/types';
import { DataFactory } from 'rdf-data-factory';
import { ExtendedDataFactory, TermLike, TripleLike } from '../types/interfaces';
import { ArgumentShapeError } from '../shared/errors/QueryBuilderError';
import { renderTerm, toTerm } from './terms';

function assertPatternComponent(term: RDF.Term, position: string): RDF.Term {
  if (term.termType === 'DefaultGraph' || term.termType === 'Quad') {
    throw new ArgumentShapeError(`A ${term.termType} cannot be the ${position} of a triple pattern`, {
      position,
      termType: term.termType,
    });
  }
  return term;
}

// SPARQL only allows a variable or an IRI in predicate position
function assertPredicate(term: RDF.Term): RDF.Term {
  if (term.termType !== 'Variable' && term.termType !== 'NamedNode') {
    throw new ArgumentShapeError(`A ${term.termType} cannot be the predicate of a triple pattern`, {
      position: 'predicate',
      termType: term.termType,
    });
  }
  return term;
}

/**
 * A triple pattern: subject, predicate and object, any of which may be a variable.
 */
export class Pattern {
  public readonly subject: RDF.Term;
  public readonly predicate: RDF.Term;
  public readonly object: RDF.Term;

  constructor(
    subject: TermLike,
    predicate: TermLike,
    object: TermLike,
    dataFactory: ExtendedDataFactory = new DataFactory(),
  ) {
    this.subject = assertPatternComponent(toTerm(subject, dataFactory), 'subject');
    this.predicate = assertPredicate(toTerm(predicate, dataFactory));
    this.object = assertPatternComponent(toTerm(object, dataFactory), 'object');
  }

  /**
   * Build a pattern from a `[subject, predicate, object]` tuple.
   *
   * @throws {ArgumentShapeError} When the tuple does not have exactly three components
   */
  public static from(triple: TripleLike, dataFactory?: ExtendedDataFactory): Pattern {
    if (triple.length !== 3) {
      throw new ArgumentShapeError(
        `A triple pattern needs exactly 3 components, got ${triple.length}`,
        { arity: triple.length },
      );
    }
    const [subject, predicate, object] = triple;
    return new Pattern(subject, predicate, object, dataFactory);
  }

  public terms(): [RDF.Term, RDF.Term, RDF.Term] {
    return [this.subject, this.predicate, this.object];
  }

  /**
   * Names of the variables in this pattern, in order of first appearance.
   */
  public variables(): string[] {
    const names: string[] = [];
    for (const term of this.terms()) {
      if (term.termType === 'Variable' && !names.includes(term.value)) {
        names.push(term.value);
      }
    }
    return names;
  }

  public toString(): string {
    return `${this.terms().map(renderTerm).join(' ')} .`;
  }
}
