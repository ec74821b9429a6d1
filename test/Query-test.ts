import { inspect } from 'util';
import { DataFactory } from 'rdf-data-factory';
import { Query } from '../src/query/Query';
import { Pattern } from '../src/pattern/Pattern';
import { namedNode } from '../src/pattern/terms';
import { Configuration } from '../src/shared/config/Configuration';
import { ArgumentShapeError, ValidationError } from '../src/shared/errors/QueryBuilderError';
import { Logger, LogLevel } from '../src/shared/monitoring/Logger';

describe('Query', () => {
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('construction', () => {
    it('should default to an empty ASK query', () => {
      const query = new Query();
      expect(query.form).toBe('ask');
      expect(query.render()).toBe('ASK WHERE { }');
    });

    it('should normalize the form case', () => {
      expect(new Query('SELECT').form).toBe('select');
      expect(new Query('Ask').form).toBe('ask');
    });

    it('should print other form keywords upper-cased without SELECT handling', () => {
      expect(new Query('construct').render()).toBe('CONSTRUCT WHERE { }');
      const query = new Query('Describe', { distinct: true, limit: 2 }).where(['?s', '?p', '?o']);
      expect(query.form).toBe('describe');
      expect(query.render()).toBe('DESCRIBE WHERE { ?s ?p ?o . } LIMIT 2');
    });

    it('should reject a form that is not a single keyword', () => {
      expect(() => new Query('select * where { } #')).toThrow(ValidationError);
      expect(() => new Query('')).toThrow('Invalid query form: ');
    });

    it('should copy the options it is given', () => {
      const options = { orderBy: ['a'], limit: 3 };
      const query = new Query('select', options);
      query.distinct();

      expect(query.options).not.toBe(options);
      expect(query.options.orderBy).not.toBe(options.orderBy);
      expect(options).toEqual({ orderBy: ['a'], limit: 3 });
      expect(query.options).toEqual({ orderBy: ['a'], limit: 3, distinct: true });
    });

    it('should normalize ORDER BY names given as options', () => {
      const query = Query.selectWith({ orderBy: ['?x', '$y'] }, 'x').where(['?x', '?p', '?y']);
      expect(query.options.orderBy).toEqual(['x', 'y']);
      expect(query.render()).toBe('SELECT ?x WHERE { ?x ?p ?y . } ORDER BY ?x ?y');
    });

    it('should reject ORDER BY options that are not variable names', () => {
      expect(() => new Query('select', { orderBy: ['x } INSERT DATA { <a:b> <a:c> <a:d> } #'] }))
        .toThrow(ValidationError);
    });

    it('should check DISTINCT and REDUCED options like the mutators', () => {
      const configuration = new Configuration({ exclusiveProjectionModifiers: true });
      expect(() => new Query('select', { distinct: true, reduced: true }, undefined, configuration))
        .toThrow('REDUCED cannot be combined with DISTINCT');

      const lenient = new Query('select', { distinct: true, reduced: true });
      expect(warnSpy).toHaveBeenCalledTimes(1);
      expect(lenient.render()).toBe('SELECT DISTINCT REDUCED * WHERE { }');
    });

    it('should run the initializer before returning', () => {
      const query = new Query('select', { distinct: true, limit: 4 }, (q) => {
        q.select('x').where(['?x', '?p', '?o']);
      });
      expect(query.render()).toBe('SELECT DISTINCT ?x WHERE { ?x ?p ?o . } LIMIT 4');
    });

    it('should give each query its own id', () => {
      expect(new Query().id).not.toBe(new Query().id);
    });

    it('should build ASK and SELECT queries through static factories', () => {
      expect(Query.ask({ limit: 1 }).render()).toBe('ASK WHERE { } LIMIT 1');
      expect(Query.select('a', 'b').render()).toBe('SELECT ?a ?b WHERE { }');
      expect(Query.selectWith({ distinct: true }, 'a').render()).toBe('SELECT DISTINCT ?a WHERE { }');
    });
  });

  describe('render', () => {
    it('should render an ASK query over one pattern', () => {
      expect(Query.ask().where(['?s', '?p', '?o']).render()).toBe('ASK WHERE { ?s ?p ?o . }');
    });

    it('should render a SELECT with ORDER BY and LIMIT', () => {
      const query = Query.select('name').where(['?x', '?name', '?name']).order('name').limit(10);
      expect(query.render()).toBe('SELECT ?name WHERE { ?x ?name ?name . } ORDER BY ?name LIMIT 10');
    });

    it('should project * when no variables are selected', () => {
      expect(Query.select().where(['?s', '?p', '?o']).render()).toBe('SELECT * WHERE { ?s ?p ?o . }');
    });

    it('should keep the projection order regardless of later modifiers', () => {
      const query = Query.select('a', 'b').order('b', 'a').distinct();
      expect(query.render()).toBe('SELECT DISTINCT ?a ?b WHERE { } ORDER BY ?b ?a');
    });

    it('should list patterns in append order without deduplicating', () => {
      const query = Query.select()
        .where(['?a', '?b', '?c'], ['?x', '?y', '?z'])
        .where(['?a', '?b', '?c']);
      expect(query.render()).toBe('SELECT * WHERE { ?a ?b ?c . ?x ?y ?z . ?a ?b ?c . }');
    });

    it('should render OFFSET alone, LIMIT alone, and OFFSET before LIMIT', () => {
      expect(Query.select().offset(10).render()).toBe('SELECT * WHERE { } OFFSET 10');
      expect(Query.select().limit(5).render()).toBe('SELECT * WHERE { } LIMIT 5');
      expect(Query.select().limit(5).offset(10).render()).toBe('SELECT * WHERE { } OFFSET 10 LIMIT 5');
    });

    it('should place ORDER BY between the WHERE block and OFFSET', () => {
      const query = Query.select('name').limit(2).offset(4).order('name').where(['?x', '?y', '?name']);
      expect(query.render()).toBe('SELECT ?name WHERE { ?x ?y ?name . } ORDER BY ?name OFFSET 4 LIMIT 2');
    });

    it('should render IRIs and literals through the pattern', () => {
      const query = Query.select('title')
        .where(['?book', namedNode('http://purl.org/dc/elements/1.1/title'), '?title']);
      expect(query.render())
        .toBe('SELECT ?title WHERE { ?book <http://purl.org/dc/elements/1.1/title> ?title . }');
    });

    it('should not print projection modifiers or variables for ASK', () => {
      const query = Query.select('a').distinct().limit(1).ask();
      expect(query.render()).toBe('ASK WHERE { } LIMIT 1');
    });

    it('should be idempotent', () => {
      const query = Query.select('a').where(['?a', '?b', '?c']).order('a').offset(1);
      const first = query.render();
      expect(query.render()).toBe(first);
      expect(query.patterns).toHaveLength(1);
    });

    it('should be what toString returns', () => {
      const query = Query.ask().where(['?s', '?p', '?o']);
      expect(`${query}`).toBe('ASK WHERE { ?s ?p ?o . }');
    });
  });

  describe('select', () => {
    it('should replace variables from an earlier call', () => {
      expect(Query.select('a', 'b').select('c').render()).toBe('SELECT ?c WHERE { }');
    });

    it('should accept sigils and variable terms', () => {
      const dataFactory = new DataFactory();
      const query = Query.select('?a', '$b', dataFactory.variable('c'));
      expect([...query.variables.keys()]).toEqual(['a', 'b', 'c']);
      expect(query.render()).toBe('SELECT ?a ?b ?c WHERE { }');
    });

    it('should switch an ASK query to SELECT', () => {
      expect(Query.ask().select().form).toBe('select');
    });

    it('should reject malformed variable names', () => {
      expect(() => Query.select('two words')).toThrow(ValidationError);
    });
  });

  describe('where', () => {
    it('should keep Pattern instances as they are', () => {
      const pattern = new Pattern('?s', '?p', '?o');
      expect(Query.ask().where(pattern).patterns[0]).toBe(pattern);
    });

    it('should fail on a tuple of the wrong arity and append nothing', () => {
      const query = Query.ask();
      expect(() => query.where(['?a', '?b', '?c'], ['?x'])).toThrow(ArgumentShapeError);
      expect(query.patterns).toHaveLength(0);
    });

    it('should reject a literal predicate and append nothing', () => {
      const query = Query.ask().where(['?s', '?p', '?o']);
      expect(() => query.where(['?s', 'name', '?o'])).toThrow(ArgumentShapeError);
      expect(query.render()).toBe('ASK WHERE { ?s ?p ?o . }');
    });

    it('should return the same instance', () => {
      const query = Query.ask();
      expect(query.where(['?s', '?p', '?o'])).toBe(query);
    });
  });

  describe('order', () => {
    it('should replace the previous ordering', () => {
      const query = Query.select().order('a', 'b').orderBy('?c');
      expect(query.options.orderBy).toEqual(['c']);
      expect(query.render()).toBe('SELECT * WHERE { } ORDER BY ?c');
    });

    it('should omit ORDER BY when cleared', () => {
      expect(Query.select().order('a').order().render()).toBe('SELECT * WHERE { }');
    });
  });

  describe('distinct and reduced', () => {
    it('should render both flags when both are set', () => {
      const query = Query.select().distinct(true).reduced(true);
      expect(query.render()).toBe('SELECT DISTINCT REDUCED * WHERE { }');
    });

    it('should warn when both flags are set', () => {
      Query.select().distinct().reduced();
      expect(warnSpy).toHaveBeenCalledTimes(1);
      expect(warnSpy.mock.calls[0][0]).toContain('[WARN] REDUCED and DISTINCT are both set');
    });

    it('should unset a flag with false', () => {
      expect(Query.select().distinct().distinct(false).render()).toBe('SELECT * WHERE { }');
    });

    it('should reject the combination when configured as exclusive', () => {
      const configuration = new Configuration({ exclusiveProjectionModifiers: true });
      const query = new Query('select', {}, undefined, configuration).distinct();

      expect(() => query.reduced()).toThrow('REDUCED cannot be combined with DISTINCT');
      expect(query.reduced(false).options.reduced).toBe(false);
      expect(query.distinct(false).reduced().render()).toBe('SELECT REDUCED * WHERE { }');
    });
  });

  describe('slice', () => {
    it('should leave absent arguments untouched', () => {
      const query = Query.select().slice(2, 3).slice(undefined, null);
      expect(query.options).toEqual({ offset: 2, limit: 3 });
      query.offset(7);
      expect(query.options.limit).toBe(3);
      expect(query.render()).toBe('SELECT * WHERE { } OFFSET 7 LIMIT 3');
    });

    it('should coerce values leniently by default', () => {
      expect(Query.select().offset('12abc').limit(3.9).options).toEqual({ offset: 12, limit: 3 });
      expect(Query.select().limit('abc').render()).toBe('SELECT * WHERE { } LIMIT 0');
    });

    it('should normalize slice values passed to the constructor', () => {
      expect(new Query('ask', { offset: 2.7 }).options.offset).toBe(2);
    });

    it('should reject invalid values in strict mode', () => {
      const configuration = new Configuration({ strictSlice: true });
      const query = new Query('select', {}, undefined, configuration);

      expect(query.limit('7').options.limit).toBe(7);
      expect(() => query.limit('abc')).toThrow(ValidationError);
      expect(() => query.offset(-1)).toThrow('OFFSET must be a non-negative integer');
      expect(() => query.limit(2.5)).toThrow('LIMIT must be a non-negative integer');
      expect(query.options).toEqual({ limit: 7 });
    });

    it('should accept bigints in strict mode', () => {
      const configuration = new Configuration({ strictSlice: true });
      const query = new Query('select', {}, undefined, configuration).limit(BigInt(10)).offset(BigInt(0));
      expect(query.options).toEqual({ limit: 10, offset: 0 });
      expect(() => query.limit(BigInt(-1))).toThrow('LIMIT must be a non-negative integer');
    });
  });

  describe('inspection', () => {
    it('should combine the type, id and rendering', () => {
      const query = Query.ask();
      expect(query.inspect()).toBe(`#<Query:0x${query.id.toString(16)}(ASK WHERE { })>`);
    });

    it('should be used by util.inspect', () => {
      const query = Query.select('a');
      expect(inspect(query)).toBe(query.inspect());
    });

    it('should write the inspection to the warning log', () => {
      const query = Query.ask();
      query.inspectToLog();
      expect(warnSpy).toHaveBeenCalledTimes(1);
      expect(warnSpy.mock.calls[0][0]).toMatch(/\[WARN\] #<Query:0x[0-9a-f]+\(ASK WHERE \{ \}\)>$/);
    });
  });

  describe('logging', () => {
    afterEach(() => {
      Logger.getInstance({ minLevel: LogLevel.WARN, enableMetrics: false });
    });

    it('should log each render in debug mode', () => {
      const debugSpy = jest.spyOn(console, 'debug').mockImplementation(() => undefined);
      Logger.getInstance({ minLevel: LogLevel.DEBUG });
      const query = new Query('ask', {}, undefined, new Configuration({ debug: true }));

      query.render();

      expect(debugSpy).toHaveBeenCalledTimes(1);
      expect(debugSpy.mock.calls[0][0]).toContain('[DEBUG] Rendered SPARQL query');
      expect(debugSpy.mock.calls[0][0]).toContain('"sparql": "ASK WHERE { }"');
    });

    it('should not log renders outside debug mode', () => {
      const debugSpy = jest.spyOn(console, 'debug').mockImplementation(() => undefined);
      Logger.getInstance({ minLevel: LogLevel.DEBUG });

      Query.ask().render();

      expect(debugSpy).not.toHaveBeenCalled();
    });

    it('should count renders when metrics are enabled', () => {
      const logger = Logger.getInstance({ enableMetrics: true });
      logger.resetMetrics();
      const query = Query.ask();

      query.render();
      query.toString();

      expect(logger.getMetrics().queries_rendered_total).toBe(2);
    });
  });
});
