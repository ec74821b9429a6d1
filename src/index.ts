export { Query, SliceValue } from './query/Query';
export { QueryBuilder, ask, select, selectWith } from './query/QueryBuilder';
export { renderQuery } from './query/QuerySerializer';
export { QueryAlgebraConverter } from './query/QueryAlgebra';
export { Pattern } from './pattern/Pattern';
export { namedNode, literal, variable, toTerm, renderTerm } from './pattern/terms';
export { Configuration, QueryBuilderConfig } from './shared/config/Configuration';
export { Logger, LogLevel, LoggerConfig } from './shared/monitoring/Logger';
export { QueryBuilderError, ArgumentShapeError, ValidationError } from './shared/errors/QueryBuilderError';
export { IriValidator, VariableNameValidator, SliceValidator } from './shared/validation/InputValidator';
export {
  QueryForm,
  KnownQueryForm,
  QueryOptions,
  QueryState,
  QueryInitializer,
  VariableLike,
  TermLike,
  TripleLike,
  ExtendedDataFactory
} from './types/interfaces';
