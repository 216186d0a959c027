export { sql, createSql } from './sql.js';
export type { SqlConfig, SqlFormatter } from './sql.js';
export { Fragment } from './fragment/fragment.js';
export type { CompiledFragment, PreparedQuery } from './fragment/fragment.js';
export { escape, Uuid } from './builders/escape.js';
export type {
  Part,
  LiteralPart,
  PlaceholderPart,
  SlotPart,
  SlotValues,
  FillOptions,
  RenderedQuery,
} from './types.js';
export {
  TemplateSyntaxError,
  ArityError,
  UnfilledSlotError,
  UnsupportedTypeError,
  CompositionError,
  InvalidUuidError,
} from './errors.js';
