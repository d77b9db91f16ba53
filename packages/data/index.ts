/**
 * data package - value model, coercion and errors
 */

export type { Value, Row } from './value.js';
export {
  asNumber,
  asText,
  toNumberStrict,
  isValueList,
  hasField,
  compareText,
  compareValues,
} from './value.js';

export { PlotcoreError, CoercionError, FilterSyntaxError } from './errors.js';
