export {
  prettyPrint,
  printExpression,
  toDiagnosticString,
  StringSink,
  MISSING_ELEMENT,
  type Appendable,
} from './pretty-print.js';
export {
  printAbbreviatedList,
  DEFAULT_DIAGNOSTIC_LIMITS,
  ELLIPSIS,
  type DiagnosticLimits,
} from './abbreviated.js';
export { quoteString } from './quote.js';
