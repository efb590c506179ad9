/**
 * Public library surface of the Sprig interpreter.
 */

export { Interpreter, evaluate, tryEvaluate } from './interpreter';
export type { EvaluationOutcome } from './interpreter';
export { Lexer, TokenStream, tokenize } from './lexer';
export { describeToken } from './tokens';
export type { Token, TokenKind } from './tokens';
export { Environment } from './environment';
export {
  SprigError,
  SprigSyntaxError,
  SprigEvaluationError,
  SprigNameError,
  SprigOperatorError,
  SprigDepthError,
  errorKind,
} from './errors';
export { ConfigError, DEFAULT_OPTIONS, MAX_DEPTH_LIMIT, loadConfig, resolveOptions } from './config';
export type { InterpreterOptions } from './config';
export { INT32_MAX, INT32_MIN } from './int32';
