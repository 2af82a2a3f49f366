export { Expr, Sym, sym, number, variable, add, sub, mul, div, pow, neg, isExpr, getSymbol, equals, substitute, freeSymbols } from './expr';
export type { Num, Var, Add, Sub, Mul, Div, Pow, ExprKind, ExprLike, Substitutions } from './expr';
export { compareExpr, compareTerms, compareFactors } from './order';
export { simplify } from './simplify';
export { expand } from './expand';
export type { ExpandOptions } from './expand';
export { evaluate, evaluateOrThrow, describeEvalError, EvaluationError } from './evaluate';
export type { EvalError, EvalResult, Bindings } from './evaluate';
export { stringify, setDefaultStringifyOptions, getDefaultStringifyOptions } from './stringify';
export type { StringifyOptions } from './stringify';
export { setTraceLogging, isTraceLogging } from './trace';
