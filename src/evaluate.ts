import { Expr, Sym } from './expr';

export type EvalError =
	| { readonly kind: 'unbound-symbol';	readonly symbol: Sym }
	| { readonly kind: 'division-by-zero' };

export type EvalResult =
	| { readonly ok: true;	readonly value: number }
	| { readonly ok: false;	readonly error: EvalError };

/** Values of symbols by name; only own properties of a record count. */
export type Bindings = ReadonlyMap<string, number> | Readonly<Record<string, number>>;

export function unboundSymbol(symbol: Sym): EvalError {
	return { kind: 'unbound-symbol', symbol };
}
export const divisionByZero: EvalError = { kind: 'division-by-zero' };

export function describeEvalError(error: EvalError): string {
	switch (error.kind) {
		case 'unbound-symbol':		return `unbound symbol '${error.symbol.name}'`;
		case 'division-by-zero':	return 'division by zero';
	}
}

export class EvaluationError extends Error {
	constructor(public readonly error: EvalError) {
		super(describeEvalError(error));
		this.name = 'EvaluationError';
	}
}

//-----------------------------------------------------------------------------
// evaluate
//-----------------------------------------------------------------------------

function ok(value: number): EvalResult {
	return { ok: true, value };
}
function fail(error: EvalError): EvalResult {
	return { ok: false, error };
}

function isMap(bindings: Bindings): bindings is ReadonlyMap<string, number> {
	return bindings instanceof Map;
}

function lookup(bindings: Bindings, name: string): number | undefined {
	if (isMap(bindings))
		return bindings.get(name);
	return Object.prototype.hasOwnProperty.call(bindings, name) ? bindings[name] : undefined;
}

// left to right; the first failure wins
function fold(operands: readonly Expr[], bindings: Bindings, init: number, op: (a: number, b: number) => number): EvalResult {
	let acc = init;
	for (const i of operands) {
		const r = evaluate(i, bindings);
		if (!r.ok)
			return r;
		acc = op(acc, r.value);
	}
	return ok(acc);
}

function binary(left: Expr, right: Expr, bindings: Bindings, op: (a: number, b: number) => EvalResult): EvalResult {
	const a = evaluate(left, bindings);
	if (!a.ok)
		return a;
	const b = evaluate(right, bindings);
	if (!b.ok)
		return b;
	return op(a.value, b.value);
}

/**
 * Computes the value of an expression in double precision.
 * Fails on a variable missing from `bindings`, or on a denominator that evaluates to exactly zero.
 * Powers outside their real domain give NaN rather than failing.
 */
export function evaluate(e: Expr, bindings: Bindings = {}): EvalResult {
	switch (e.kind) {
		case 'num':
			return ok(e.value);
		case 'var': {
			const v = lookup(bindings, e.sym.name);
			return v === undefined ? fail(unboundSymbol(e.sym)) : ok(v);
		}
		case 'add':	return fold(e.operands, bindings, 0, (a, b) => a + b);
		case 'mul':	return fold(e.operands, bindings, 1, (a, b) => a * b);
		case 'sub':	return binary(e.left, e.right, bindings, (a, b) => ok(a - b));
		case 'div':	return binary(e.left, e.right, bindings, (a, b) => b === 0 ? fail(divisionByZero) : ok(a / b));
		case 'pow':	return binary(e.base, e.exponent, bindings, (a, b) => ok(a ** b));
	}
}

export function evaluateOrThrow(e: Expr, bindings: Bindings = {}): number {
	const r = evaluate(e, bindings);
	if (!r.ok)
		throw new EvaluationError(r.error);
	return r.value;
}
