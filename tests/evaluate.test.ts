import { describe, it, expect } from 'vitest';
import { Expr, sym, number, variable, add, sub, mul, div, pow, simplify, evaluate, evaluateOrThrow, describeEvalError, EvaluationError } from '../src';

const w = Expr.var('w');
const x = Expr.var('x');
const y = Expr.var('y');
const z = Expr.var('z');

describe('evaluate', () => {
	it('computes each operator', () => {
		const env = { x: 2, y: 3 };
		expect(evaluate(add(x, y), env)).toEqual({ ok: true, value: 5 });
		expect(evaluate(sub(x, y), env)).toEqual({ ok: true, value: -1 });
		expect(evaluate(mul(x, y), env)).toEqual({ ok: true, value: 6 });
		expect(evaluate(div(y, x), env)).toEqual({ ok: true, value: 1.5 });
		expect(evaluate(pow(x, y), env)).toEqual({ ok: true, value: 8 });
	});

	it('evaluates nested expressions', () => {
		const e = pow(add(add(x, x), mul(y, y)), z);
		expect(evaluate(e, { x: 4, y: 3, z: 2 })).toEqual({ ok: true, value: 289 });

		const r = evaluate(mul(mul(pow(add(x, y), sub(x, y)), div(y, x)), mul(x, y)), { x: 2, y: 3 });
		expect(r.ok).toBe(true);
		if (r.ok)
			expect(r.value).toBeCloseTo(1.8);
	});

	it('needs no bindings for constants', () => {
		expect(evaluate(mul(number(2), pow(3, 2)))).toEqual({ ok: true, value: 18 });
	});

	it('accepts a map of bindings', () => {
		expect(evaluate(mul(x, 3), new Map([['x', 2]]))).toEqual({ ok: true, value: 6 });
	});

	it('reports unbound symbols', () => {
		expect(evaluate(add(x, w), { x: 1 })).toEqual({ ok: false, error: { kind: 'unbound-symbol', symbol: sym('w') } });
		expect(evaluate(variable('toString'), {})).toEqual({ ok: false, error: { kind: 'unbound-symbol', symbol: sym('toString') } });
	});

	it('reports division by zero', () => {
		expect(evaluate(div(1, 0))).toEqual({ ok: false, error: { kind: 'division-by-zero' } });
		expect(evaluate(div(1, -0))).toEqual({ ok: false, error: { kind: 'division-by-zero' } });
		expect(evaluate(div(x, sub(y, y)), { x: 1, y: 4 })).toEqual({ ok: false, error: { kind: 'division-by-zero' } });
	});

	it('reports the leftmost failure', () => {
		expect(evaluate(add(w, div(1, 0)))).toEqual({ ok: false, error: { kind: 'unbound-symbol', symbol: sym('w') } });
		expect(evaluate(div(w, 0))).toEqual({ ok: false, error: { kind: 'unbound-symbol', symbol: sym('w') } });
		expect(evaluate(add(div(1, 0), w))).toEqual({ ok: false, error: { kind: 'division-by-zero' } });
	});

	it('gives NaN for powers outside the real domain', () => {
		const r = evaluate(pow(-8, 1 / 3));
		expect(r.ok && Number.isNaN(r.value)).toBe(true);
	});

	it('agrees with the simplified tree', () => {
		const e = add(mul(2, x), mul(3, x));
		expect(evaluate(simplify(e), { x: 1.5 })).toEqual(evaluate(e, { x: 1.5 }));
		expect(evaluate(e, { x: 1.5 })).toEqual({ ok: true, value: 7.5 });
	});
});

describe('errors', () => {
	it('describes failures', () => {
		expect(describeEvalError({ kind: 'unbound-symbol', symbol: sym('w') })).toBe("unbound symbol 'w'");
		expect(describeEvalError({ kind: 'division-by-zero' })).toBe('division by zero');
	});

	it('throws from evaluateOrThrow', () => {
		expect(evaluateOrThrow(add(x, 1), { x: 2 })).toBe(3);
		expect(() => evaluateOrThrow(w)).toThrow(EvaluationError);
		expect(() => evaluateOrThrow(w)).toThrow("unbound symbol 'w'");

		try {
			evaluateOrThrow(div(1, 0));
		} catch (err) {
			expect(err).toBeInstanceOf(EvaluationError);
			if (err instanceof EvaluationError) {
				expect(err.name).toBe('EvaluationError');
				expect(err.error).toEqual({ kind: 'division-by-zero' });
			}
		}
		expect.assertions(6);
	});
});
