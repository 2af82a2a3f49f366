import { describe, it, expect } from 'vitest';
import { Expr, number, add, sub, mul, div, pow, expand, simplify, stringify, evaluate } from '../src';

const a = Expr.var('a');
const b = Expr.var('b');
const c = Expr.var('c');
const n = Expr.var('n');
const x = Expr.var('x');
const y = Expr.var('y');

function show(e: Expr, opts?: Parameters<typeof expand>[1]) {
	return stringify(expand(e, opts));
}

describe('expand', () => {
	it('squares a binomial', () => {
		expect(show(pow(add(x, y), 2))).toBe('x^2 + 2xy + y^2');
	});

	it('cubes a binomial', () => {
		expect(show(pow(add(x, y), 3))).toBe('x^3 + 3x^2*y + 3xy^2 + y^3');
	});

	it('multiplies out products of sums', () => {
		expect(show(mul(add(x, 1), add(x, 2)))).toBe('x^2 + 3x + 2');
		expect(show(mul(2, add(x, mul(3, add(y, 1)))))).toBe('2x + 6y + 6');
	});

	it('treats a zero power as one', () => {
		expect(expand(pow(add(x, 1), 0))).toEqual(number(1));
	});

	it('leaves symbolic and fractional exponents alone', () => {
		expect(show(pow(add(x, 1), n))).toBe('(x + 1)^n');
		expect(show(pow(add(x, 1), 0.5))).toBe('(x + 1)^0.5');
		expect(show(pow(add(x, 1), -1))).toBe('(x + 1)^(-1)');
	});

	it('simplifies an exponent before deciding', () => {
		expect(show(pow(add(x, 1), add(1, 1)))).toBe('x^2 + 2x + 1');
	});

	it('distributes over differences', () => {
		expect(show(mul(c, sub(x, y)))).toBe('cx - cy');
		expect(show(pow(sub(x, y), 2))).toBe('x^2 - 2xy + y^2');
		expect(show(mul(x, sub(y, 1)))).toBe('xy - x');
	});

	it('keeps a difference that is not a factor', () => {
		expect(show(sub(mul(2, add(x, 1)), y))).toBe('2x + 2 - y');
	});

	it('does not distribute over quotients', () => {
		expect(show(div(add(a, b), c))).toBe('(a + b)/c');
	});

	it('respects maxPow', () => {
		expect(show(pow(add(x, 1), 3), { maxPow: 3 })).toBe('(x + 1)^3');
		expect(show(pow(add(x, 1), 2), { maxPow: 3 })).toBe('x^2 + 2x + 1');
		expect(show(pow(add(x, 1), 2), { maxPow: 0 })).toBe('x^2 + 2x + 1');
	});

	it('leaves powers too large to multiply out', () => {
		expect(show(pow(add(x, 1), 2 ** 32))).toBe('(x + 1)^4294967296');
		expect(show(pow(add(x, 1), 17))).toBe('(x + 1)^17');
		expect(show(pow(add(x, 1), 3), { maxParts: 7 })).toBe('(x + 1)^3');
		expect(show(pow(mul(x, y), 1e300))).toBe('(xy)^1e+300');
	});

	it('respects maxParts', () => {
		expect(show(mul(add(x, 1), add(y, 1)), { maxParts: 3 })).toBe('(x + 1)*(y + 1)');
		expect(show(mul(add(x, 1), add(y, 1)), { maxParts: 4 })).toBe('xy + x + y + 1');
	});

	it('returns simplified trees', () => {
		const e = expand(mul(add(a, b), add(a, b)));
		expect(stringify(simplify(e))).toBe(stringify(e));
	});

	it('preserves values', () => {
		const e		= mul(add(x, 2), sub(pow(add(x, y), 2), y));
		const env	= { x: 1.5, y: -2 };
		const before	= evaluate(e, env);
		const after		= evaluate(expand(e), env);
		expect(before.ok && after.ok).toBe(true);
		if (before.ok && after.ok)
			expect(after.value).toBeCloseTo(before.value);
	});
});
