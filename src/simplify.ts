import { Expr, addOf, mulOf, number, sub, div, pow, equals, isNum } from './expr';
import { compareTerms, compareFactors, term, factor } from './order';
import { stringify } from './stringify';
import { traceLog } from './trace';

// invariants of the output:
// - add: flat, at most one constant (last), no two terms with equal residuals, no zero coefficients
// - mul: flat, at most one constant (first, never 0 or 1), no two factors with equal bases, no zero powers
// - add/mul have at least two operands, in canonical order

//-----------------------------------------------------------------------------
// add
//-----------------------------------------------------------------------------

interface like {
	item:	Expr;
	coef:	number;
}

// operands must already be simplified
export function addTerms(operands: readonly Expr[]): Expr {
	const terms: like[] = [];
	let num = 0;

	function add(item: Expr) {
		if (item.kind === 'add') {
			item.operands.forEach(add);
			return;
		}
		const { coef, rest } = term(item);
		if (rest.length === 0) {
			num += coef;
			return;
		}
		const residual	= rest.length === 1 ? rest[0] : mulOf(rest);
		const existing	= terms.find(t => equals(t.item, residual));
		if (existing)
			existing.coef += coef;
		else
			terms.push({ item: residual, coef });
	}

	operands.forEach(add);

	const result = terms
		.filter(t => t.coef !== 0)
		.map(t => mulFactors([number(t.coef), t.item]));

	// a coefficient of 1 can expose a nested sum
	if (result.some(i => i.kind === 'add' || i.kind === 'num'))
		return addTerms([...result, number(num)]);

	if (num !== 0 || result.length === 0)
		result.push(number(num));

	return result.length === 1 ? result[0] : addOf(result.sort(compareTerms));
}

//-----------------------------------------------------------------------------
// mul
//-----------------------------------------------------------------------------

interface powers {
	item:	Expr;
	pows:	Expr[];
}

// operands must already be simplified
export function mulFactors(operands: readonly Expr[]): Expr {
	const factors: powers[] = [];
	let num = 1;

	function add(item: Expr) {
		if (item.kind === 'num') {
			num *= item.value;

		} else if (item.kind === 'mul') {
			item.operands.forEach(add);

		} else {
			const f			= factor(item);
			const existing	= factors.find(i => equals(i.item, f.item));
			if (existing)
				existing.pows.push(f.pow);
			else
				factors.push({ item: f.item, pows: [f.pow] });
		}
	}

	operands.forEach(add);

	if (num === 0)
		return number(0);

	const result = factors.map(f => powFactor(f.item, f.pows.length === 1 ? f.pows[0] : addTerms(f.pows)));

	// combined powers can fold to a constant, or b^1 can expose a product or a power as the new factor
	if (result.some((i, j) => i.kind === 'num' || i.kind === 'mul' || !equals(factor(i).item, factors[j].item)))
		return mulFactors([number(num), ...result]);

	result.sort(compareFactors);
	if (num !== 1 || result.length === 0)
		result.unshift(number(num));

	return result.length === 1 ? result[0] : mulOf(result);
}

//-----------------------------------------------------------------------------
// binary
//-----------------------------------------------------------------------------

export function powFactor(base: Expr, exponent: Expr): Expr {
	return	base.kind === 'num' && exponent.kind === 'num' ? number(base.value ** exponent.value)
		:	isNum(exponent, 0) ? number(1)
		:	isNum(exponent, 1) ? base
		:	pow(base, exponent);
}

function subTerms(left: Expr, right: Expr): Expr {
	return	left.kind === 'num' && right.kind === 'num' ? number(left.value - right.value)
		:	isNum(right, 0) ? left
		:	equals(left, right) ? number(0)
		:	sub(left, right);
}

// a zero denominator is left for evaluate to report
function divTerms(left: Expr, right: Expr): Expr {
	return	left.kind === 'num' && right.kind === 'num' && right.value !== 0 ? number(left.value / right.value)
		:	isNum(right, 1) ? left
		:	div(left, right);
}

//-----------------------------------------------------------------------------
// simplify
//-----------------------------------------------------------------------------

function simplifyNode(e: Expr): Expr {
	switch (e.kind) {
		case 'num':
		case 'var':	return e;
		case 'add':	return addTerms(e.operands.map(simplify));
		case 'mul':	return mulFactors(e.operands.map(simplify));
		case 'sub':	return subTerms(simplify(e.left), simplify(e.right));
		case 'div':	return divTerms(simplify(e.left), simplify(e.right));
		case 'pow':	return powFactor(simplify(e.base), simplify(e.exponent));
	}
}

/**
 * Canonicalizes an expression bottom-up: folds constants, collects like terms and like factors, and removes
 * identities. The result is in canonical order, and simplifying it again returns an equal tree.
 * Products are never distributed over sums; see {@link expand}.
 */
export function simplify(e: Expr): Expr {
	if (e.kind === 'num' || e.kind === 'var')
		return e;
	const done		= traceLog(() => `simplify: ${stringify(e)}`);
	const result	= simplifyNode(e);
	done(() => `=> ${stringify(result)}`);
	return result;
}
