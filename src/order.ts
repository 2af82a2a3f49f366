import { Expr, ExprKind, Sym, number, numbersEqual } from './expr';

// canonical ordering:
// - compareExpr is a total order consistent with equals (add/mul compare their sorted operand lists)
// - terms of a sum are ordered lexicographically as monomials; the constant term goes last
// - factors of a product are ordered numbers first, then by base, higher powers first

const kindRank: Record<ExprKind, number> = {
	num: 0,
	var: 1,
	pow: 2,
	mul: 3,
	div: 4,
	add: 5,
	sub: 6,
};

export function compareNumbers(a: number, b: number): number {
	return	numbersEqual(a, b) ? 0
		:	a !== a ? 1		// NaN last
		:	b !== b ? -1
		:	a < b ? -1 : 1;
}

function compareLists(a: readonly Expr[], b: readonly Expr[], compare: (a: Expr, b: Expr) => number): number {
	for (let i = 0; i < a.length && i < b.length; i++) {
		const c = compare(a[i], b[i]);
		if (c)
			return c;
	}
	return a.length - b.length;
}

function sorted(list: readonly Expr[]) {
	return [...list].sort(compareExpr);
}

export function compareExpr(a: Expr, b: Expr): number {
	switch (a.kind) {
		case 'num':	if (b.kind === 'num') return compareNumbers(a.value, b.value); break;
		case 'var':	if (b.kind === 'var') return Sym.compare(a.sym, b.sym); break;
		case 'add':	if (b.kind === 'add') return compareLists(sorted(a.operands), sorted(b.operands), compareExpr); break;
		case 'mul':	if (b.kind === 'mul') return compareLists(sorted(a.operands), sorted(b.operands), compareExpr); break;
		case 'sub':	if (b.kind === 'sub') return compareExpr(a.left, b.left) || compareExpr(a.right, b.right); break;
		case 'div':	if (b.kind === 'div') return compareExpr(a.left, b.left) || compareExpr(a.right, b.right); break;
		case 'pow':	if (b.kind === 'pow') return compareExpr(a.base, b.base) || compareExpr(a.exponent, b.exponent); break;
	}
	return kindRank[a.kind] - kindRank[b.kind];
}

//-----------------------------------------------------------------------------
// terms and factors
//-----------------------------------------------------------------------------

export interface term {
	coef:	number;
	rest:	readonly Expr[];	// non-numeric factors; empty for a constant
}
export function term(e: Expr): term {
	switch (e.kind) {
		case 'num':
			return { coef: e.value, rest: [] };
		case 'mul': {
			let coef = 1;
			const rest: Expr[] = [];
			for (const i of e.operands) {
				if (i.kind === 'num')
					coef *= i.value;
				else
					rest.push(i);
			}
			return { coef, rest };
		}
		default:
			return { coef: 1, rest: [e] };
	}
}

export interface factor {
	item:	Expr;
	pow:	Expr;
}
export function factor(e: Expr): factor {
	return e.kind === 'pow' ? { item: e.base, pow: e.exponent } : { item: e, pow: one };
}

const one = number(1);

function compareFactorParts(a: factor, b: factor) {
	return compareExpr(a.item, b.item) || compareExpr(b.pow, a.pow);
}

/** Order of the operands of a product: numbers first, then by base, higher powers first. */
export function compareFactors(a: Expr, b: Expr): number {
	if (a.kind === 'num' || b.kind === 'num')
		return a.kind === 'num' && b.kind === 'num' ? compareNumbers(a.value, b.value) : a.kind === 'num' ? -1 : 1;
	return compareFactorParts(factor(a), factor(b)) || compareExpr(a, b);
}

/** Order of the operands of a sum: lexicographic monomial order, constants last. */
export function compareTerms(a: Expr, b: Expr): number {
	const ta = term(a);
	const tb = term(b);
	const fa = ta.rest.map(factor).sort(compareFactorParts);
	const fb = tb.rest.map(factor).sort(compareFactorParts);

	for (let i = 0; i < fa.length && i < fb.length; i++) {
		const c = compareFactorParts(fa[i], fb[i]);
		if (c)
			return c;
	}
	return fb.length - fa.length
		|| compareNumbers(ta.coef, tb.coef)
		|| compareExpr(a, b);
}
