import { Expr, addOf, mulOf, number, sub, div, pow } from './expr';
import { simplify } from './simplify';
import { stringify } from './stringify';
import { traceLog } from './trace';

export type ExpandOptions = {
	maxPow?:	number;		// only powers below this are multiplied out; 0 for no limit
	maxParts?:	number;		// cap number of expansion parts to avoid combinatorial explosion; defaults to 65536
};

const defaultMaxParts = 1 << 16;

function factors(e: Expr): Expr[] {
	return e.kind === 'mul' ? e.operands.flatMap(factors) : [e];
}

function negate(e: Expr): Expr {
	return mulOf([number(-1), ...factors(e)]);
}

// a - b contributes a and -b
function summands(e: Expr): Expr[] {
	return	e.kind === 'add' ? e.operands.flatMap(summands)
		:	e.kind === 'sub' ? [...summands(e.left), ...summands(e.right).map(negate)]
		:	[e];
}

function countParts(choices: readonly Expr[][]) {
	return choices.reduce((n, c) => n * c.length, 1);
}

// operands must already be expanded
function distribute(operands: readonly Expr[], opts?: ExpandOptions): Expr {
	const flat		= operands.flatMap(factors);
	const choices	= flat.map(summands);

	if (choices.every(c => c.length === 1) || countParts(choices) > (opts?.maxParts ?? defaultMaxParts))
		return mulOf(flat);

	let parts: Expr[][] = [[]];
	for (const c of choices)
		parts = parts.flatMap(p => c.map(t => [...p, t]));

	return addOf(parts.map(p => mulOf(p.flatMap(factors))));
}

// a product with no sums in it has nothing to distribute, so only sums and differences are raised by repetition
function isExpandablePower(base: Expr, n: number, opts?: ExpandOptions) {
	return (base.kind === 'add' || base.kind === 'sub')
		&& Number.isInteger(n) && n > 0
		&& (!opts?.maxPow || n < opts.maxPow)
		&& summands(base).length ** n <= (opts?.maxParts ?? defaultMaxParts);
}

function expandNode(e: Expr, opts?: ExpandOptions): Expr {
	switch (e.kind) {
		case 'num':
		case 'var':	return e;
		case 'add':	return addOf(e.operands.map(i => expandNode(i, opts)));
		case 'mul':	return distribute(e.operands.map(i => expandNode(i, opts)), opts);
		case 'sub':	return sub(expandNode(e.left, opts), expandNode(e.right, opts));
		case 'div':	return div(expandNode(e.left, opts), expandNode(e.right, opts));
		case 'pow': {
			const base		= expandNode(e.base, opts);
			const exponent	= simplify(expandNode(e.exponent, opts));
			if (exponent.kind === 'num' && isExpandablePower(base, exponent.value, opts))
				return distribute(Array.from({ length: exponent.value }, () => base), opts);
			return pow(base, exponent);
		}
	}
}

/**
 * Multiplies out products of sums and differences, treating a sum or difference raised to a positive integer as
 * repeated multiplication, then simplifies the result. Quotients are not distributed, and a difference that is not
 * a factor keeps its shape.
 */
export function expand(e: Expr, opts?: ExpandOptions): Expr {
	const done		= traceLog(() => `expand: ${stringify(e)}`);
	const result	= simplify(expandNode(e, opts));
	done(() => `=> ${stringify(result)}`);
	return result;
}
