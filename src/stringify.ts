import { Expr } from './expr';
import { compareTerms, compareFactors } from './order';

const StringifyOptionsDefault = {
	parentheses:	'minimal' as 'minimal' | 'always',
	juxtapose:		true,	// 2x, xy
	sortTerms:		true,
	sortFactors:	true,
	addChar:		' + ',
	subChar:		' - ',
	mulChar:		'*',
	divChar:		'/',
	powChar:		'^',
	printConst:		(n: number) => String(n),
};

export type StringifyOptions = typeof StringifyOptionsDefault;

let defStringify: StringifyOptions = StringifyOptionsDefault;

export function setDefaultStringifyOptions(opts: Partial<StringifyOptions>) {
	defStringify = { ...defStringify, ...opts };
}
export function getDefaultStringifyOptions(): StringifyOptions {
	return defStringify;
}

//-----------------------------------------------------------------------------
// precedence
//-----------------------------------------------------------------------------

const ADD	= 1;
const MUL	= 2;
const POW	= 3;
const ATOM	= 4;

function precedence(e: Expr): number {
	switch (e.kind) {
		case 'num':
		case 'var':	return ATOM;
		case 'add':
		case 'mul':
			return	e.operands.length === 0 ? ATOM
				:	e.operands.length === 1 ? precedence(e.operands[0])
				:	e.kind === 'add' ? ADD : MUL;
		case 'sub':	return ADD;
		case 'div':	return MUL;
		case 'pow':	return POW;
	}
}

// parenthesizes when the context needs a tighter precedence, or when a sign would end up after an operator
function operand(e: Expr, opts: StringifyOptions, minPrec: number, leading = false) {
	const s		= print(e, opts);
	const prec	= precedence(e);
	const wrap	= (opts.parentheses === 'always' ? prec < ATOM : prec < minPrec) || (!leading && s.startsWith('-'));
	return wrap ? `(${s})` : s;
}

//-----------------------------------------------------------------------------
// add / mul
//-----------------------------------------------------------------------------

function printAdd(operands: readonly Expr[], opts: StringifyOptions): string {
	if (operands.length === 0)
		return opts.printConst(0);

	const terms = opts.sortTerms ? [...operands].sort(compareTerms) : operands;
	return terms.map((t, j) => {
		const s = operand(t, opts, ADD, true);
		return	j === 0 ? s
			:	s.startsWith('-') ? opts.subChar + s.slice(1)
			:	opts.addChar + s;
	}).join('');
}

function isLetter(e: Expr) {
	return e.kind === 'var' && e.sym.name.length === 1;
}

// x juxtaposes with y and y^2, but x^2 does not juxtapose with y
function juxtaposes(prev: Expr, next: Expr) {
	return isLetter(prev) && (isLetter(next) || (next.kind === 'pow' && isLetter(next.base)));
}

// 2x and 2(x + 1), but not 2*3, 2*e5 or 1e+21*x, which would read as a longer number
function juxtaposesConst(coef: string, next: string) {
	return /^-?[0-9.]+$/.test(coef) && !/^([0-9.]|[eE][0-9])/.test(next);
}

function printFactors(factors: readonly Expr[], opts: StringifyOptions, leading: boolean): string {
	return factors.map((f, j) => {
		const s = operand(f, opts, MUL, leading && j === 0);
		return	j === 0 ? s
			:	(opts.juxtapose && juxtaposes(factors[j - 1], f) ? '' : opts.mulChar) + s;
	}).join('');
}

function printMul(operands: readonly Expr[], opts: StringifyOptions): string {
	if (operands.length === 0)
		return opts.printConst(1);
	if (operands.length === 1)
		return print(operands[0], opts);

	const factors		= opts.sortFactors ? [...operands].sort(compareFactors) : operands;
	const [first, ...rest]	= factors;

	if (first.kind !== 'num')
		return printFactors(factors, opts, true);

	const c = first.value;
	if (c === 1)
		return printFactors(rest, opts, true);

	const s = printFactors(rest, opts, false);
	if (c === -1)
		return '-' + s;

	const cs = opts.printConst(c);
	return cs + (opts.juxtapose && juxtaposesConst(cs, s) ? '' : opts.mulChar) + s;
}

//-----------------------------------------------------------------------------
// stringify
//-----------------------------------------------------------------------------

function print(e: Expr, opts: StringifyOptions): string {
	switch (e.kind) {
		case 'num':	return opts.printConst(e.value);
		case 'var':	return e.sym.name;
		case 'add':	return printAdd(e.operands, opts);
		case 'mul':	return printMul(e.operands, opts);
		case 'sub':	return operand(e.left, opts, ADD, true) + opts.subChar + operand(e.right, opts, MUL);
		case 'div':	return operand(e.left, opts, MUL, true) + opts.divChar + operand(e.right, opts, POW);
		case 'pow':	return operand(e.base, opts, ATOM) + opts.powChar + operand(e.exponent, opts, POW);
	}
}

/**
 * Renders an expression for display. Sums and products are printed in canonical order, so equal trees print the
 * same whatever order their operands were built in.
 */
export function stringify(e: Expr, opts?: Partial<StringifyOptions>): string {
	return print(e, { ...defStringify, ...opts });
}
