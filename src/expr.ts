// invariants:
// - Expr nodes are frozen plain objects and never mutated, so subtrees can be shared freely
// - the variant set is closed; every consumer switches on `kind` exhaustively
// - add/mul operands are an unordered multiset stored as a sequence
//	- equality ignores operand order
//	- stringify and simplify impose the canonical order from ./order
// - a simplified tree has no add/mul with fewer than two operands

//-----------------------------------------------------------------------------
// Sym
//-----------------------------------------------------------------------------

export interface Sym {
	readonly name: string;
}

export function sym(name: string): Sym {
	const s: Sym = { name };
	return Object.freeze(s);
}

export const Sym = {
	of:			sym,
	eq:			(a: Sym, b: Sym): boolean	=> a.name === b.name,
	compare:	(a: Sym, b: Sym): number	=> a.name < b.name ? -1 : a.name > b.name ? 1 : 0,
};

//-----------------------------------------------------------------------------
// Expr
//-----------------------------------------------------------------------------

export interface Num	{ readonly kind: 'num';	readonly value: number; }
export interface Var	{ readonly kind: 'var';	readonly sym: Sym; }
export interface Add	{ readonly kind: 'add';	readonly operands: readonly Expr[]; }
export interface Sub	{ readonly kind: 'sub';	readonly left: Expr; readonly right: Expr; }
export interface Mul	{ readonly kind: 'mul';	readonly operands: readonly Expr[]; }
export interface Div	{ readonly kind: 'div';	readonly left: Expr; readonly right: Expr; }
export interface Pow	{ readonly kind: 'pow';	readonly base: Expr; readonly exponent: Expr; }

export type Expr = Num | Var | Add | Sub | Mul | Div | Pow;
export type ExprKind = Expr['kind'];

/** Anything the constructors take as an operand; plain numbers become {@link Num} leaves. */
export type ExprLike = Expr | number;

export function isExpr(value: unknown): value is Expr {
	if (typeof value !== 'object' || value === null || !('kind' in value))
		return false;
	switch (value.kind) {
		case 'num': case 'var': case 'add': case 'sub': case 'mul': case 'div': case 'pow':
			return true;
		default:
			return false;
	}
}

export function asExpr(i: ExprLike): Expr {
	return typeof i === 'number' ? number(i) : i;
}

//-----------------------------------------------------------------------------
// constructors
//-----------------------------------------------------------------------------

function node<T extends Expr>(e: T): T {
	Object.freeze(e);
	return e;
}

export function number(value: number): Num {
	return node<Num>({ kind: 'num', value });
}

export function variable(s: Sym | string): Var {
	return node<Var>({ kind: 'var', sym: typeof s === 'string' ? sym(s) : s });
}

// n-ary builders; no flattening
export function addOf(operands: readonly Expr[]): Add {
	return node<Add>({ kind: 'add', operands: Object.freeze([...operands]) });
}
export function mulOf(operands: readonly Expr[]): Mul {
	return node<Mul>({ kind: 'mul', operands: Object.freeze([...operands]) });
}

function terms(e: Expr): readonly Expr[] {
	return e.kind === 'add' ? e.operands : [e];
}
function factors(e: Expr): readonly Expr[] {
	return e.kind === 'mul' ? e.operands : [e];
}

/** Sum; an operand that is already a sum is flattened one level. */
export function add(a: ExprLike, b: ExprLike): Add {
	return addOf([...terms(asExpr(a)), ...terms(asExpr(b))]);
}

export function sub(a: ExprLike, b: ExprLike): Sub {
	return node<Sub>({ kind: 'sub', left: asExpr(a), right: asExpr(b) });
}

/** Product; an operand that is already a product is flattened one level. */
export function mul(a: ExprLike, b: ExprLike): Mul {
	return mulOf([...factors(asExpr(a)), ...factors(asExpr(b))]);
}

export function div(a: ExprLike, b: ExprLike): Div {
	return node<Div>({ kind: 'div', left: asExpr(a), right: asExpr(b) });
}

export function pow(a: ExprLike, b: ExprLike): Pow {
	return node<Pow>({ kind: 'pow', base: asExpr(a), exponent: asExpr(b) });
}

export function neg(a: ExprLike): Mul {
	return mul(-1, a);
}

export const Expr = {
	number,
	var:	variable,
	add,
	sub,
	mul,
	div,
	pow,
	neg,
};

//-----------------------------------------------------------------------------
// accessors
//-----------------------------------------------------------------------------

export function getSymbol(e: Expr): Sym | undefined {
	return e.kind === 'var' ? e.sym : undefined;
}

export function isNum(e: Expr, value?: number): e is Num {
	return e.kind === 'num' && (value === undefined || e.value === value);
}

export function children(e: Expr): readonly Expr[] {
	switch (e.kind) {
		case 'num':
		case 'var':	return [];
		case 'add':
		case 'mul':	return e.operands;
		case 'sub':
		case 'div':	return [e.left, e.right];
		case 'pow':	return [e.base, e.exponent];
	}
}

//-----------------------------------------------------------------------------
// structural equality
//-----------------------------------------------------------------------------

export function numbersEqual(a: number, b: number) {
	return a === b || (a !== a && b !== b);	// NaN equals NaN
}

function sameMultiset(a: readonly Expr[], b: readonly Expr[]) {
	if (a.length !== b.length)
		return false;
	const used = new Array<boolean>(b.length).fill(false);
	for (const i of a) {
		const j = b.findIndex((other, k) => !used[k] && equals(i, other));
		if (j < 0)
			return false;
		used[j] = true;
	}
	return true;
}

export function equals(a: Expr, b: Expr): boolean {
	if (a === b)
		return true;
	switch (a.kind) {
		case 'num':	return b.kind === 'num' && numbersEqual(a.value, b.value);
		case 'var':	return b.kind === 'var' && Sym.eq(a.sym, b.sym);
		case 'add':	return b.kind === 'add' && sameMultiset(a.operands, b.operands);
		case 'mul':	return b.kind === 'mul' && sameMultiset(a.operands, b.operands);
		case 'sub':	return b.kind === 'sub' && equals(a.left, b.left) && equals(a.right, b.right);
		case 'div':	return b.kind === 'div' && equals(a.left, b.left) && equals(a.right, b.right);
		case 'pow':	return b.kind === 'pow' && equals(a.base, b.base) && equals(a.exponent, b.exponent);
	}
}

//-----------------------------------------------------------------------------
// substitution
//-----------------------------------------------------------------------------

export type Substitutions = Readonly<Record<string, ExprLike>>;

/** Replaces variables by the expressions bound to their names; nothing is simplified. */
export function substitute(e: Expr, map: Substitutions): Expr {
	switch (e.kind) {
		case 'num':
			return e;
		case 'var': {
			const val = Object.prototype.hasOwnProperty.call(map, e.sym.name) ? map[e.sym.name] : undefined;
			return val === undefined ? e : asExpr(val);
		}
		case 'add':	return addOf(e.operands.map(i => substitute(i, map)));
		case 'mul':	return mulOf(e.operands.map(i => substitute(i, map)));
		case 'sub':	return sub(substitute(e.left, map), substitute(e.right, map));
		case 'div':	return div(substitute(e.left, map), substitute(e.right, map));
		case 'pow':	return pow(substitute(e.base, map), substitute(e.exponent, map));
	}
}

export function freeSymbols(e: Expr): Sym[] {
	const found = new Map<string, Sym>();
	function visit(e: Expr) {
		if (e.kind === 'var')
			found.set(e.sym.name, e.sym);
		else
			children(e).forEach(visit);
	}
	visit(e);
	return [...found.values()].sort(Sym.compare);
}
