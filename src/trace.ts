//-----------------------------------------------------------------------------
// trace logging - auto-indent/outdent
//-----------------------------------------------------------------------------

let enabled	= false;
let depth	= 0;

export function setTraceLogging(on: boolean) {
	enabled = on;
	depth	= 0;
}

export function isTraceLogging() {
	return enabled;
}

// logs at the current depth and indents until the returned closure is called; the closure can log a result line first
export function traceLog(log: () => string): (result?: () => string) => void {
	if (enabled) {
		console.log('  '.repeat(depth++) + log());
		return result => {
			if (result)
				console.log('  '.repeat(depth) + result());
			depth--;
		};
	}
	return () => {};
}
