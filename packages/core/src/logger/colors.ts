// =============================================================================
// ANSI color helpers — respects NO_COLOR env and non-TTY streams
// =============================================================================

const enabled =
	typeof process !== "undefined" && process.stdout?.isTTY === true && !process.env.NO_COLOR;

function wrap(open: number, close: number) {
	return enabled ? (s: string) => `\x1b[${open}m${s}\x1b[${close}m` : (s: string) => s;
}

export const bold = wrap(1, 22);
export const dim = wrap(2, 22);
export const red = wrap(31, 39);
export const yellow = wrap(33, 39);
export const cyan = wrap(36, 39);
export const gray = wrap(90, 39);
