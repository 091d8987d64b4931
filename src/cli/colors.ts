// ---------------------------------------------------------------------------
// ANSI color helpers for CLI output
// ---------------------------------------------------------------------------

export const colors = {
	reset: "\x1b[0m",
	bold: "\x1b[1m",
	dim: "\x1b[2m",
	green: "\x1b[32m",
	yellow: "\x1b[33m",
	blue: "\x1b[34m",
	magenta: "\x1b[35m",
	cyan: "\x1b[36m",
	white: "\x1b[37m",
	gray: "\x1b[90m",
	red: "\x1b[31m",
	bgRed: "\x1b[41m",
};

/** Semantic color helpers */
export const c = {
	title: (s: string) => `${colors.bold}${colors.cyan}${s}${colors.reset}`,
	success: (s: string) => `${colors.green}${s}${colors.reset}`,
	warning: (s: string) => `${colors.yellow}${s}${colors.reset}`,
	error: (s: string) => `${colors.bgRed}${colors.white} ${s} ${colors.reset}`,
	info: (s: string) => `${colors.blue}${s}${colors.reset}`,
	dim: (s: string) => `${colors.dim}${s}${colors.reset}`,
	path: (s: string) => `${colors.gray}${s}${colors.reset}`,
	bold: (s: string) => `${colors.bold}${s}${colors.reset}`,
	list: (s: string) => `${colors.yellow}•${colors.reset} ${s}`,
};

/** Remove ANSI escape sequences, e.g. before measuring or asserting output. */
export function stripColors(s: string): string {
	// biome-ignore lint/suspicious/noControlCharactersInRegex: matching ANSI escapes
	return s.replace(/\x1b\[[0-9;]*m/g, "");
}
