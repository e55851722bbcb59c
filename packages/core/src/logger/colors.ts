// =============================================================================
// ANSI colours for the console logger
// =============================================================================

import type { LogLevel } from "./levels.js";

type Paint = (s: string) => string;

export interface Palette {
	bold: Paint;
	dim: Paint;
	level: Record<LogLevel, Paint>;
}

/** Colour only an interactive stdout, and never when NO_COLOR is set. */
export function colorsSupported(): boolean {
	return typeof process !== "undefined" && process.stdout?.isTTY === true && !process.env.NO_COLOR;
}

function paint(enabled: boolean, open: number, close: number): Paint {
	return enabled ? (s) => `\x1b[${open}m${s}\x1b[${close}m` : (s) => s;
}

export function createPalette(enabled: boolean): Palette {
	return {
		bold: paint(enabled, 1, 22),
		dim: paint(enabled, 2, 22),
		level: {
			debug: paint(enabled, 35, 39),
			info: paint(enabled, 34, 39),
			warn: paint(enabled, 33, 39),
			error: paint(enabled, 31, 39),
		},
	};
}
