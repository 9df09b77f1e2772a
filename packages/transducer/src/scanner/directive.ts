/**
 * Output formatting shared by members, blocks and strip mode.
 */

/**
 * Escapes a path for use inside a quoted `#line` directive.
 */
export function escapePath(path: string): string {
	return path.replace(/[\\"]/g, (char) => `\\${char}`)
}

/**
 * Creates a position directive: `#line <line> "<path>"` and a newline.
 */
export function formatLineDirective(line: number, path: string): string {
	return `#line ${line} "${escapePath(path)}"\n`
}

/**
 * Wraps an attribute name as a GNU C attribute: `hot` becomes
 * `__attribute__((__hot__))`.
 */
export function formatAttribute(name: string): string {
	return `__attribute__((__${name}__))`
}
