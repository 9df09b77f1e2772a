import { formatLineDirective } from './directive.ts'

/**
 * Block layout: splitting captured block content into lines and removing the
 * indentation they share.
 */

function isBlankLine(line: string): boolean {
	return /^[ \t\r]*$/.test(line)
}

/**
 * Splits block content into lines. A whitespace-only last segment is the
 * indentation in front of the closing '}' and is dropped.
 */
export function splitBlockLines(content: string): string[] {
	const lines = content.split('\n')
	const last = lines[lines.length - 1]
	if (last !== undefined && isBlankLine(last)) lines.pop()
	return lines
}

/**
 * Width of a line's leading indentation, a tab counting as `tabSize`.
 * Returns null for whitespace-only lines.
 */
export function measureIndent(line: string, tabSize: number): number | null {
	let width = 0
	for (const char of line) {
		if (char === ' ') width++
		else if (char === '\t') width += tabSize
		else if (char !== '\r') return width
	}
	return null
}

/**
 * Smallest indentation over the lines that have content.
 */
export function commonIndent(lines: readonly string[], tabSize: number): number {
	let least: number | null = null
	for (const line of lines) {
		const width = measureIndent(line, tabSize)
		if (width !== null && (least === null || width < least)) least = width
	}
	return least ?? 0
}

/**
 * Removes `width` columns of indentation from the start of a line. A tab
 * that reaches past `width` is removed whole.
 */
export function stripIndent(line: string, width: number, tabSize: number): string {
	let removed = 0
	let index = 0
	while (removed < width && index < line.length) {
		const char = line.charAt(index)
		if (char === ' ') removed++
		else if (char === '\t') removed += tabSize
		else break
		index++
	}
	return line.slice(index)
}

/**
 * Lays out block content for the header. With a tab size of 0 the lines are
 * copied verbatim; otherwise the common indentation is removed and a blank
 * line follows the block. Empty blocks produce nothing.
 */
export function layoutBlock(content: string, tabSize: number): string {
	const lines = splitBlockLines(content)
	if (lines.length === 0) return ''

	if (tabSize === 0) {
		return lines.map((line) => `${line}\n`).join('')
	}

	const width = commonIndent(lines, tabSize)
	const body = lines
		.map((line) => (isBlankLine(line) ? '\n' : `${stripIndent(line, width, tabSize)}\n`))
		.join('')
	return `${body}\n`
}

/**
 * A laid-out block preceded by its position directive.
 */
export function formatBlock(content: string, tabSize: number, line: number, path: string): string {
	const body = layoutBlock(content, tabSize)
	return body.length === 0 ? '' : formatLineDirective(line, path) + body
}
