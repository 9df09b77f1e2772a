/**
 * Byte values of the structural characters the scanner reacts to.
 */
export const TAB = 0x09
export const LF = 0x0a
export const CR = 0x0d
export const SPACE = 0x20
export const LPAREN = 0x28
export const RPAREN = 0x29
export const SEMICOLON = 0x3b
export const EQUALS = 0x3d
export const LBRACKET = 0x5b
export const RBRACKET = 0x5d
export const LBRACE = 0x7b
export const RBRACE = 0x7d

/**
 * Spaces, tabs and carriage returns. Newlines are handled on their own.
 */
export function isBlank(byte: number): boolean {
	return byte === SPACE || byte === TAB || byte === CR
}

export function charOf(byte: number): string {
	return String.fromCharCode(byte)
}
