/**
 * Growable byte storage owned by a single scanner.
 *
 * Capacity starts at `INITIAL_CAPACITY` and doubles when full. A buffer may
 * carry a hard limit; pushes beyond it are refused rather than grown.
 */

export const INITIAL_CAPACITY = 64

export class ByteBuffer {
	private bytes: Uint8Array
	private size = 0
	readonly limit: number | null

	constructor(limit: number | null = null, initialCapacity = INITIAL_CAPACITY) {
		this.limit = limit
		const capacity = limit === null ? initialCapacity : Math.min(initialCapacity, limit)
		this.bytes = new Uint8Array(Math.max(capacity, 1))
	}

	get length(): number {
		return this.size
	}

	get capacity(): number {
		return this.bytes.length
	}

	/**
	 * Appends a byte. Returns false, leaving the buffer untouched, when the
	 * limit has been reached.
	 */
	push(byte: number): boolean {
		if (this.limit !== null && this.size >= this.limit) return false
		if (this.size === this.bytes.length) this.grow()
		this.bytes[this.size++] = byte
		return true
	}

	clear(): void {
		this.size = 0
	}

	/** Decodes the content as single-byte text. */
	toString(): string {
		return Buffer.from(this.bytes.buffer, this.bytes.byteOffset, this.size).toString('latin1')
	}

	private grow(): void {
		let capacity = this.bytes.length * 2
		if (this.limit !== null) capacity = Math.min(capacity, this.limit)
		const next = new Uint8Array(capacity)
		next.set(this.bytes)
		this.bytes = next
	}
}
