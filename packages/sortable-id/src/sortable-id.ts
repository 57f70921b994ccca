/**
 * Sortable ID Generator
 *
 * A sortable ID is a 128-bit value composed of:
 * - 48 bits for timestamp (milliseconds since the Unix epoch)
 * - 80 bits for random component
 *
 * Encoded as 26-character Crockford Base32 strings (e.g., "01JABCDE5Y8JY5ZQ0HZXEQ5Y8J").
 *
 * Properties:
 * - Time-sortable (creation order preserved in lexicographic sort)
 * - Monotonic within a process: IDs minted in the same millisecond
 *   increment the random component instead of drawing a new one
 * - URL-safe and case-insensitive
 */

import crypto from 'node:crypto';

// Crockford Base32 alphabet (excludes I, L, O, U to avoid confusion)
const CROCKFORD_ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';
const CROCKFORD_DECODE: Record<string, number> = {};

for (let i = 0; i < CROCKFORD_ALPHABET.length; i++) {
	const char = CROCKFORD_ALPHABET[i]!;
	CROCKFORD_DECODE[char] = i;
	CROCKFORD_DECODE[char.toLowerCase()] = i;
}

export const ENCODED_LENGTH = 26;

const TIMESTAMP_BITS = 48n;
const RANDOM_BITS = 80n;
const MAX_TIMESTAMP = (1n << TIMESTAMP_BITS) - 1n;
const RANDOM_MASK = (1n << RANDOM_BITS) - 1n;

// 26 chars carry 130 bits, so the leading char can only hold the top 3 bits
const MAX_LEADING_DIGIT = 7;

let lastTimestamp = -1n;
let lastRandom = 0n;

function randomBits(): bigint {
	const bytes = crypto.randomBytes(10);
	let value = 0n;
	for (const byte of bytes) {
		value = (value << 8n) | BigInt(byte);
	}
	return value;
}

function currentTimestamp(): bigint {
	return BigInt(Date.now());
}

function generateBigInt(): bigint {
	let timestamp = currentTimestamp();

	if (timestamp <= lastTimestamp) {
		// Same millisecond (or the clock stepped back): stay on the last timestamp
		timestamp = lastTimestamp;
		lastRandom = (lastRandom + 1n) & RANDOM_MASK;
		if (lastRandom === 0n) {
			// Random component overflow: wait for the next millisecond
			let next = currentTimestamp();
			while (next <= lastTimestamp) {
				next = currentTimestamp();
			}
			timestamp = next;
			lastRandom = randomBits();
		}
	} else {
		lastRandom = randomBits();
	}

	if (timestamp > MAX_TIMESTAMP) {
		throw new Error('Timestamp exceeds 48 bits');
	}

	lastTimestamp = timestamp;
	return (timestamp << RANDOM_BITS) | lastRandom;
}

function encodeCrockford(value: bigint): string {
	const chars: string[] = new Array(ENCODED_LENGTH);

	for (let i = ENCODED_LENGTH - 1; i >= 0; i--) {
		chars[i] = CROCKFORD_ALPHABET[Number(value & 31n)]!;
		value >>= 5n;
	}

	return chars.join('');
}

function decodeCrockford(str: string): bigint {
	if (str.length !== ENCODED_LENGTH) {
		throw new Error(`Invalid sortable ID length: expected ${ENCODED_LENGTH}, got ${str.length}`);
	}

	let value = 0n;

	for (let i = 0; i < ENCODED_LENGTH; i++) {
		const char = str[i]!;
		const digit = CROCKFORD_DECODE[char];
		if (digit === undefined) {
			throw new Error(`Invalid Crockford Base32 character: ${char}`);
		}
		if (i === 0 && digit > MAX_LEADING_DIGIT) {
			throw new Error(`Sortable ID overflows 128 bits: ${str}`);
		}
		value = (value << 5n) | BigInt(digit);
	}

	return value;
}

/**
 * Sortable ID class for working with 128-bit time-ordered IDs
 */
export class SortableId {
	private readonly value: bigint;

	private constructor(value: bigint) {
		this.value = value;
	}

	static create(): SortableId {
		return new SortableId(generateBigInt());
	}

	/**
	 * Parse from a Crockford Base32 string (case-insensitive)
	 */
	static from(str: string): SortableId {
		return new SortableId(decodeCrockford(str));
	}

	toString(): string {
		return encodeCrockford(this.value);
	}

	/**
	 * Milliseconds since the Unix epoch
	 */
	getTimestamp(): number {
		return Number(this.value >> RANDOM_BITS);
	}

	getDate(): Date {
		return new Date(this.getTimestamp());
	}
}

/**
 * Generate a new sortable ID as a 26-character Crockford Base32 string.
 */
export function generate(): string {
	return SortableId.create().toString();
}

/**
 * Validate that a string is a well-formed sortable ID
 */
export function isValid(str: string): boolean {
	if (str.length !== ENCODED_LENGTH) {
		return false;
	}

	for (let i = 0; i < str.length; i++) {
		const digit = CROCKFORD_DECODE[str[i]!];
		if (digit === undefined) {
			return false;
		}
		if (i === 0 && digit > MAX_LEADING_DIGIT) {
			return false;
		}
	}

	return true;
}

/**
 * Extract the creation timestamp from a sortable ID string
 */
export function getTimestamp(id: string): Date {
	return SortableId.from(id).getDate();
}
