// src/storage/stateinfo.ts

/**
 * A sign and a 63-bit unsigned auxiliary value packed into one 64-bit word.
 * The most significant bit holds the sign, the remaining 63 bits the value.
 */


// Constants =========================================================


const ZERO: bigint = 0n;

/** Mask for the sign bit (MSB). */
const SIGN_MASK: bigint = 1n << 63n;
/** Mask for the value bits (all except the MSB). */
const VALUE_MASK: bigint = SIGN_MASK - 1n;


// StateInfo =========================================================


export class StateInfo {
	private data: bigint;

	/**
	 * @param value - The auxiliary value. Only its low 63 bits are kept.
	 * @param sign - True if negative.
	 */
	constructor(value: bigint = ZERO, sign: boolean = false) {
		this.data = (sign ? SIGN_MASK : ZERO) | (value & VALUE_MASK);
	}

	/** The 63-bit auxiliary value. */
	get value(): bigint {
		return this.data & VALUE_MASK;
	}

	setValue(value: bigint): void {
		this.data = (this.data & SIGN_MASK) | (value & VALUE_MASK);
	}

	/** True if the sign bit is set. */
	get sign(): boolean {
		return (this.data & SIGN_MASK) !== ZERO;
	}

	setSign(negative: boolean): void {
		if (negative) this.data |= SIGN_MASK;
		else this.data &= VALUE_MASK;
	}

	/** The whole packed 64-bit word. */
	get raw(): bigint {
		return this.data;
	}
}
