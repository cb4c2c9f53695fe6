// src/util/config.ts

/**
 * Reads the numeric systems' configuration from the environment.
 *
 * A `.env` file in the working directory is loaded first, if it exists.
 * Malformed values are reported to `configLog.txt` and replaced by their defaults.
 * Well-formed values are kept, so a valid log directory still receives the report.
 */

import * as z from 'zod';

import type { WordBits } from '../storage/wordstorage.js';
import type { LogLevel } from './logEvents.js';

import { configureLogging, logEvents, logEventsAndPrint } from './logEvents.js';

import 'dotenv/config'; // Imports all properties of process.env, if it exists


// Types ========================================================


interface NumericConfig {
	/** Width of each storage word of the binary engine. */
	binaryWordBits: WordBits;
	/** Width of each storage word the factorial engine packs its digits into. */
	factorialWordBits: WordBits;
	logLevel: LogLevel;
	/** Directory log files are written to. Undefined disables file logging. */
	logDir: string | undefined;
}


// Schema =======================================================


const WORD_BITS_BY_NAME = { '8': 8, '16': 16, '32': 32 } as const;

const WordBitsSchema = z.enum(['8', '16', '32']).transform((bits) => WORD_BITS_BY_NAME[bits]);

const EnvSchema = z.object({
	NUMSYS_BINARY_WORD_BITS: WordBitsSchema.default(32),
	NUMSYS_FACTORIAL_WORD_BITS: WordBitsSchema.default(8),
	NUMSYS_LOG_LEVEL: z.enum(['silent', 'error', 'debug']).default('error'),
	NUMSYS_LOG_DIR: z.string().min(1).optional(),
});

const DEFAULT_CONFIG: Readonly<NumericConfig> = {
	binaryWordBits: 32,
	factorialWordBits: 8,
	logLevel: 'error',
	logDir: undefined,
};

/** Replaces each malformed variable by its default, independently of the others. */
const LenientEnvSchema = z.object({
	NUMSYS_BINARY_WORD_BITS: EnvSchema.shape.NUMSYS_BINARY_WORD_BITS.catch(DEFAULT_CONFIG.binaryWordBits),
	NUMSYS_FACTORIAL_WORD_BITS: EnvSchema.shape.NUMSYS_FACTORIAL_WORD_BITS.catch(DEFAULT_CONFIG.factorialWordBits),
	NUMSYS_LOG_LEVEL: EnvSchema.shape.NUMSYS_LOG_LEVEL.catch(DEFAULT_CONFIG.logLevel),
	NUMSYS_LOG_DIR: EnvSchema.shape.NUMSYS_LOG_DIR.catch(DEFAULT_CONFIG.logDir),
});


// Loading ======================================================


function toConfig(env: z.output<typeof EnvSchema>): NumericConfig {
	return {
		binaryWordBits: env.NUMSYS_BINARY_WORD_BITS,
		factorialWordBits: env.NUMSYS_FACTORIAL_WORD_BITS,
		logLevel: env.NUMSYS_LOG_LEVEL,
		logDir: env.NUMSYS_LOG_DIR,
	};
}

/**
 * Parses the configuration out of a set of environment variables.
 *
 * When a variable is malformed, the logging options are applied from the
 * well-formed ones before the error is reported, so the report reaches their log directory.
 * @param env - The environment to read. Defaults to `process.env`.
 * @returns The parsed configuration, with the default in place of every malformed variable.
 */
function loadConfig(env: Record<string, string | undefined> = process.env): NumericConfig {
	const result = EnvSchema.safeParse(env);
	if (result.success) return toConfig(result.data);

	const config = toConfig(LenientEnvSchema.parse(env));
	configureLogging({ level: config.logLevel, logDir: config.logDir });

	const treeifiedErrors = JSON.stringify(z.treeifyError(result.error), null, 2);
	logEvents(`Malformed numeric systems environment. Zod treeified errors:\n${treeifiedErrors}`, 'configLog.txt');
	logEventsAndPrint('Invalid numeric systems configuration, falling back to defaults for the malformed variables. Check configLog.txt for more details.', 'errLog.txt');
	return config;
}

const config: Readonly<NumericConfig> = loadConfig();
configureLogging({ level: config.logLevel, logDir: config.logDir });


export type { NumericConfig };

export { loadConfig, DEFAULT_CONFIG };

export default config;
