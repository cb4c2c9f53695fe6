// src/tests-setup.ts

// Set up environment variables for testing.
// Keeps test runs from printing to the console or writing log files.
process.env['NUMSYS_LOG_LEVEL'] = 'silent';
delete process.env['NUMSYS_LOG_DIR'];
process.env['NUMSYS_BINARY_WORD_BITS'] = '32';
process.env['NUMSYS_FACTORIAL_WORD_BITS'] = '8';
