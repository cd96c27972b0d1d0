/**
 * Vitest setup file
 * Runs before every test file.
 */

// Required by tsyringe before the container module loads
import 'reflect-metadata';

// Keep pino quiet unless a test opts in
process.env['KICKSTAND_LOG_LEVEL'] ??= 'silent';
