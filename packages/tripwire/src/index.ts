/**
 * tripwire
 *
 * Thread-aware signals and connections for Node.js.
 *
 * This package re-exports everything from @tripwire/core for convenience.
 */

// Re-export from core using the package name (resolved via package.json exports)
// This works at runtime because @tripwire/core is a dependency
export * from '@tripwire/core';
