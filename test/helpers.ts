import { BuildError } from '../src/core/errors.js';

/** Runs `fn` and returns the BuildError it throws */
export function catchBuildError(fn: () => unknown): BuildError {
  try {
    fn();
  } catch (error) {
    if (error instanceof BuildError) return error;
    throw error;
  }
  throw new Error('expected a BuildError to be thrown');
}
