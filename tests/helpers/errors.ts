import { MatrixBrainError } from '../../src/utils/errors.js';

/**
 * Run a function that should fail and return what it threw, narrowed to MatrixBrainError.
 */
export async function captureError(fn: () => unknown): Promise<MatrixBrainError> {
  try {
    await fn();
  } catch (error) {
    if (error instanceof MatrixBrainError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected an error to be thrown');
}
