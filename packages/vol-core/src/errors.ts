/**
 * Raised when a surface cannot be reshaped into a skew grid:
 * no points, a bad strike grid or horizon, non-positive strikes, bad dates.
 */
export class TransformError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TransformError";
  }
}
