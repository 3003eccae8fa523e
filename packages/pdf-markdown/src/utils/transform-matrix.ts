/**
 * 2D affine matrix `[a, b, c, d, e, f]` in PDF operand order.
 */
export type TransformMatrix = [number, number, number, number, number, number];

export const IDENTITY_MATRIX: TransformMatrix = [1, 0, 0, 1, 0, 0];

/**
 * Concatenate two matrices so that `inner` applies first, then `outer`.
 *
 * Tracking a `cm` operator is `multiplyMatrices(ctm, operand)`.
 */
export function multiplyMatrices(
  outer: TransformMatrix,
  inner: TransformMatrix,
): TransformMatrix {
  return [
    outer[0] * inner[0] + outer[2] * inner[1],
    outer[1] * inner[0] + outer[3] * inner[1],
    outer[0] * inner[2] + outer[2] * inner[3],
    outer[1] * inner[2] + outer[3] * inner[3],
    outer[0] * inner[4] + outer[2] * inner[5] + outer[4],
    outer[1] * inner[4] + outer[3] * inner[5] + outer[5],
  ];
}

export function applyToPoint(
  matrix: TransformMatrix,
  x: number,
  y: number,
): [number, number] {
  return [
    matrix[0] * x + matrix[2] * y + matrix[4],
    matrix[1] * x + matrix[3] * y + matrix[5],
  ];
}

/**
 * Narrow an operator argument to a matrix. Returns null unless it is an
 * array of six finite numbers.
 */
export function toTransformMatrix(value: unknown): TransformMatrix | null {
  if (!Array.isArray(value) || value.length !== 6) return null;

  const numbers: number[] = [];
  for (const entry of value) {
    if (typeof entry !== 'number' || !Number.isFinite(entry)) return null;
    numbers.push(entry);
  }

  const [a, b, c, d, e, f] = numbers;
  return [a, b, c, d, e, f];
}
