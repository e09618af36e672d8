/**
 * Screen plane mesh.
 *
 * A `rows` x `columns` vertex grid spanning [-1, 1] on X and Y at z = 0.
 * UV (0, 0) is the top-left corner of the source. The grid has to be dense
 * for the curvature to read as a smooth bow: the displacement is computed
 * per vertex and interpolated linearly in between.
 */

/** Floats per vertex: position (3) + uv (2). */
export const MODEL_VERTEX_FLOATS = 5;

export interface PlaneMesh {
  /** Interleaved position.xyz, uv.xy. */
  readonly vertices: Float32Array;
  /** Triangle list. */
  readonly indices: Uint32Array;
  readonly indexCount: number;
}

export function createPlaneMesh(rows: number, columns: number): PlaneMesh {
  if (!Number.isInteger(rows) || !Number.isInteger(columns) || rows < 2 || columns < 2) {
    throw new Error(`[Mesh] Plane needs at least 2x2 vertices, got ${rows}x${columns}.`);
  }

  const vertices = new Float32Array(rows * columns * MODEL_VERTEX_FLOATS);
  let v = 0;
  for (let row = 0; row < rows; row++) {
    const t = row / (rows - 1);
    for (let column = 0; column < columns; column++) {
      const s = column / (columns - 1);
      vertices[v++] = -1 + s * 2;
      vertices[v++] = -1 + t * 2;
      vertices[v++] = 0;
      vertices[v++] = s;
      vertices[v++] = 1 - t;
    }
  }

  const indices = new Uint32Array((rows - 1) * (columns - 1) * 6);
  let i = 0;
  for (let row = 0; row < rows - 1; row++) {
    for (let column = 0; column < columns - 1; column++) {
      const topLeft = row * columns + column;
      const below = topLeft + columns;
      indices[i++] = topLeft;
      indices[i++] = topLeft + 1;
      indices[i++] = below;
      indices[i++] = below;
      indices[i++] = topLeft + 1;
      indices[i++] = below + 1;
    }
  }

  return { vertices, indices, indexCount: indices.length };
}
