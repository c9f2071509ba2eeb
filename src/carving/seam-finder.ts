/**
 * Minimum-energy vertical seam search by dynamic programming.
 *
 * Forward pass builds the cumulative table M and a backtrack table of parent
 * offsets; the backward pass walks the offsets up from the cheapest cell of
 * the last row. Each row of M only reads the row above it.
 */

import { assertValidEnergyMap, type EnergyMap } from './energy.js';

export interface Seam {
  /** Column index for each row, top to bottom. */
  columns: number[];
  /** Sum of the energy along the seam. */
  cost: number;
}

export interface CumulativeEnergy {
  width: number;
  height: number;
  /** M[i][j], row-major. */
  table: Float64Array;
  /** Parent offset (-1, 0 or +1) for every cell; row 0 is all zeros. */
  backtrack: Int8Array;
}

/**
 * Build M and the backtrack table.
 * Equal parent costs resolve left, then straight, then right.
 */
export function computeCumulativeEnergy(energy: EnergyMap): CumulativeEnergy {
  assertValidEnergyMap(energy);
  const { width, height, data } = energy;
  const table = new Float64Array(width * height);
  const backtrack = new Int8Array(width * height);

  table.set(data.subarray(0, width), 0);

  for (let i = 1; i < height; i++) {
    const row = i * width;
    const above = row - width;
    for (let j = 0; j < width; j++) {
      // Strict comparisons keep the earlier candidate on ties
      let offset = j > 0 ? -1 : 0;
      let best = j > 0 ? table[above + j - 1] : Infinity;

      const up = table[above + j];
      if (up < best) {
        best = up;
        offset = 0;
      }

      if (j + 1 < width) {
        const right = table[above + j + 1];
        if (right < best) {
          best = right;
          offset = 1;
        }
      }

      table[row + j] = data[row + j] + best;
      backtrack[row + j] = offset;
    }
  }

  return { width, height, table, backtrack };
}

/**
 * Find the vertical seam with the lowest total energy.
 * @param energy - Energy map of the current buffer
 * @returns One column per row plus the total cost
 */
export function findVerticalSeam(energy: EnergyMap): Seam {
  const { width, height, table, backtrack } = computeCumulativeEnergy(energy);
  const lastRow = (height - 1) * width;

  let column = 0;
  for (let j = 1; j < width; j++) {
    if (table[lastRow + j] < table[lastRow + column]) {
      column = j;
    }
  }

  const cost = table[lastRow + column];
  const columns = new Array<number>(height);
  columns[height - 1] = column;
  for (let i = height - 1; i > 0; i--) {
    column += backtrack[i * width + column];
    columns[i - 1] = column;
  }

  return { columns, cost };
}
