import { type Mat3, mat3, type Vec3 } from 'mathcat';

const MAX_JACOBI_SWEEPS = 50;

const _decompose_m = /* @__PURE__ */ mat3.create();
const _decompose_b = [0, 0, 0];
const _decompose_z = [0, 0, 0];
const _decompose_values = [0, 0, 0];
const _decompose_vectors = /* @__PURE__ */ mat3.create();
const _decompose_order = [0, 1, 2];

/**
 * Eigen decomposition of a symmetric 3x3 matrix using Jacobi rotations
 * (Numerical Recipes §11.1).
 *
 * Column-major layout: element (row, col) lives at `[col * 3 + row]`.
 * Eigenvectors are written as the columns of `outVectors`, sorted by descending eigenvalue;
 * eigenvalues are written to `outValues` in the same order.
 *
 * @returns false if the off-diagonal mass did not vanish within the sweep budget; the
 * output is still the best rotation found and is usable.
 */
export function decomposeSymmetric(matrix: Mat3, outVectors: Mat3, outValues: Vec3): boolean {
    const m = mat3.copy(_decompose_m, matrix);
    const vectors = mat3.identity(_decompose_vectors);
    const values = _decompose_values;
    const b = _decompose_b;
    const z = _decompose_z;

    for (let i = 0; i < 3; i++) {
        b[i] = m[i * 3 + i];
        values[i] = m[i * 3 + i];
        z[i] = 0;
    }

    let converged = false;

    for (let sweep = 0; sweep < MAX_JACOBI_SWEEPS; sweep++) {
        let offDiagonal = 0;
        for (let p = 0; p < 2; p++) {
            for (let q = p + 1; q < 3; q++) {
                offDiagonal += Math.abs(m[q * 3 + p]);
            }
        }

        if (offDiagonal / 9 < Number.MIN_VALUE) {
            converged = true;
            break;
        }

        const threshold = sweep < 4 ? (0.2 * offDiagonal) / 9 : Number.MIN_VALUE;

        for (let p = 0; p < 2; p++) {
            for (let q = p + 1; q < 3; q++) {
                const pq = q * 3 + p;
                const absPq = Math.abs(m[pq]);
                const g = 100 * absPq;

                if (sweep > 4 && Math.abs(values[p]) + g === Math.abs(values[p]) && Math.abs(values[q]) + g === Math.abs(values[q])) {
                    m[pq] = 0;
                    continue;
                }

                if (absPq <= threshold) continue;

                const h = values[q] - values[p];
                let t: number;
                if (Math.abs(h) + g === Math.abs(h)) {
                    t = m[pq] / h;
                } else {
                    const theta = (0.5 * h) / m[pq];
                    t = 1 / (Math.abs(theta) + Math.sqrt(1 + theta * theta));
                    if (theta < 0) t = -t;
                }

                const c = 1 / Math.sqrt(1 + t * t);
                const s = t * c;
                const tau = s / (1 + c);
                const shift = t * m[pq];

                z[p] -= shift;
                z[q] += shift;
                values[p] -= shift;
                values[q] += shift;
                m[pq] = 0;

                for (let j = 0; j < p; j++) rotate(m, p * 3 + j, q * 3 + j, s, tau);
                for (let j = p + 1; j < q; j++) rotate(m, j * 3 + p, q * 3 + j, s, tau);
                for (let j = q + 1; j < 3; j++) rotate(m, j * 3 + p, j * 3 + q, s, tau);
                for (let j = 0; j < 3; j++) rotate(vectors, p * 3 + j, q * 3 + j, s, tau);
            }
        }

        for (let i = 0; i < 3; i++) {
            b[i] += z[i];
            values[i] = b[i];
            z[i] = 0;
        }
    }

    // descending order
    const order = _decompose_order;
    order[0] = 0;
    order[1] = 1;
    order[2] = 2;
    order.sort((i, j) => values[j] - values[i]);

    for (let col = 0; col < 3; col++) {
        const src = order[col];
        outValues[col] = values[src];
        outVectors[col * 3] = vectors[src * 3];
        outVectors[col * 3 + 1] = vectors[src * 3 + 1];
        outVectors[col * 3 + 2] = vectors[src * 3 + 2];
    }

    return converged;
}

function rotate(m: Mat3, i: number, k: number, s: number, tau: number): void {
    const g = m[i];
    const h = m[k];
    m[i] = g - s * (h + g * tau);
    m[k] = h + s * (g - h * tau);
}
