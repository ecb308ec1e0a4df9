// src/lib/dimensionReducer.ts
import { PCA } from "ml-pca";
import { DimensionReductionError, errorMessage } from "./errors";
import { createLogger } from "./logger";

const log = createLogger("dimensionReducer");

export type ProjectionModel = {
  outputDimension: number;
  inputDimension: number;
  pca: ReturnType<PCA["toJSON"]>;
};

function validateBatch(vectors: number[][]): number {
  if (vectors.length < 2) {
    throw new DimensionReductionError(
      `At least two vectors are needed to fit a projection, got ${vectors.length}. ` +
        "Documents that yield a single chunk need REDUCE_DIMENSIONS=false"
    );
  }
  const d = vectors[0].length;
  if (d === 0 || vectors.some((v) => v.length !== d)) {
    throw new DimensionReductionError("Vectors must share a non-zero length");
  }
  return d;
}

function fitPca(vectors: number[][]): PCA {
  try {
    // the covariance method yields one component per input dimension, even
    // when there are fewer vectors than dimensions
    return new PCA(vectors, { method: "covarianceMatrix" });
  } catch (err) {
    log.error("PCA fit failed:", err);
    throw new DimensionReductionError(
      `Projection fit failed: ${errorMessage(err)}`,
      { cause: err }
    );
  }
}

/**
 * A variance-maximizing linear projection fit once and applied to every later
 * batch, so document and query vectors land in the same reduced space.
 */
export class FittedProjection {
  private constructor(
    private pca: PCA,
    readonly inputDimension: number,
    readonly outputDimension: number
  ) {}

  static fit(vectors: number[][], targetDimension = 128): FittedProjection {
    const d = validateBatch(vectors);
    const outputDimension = Math.min(targetDimension, d);
    const projection = new FittedProjection(fitPca(vectors), d, outputDimension);
    log.debug(`Fit projection ${d} -> ${outputDimension} on ${vectors.length} vectors`);
    return projection;
  }

  static load(model: ProjectionModel): FittedProjection {
    return new FittedProjection(
      PCA.load(model.pca),
      model.inputDimension,
      model.outputDimension
    );
  }

  transform(vectors: number[][]): number[][] {
    if (vectors.length === 0) return [];
    const mismatched = vectors.find((v) => v.length !== this.inputDimension);
    if (mismatched) {
      throw new DimensionReductionError(
        `Projection expects vectors of length ${this.inputDimension}, got ${mismatched.length}`
      );
    }
    return this.pca
      .predict(vectors, { nComponents: this.outputDimension })
      .to2DArray();
  }

  toJSON(): ProjectionModel {
    return {
      inputDimension: this.inputDimension,
      outputDimension: this.outputDimension,
      pca: this.pca.toJSON(),
    };
  }
}

/**
 * Fits a fresh projection on `vectors` and applies it to the same batch.
 * Results of separate calls live in different spaces and are not comparable.
 */
export function reduce(vectors: number[][], targetDimension = 128): number[][] {
  return FittedProjection.fit(vectors, targetDimension).transform(vectors);
}

/** Cumulative explained variance ratio for 1..maxComponents components. */
export function explainedVarianceProfile(
  vectors: number[][],
  maxComponents = 10
): number[] {
  validateBatch(vectors);
  return fitPca(vectors).getCumulativeVariance().slice(0, maxComponents);
}
