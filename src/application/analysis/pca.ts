import { err, ok } from "neverthrow";
import type {
  ComponentPattern,
  PcaResult,
  PrincipalComponent,
  SourceContribution,
  SubAnalysis,
} from "../../core/entities/features";
import { insufficientData } from "../../core/entities/appError";
import { mean, populationStd, sum } from "./statistics";

const REPORTED_COMPONENTS = 3;

type Matrix = number[][];

const at = (matrix: Matrix, row: number, column: number): number =>
  matrix[row]?.[column] ?? 0;

const set = (matrix: Matrix, row: number, column: number, value: number) => {
  const target = matrix[row];
  if (target) {
    target[column] = value;
  }
};

const identity = (size: number): Matrix =>
  Array.from({ length: size }, (_, row) =>
    Array.from({ length: size }, (__, column) => (row === column ? 1 : 0)),
  );

export type EigenPair = {
  value: number;
  vector: number[];
};

/**
 * Cyclic Jacobi rotations for a small symmetric matrix; pairs come back sorted by eigenvalue, descending.
 */
export const symmetricEigen = (input: Matrix, maxSweeps = 100): EigenPair[] => {
  const size = input.length;
  const a = input.map((row) => [...row]);
  const v = identity(size);

  for (let sweep = 0; sweep < maxSweeps; sweep += 1) {
    let offDiagonal = 0;
    for (let p = 0; p < size; p += 1) {
      for (let q = p + 1; q < size; q += 1) {
        offDiagonal += at(a, p, q) ** 2;
      }
    }
    if (offDiagonal < 1e-22) {
      break;
    }

    for (let p = 0; p < size; p += 1) {
      for (let q = p + 1; q < size; q += 1) {
        const apq = at(a, p, q);
        if (Math.abs(apq) < 1e-300) {
          continue;
        }

        const theta = (at(a, q, q) - at(a, p, p)) / (2 * apq);
        const t =
          Math.sign(theta || 1) /
          (Math.abs(theta) + Math.sqrt(theta * theta + 1));
        const c = 1 / Math.sqrt(t * t + 1);
        const s = t * c;

        for (let k = 0; k < size; k += 1) {
          const akp = at(a, k, p);
          const akq = at(a, k, q);
          set(a, k, p, c * akp - s * akq);
          set(a, k, q, s * akp + c * akq);
        }
        for (let k = 0; k < size; k += 1) {
          const apk = at(a, p, k);
          const aqk = at(a, q, k);
          set(a, p, k, c * apk - s * aqk);
          set(a, q, k, s * apk + c * aqk);
        }
        for (let k = 0; k < size; k += 1) {
          const vkp = at(v, k, p);
          const vkq = at(v, k, q);
          set(v, k, p, c * vkp - s * vkq);
          set(v, k, q, s * vkp + c * vkq);
        }
      }
    }
  }

  return Array.from({ length: size }, (_, index) => {
    const vector = v.map((row) => row[index] ?? 0);
    // Sign convention: largest-magnitude coordinate is positive
    const anchor = vector.reduce(
      (best, value) => (Math.abs(value) > Math.abs(best) ? value : best),
      0,
    );
    return {
      value: at(a, index, index),
      vector: anchor < 0 ? vector.map((value) => -value) : vector,
    };
  }).sort((left, right) => right.value - left.value);
};

export const standardizeColumns = (rows: Matrix): Matrix => {
  const width = rows[0]?.length ?? 0;
  const stats = Array.from({ length: width }, (_, column) => {
    const values = rows.map((row) => row[column] ?? 0);
    return { center: mean(values), scale: populationStd(values) };
  });

  return rows.map((row) =>
    row.map((value, column) => {
      const stat = stats[column];
      if (!stat || !(stat.scale > 0)) {
        return 0;
      }
      return (value - stat.center) / stat.scale;
    }),
  );
};

export const covarianceMatrix = (rows: Matrix): Matrix => {
  const width = rows[0]?.length ?? 0;
  const centers = Array.from({ length: width }, (_, column) =>
    mean(rows.map((row) => row[column] ?? 0)),
  );
  const denominator = Math.max(rows.length - 1, 1);

  return Array.from({ length: width }, (_, i) =>
    Array.from(
      { length: width },
      (__, j) =>
        sum(
          rows.map(
            (row) =>
              ((row[i] ?? 0) - (centers[i] ?? 0)) *
              ((row[j] ?? 0) - (centers[j] ?? 0)),
          ),
        ) / denominator,
    ),
  );
};

export const contributionLevel = (
  loading: number,
): Pick<SourceContribution, "level" | "role"> => {
  const magnitude = Math.abs(loading);
  if (magnitude >= 0.6) return { level: "high", role: "dominant driver" };
  if (magnitude >= 0.3)
    return { level: "medium", role: "significant contributor" };
  return { level: "low", role: "minor contributor" };
};

export const componentPattern = (loadings: number[]): ComponentPattern => {
  const positive = loadings.filter((loading) => loading > 0.3).length;
  const negative = loadings.filter((loading) => loading < -0.3).length;
  if (positive >= 2 && negative >= 2) return "contrast";
  if (positive >= 2) return "alignment";
  if (negative >= 2) return "inverse";
  return "mixed";
};

const describeContributions = (
  sources: string[],
  loadings: number[],
): SourceContribution[] =>
  sources
    .map((source, index) => {
      const loading = loadings[index] ?? 0;
      const { level, role } = contributionLevel(loading);
      return {
        source,
        loading,
        level,
        role,
        direction:
          loading > 0
            ? ("positive" as const)
            : loading < 0
              ? ("negative" as const)
              : ("neutral" as const),
      };
    })
    .sort((a, b) => Math.abs(b.loading) - Math.abs(a.loading));

// Rounding can push the ratio sum a few ulps past 1.
const capAtUnit = (ratios: number[]): number[] => {
  let capped = ratios;
  while (sum(capped) > 1) {
    capped = capped.map((ratio) => ratio * (1 - Number.EPSILON));
  }
  return capped;
};

/**
 * PCA over complete rows of the joined sources, standardized per column.
 */
export const analyzePrincipalComponents = (
  sources: string[],
  rows: Matrix,
  minRows: number,
): SubAnalysis<PcaResult> => {
  if (sources.length < 2) {
    return err({
      code: "insufficient_data",
      message: "PCA needs at least 2 sources.",
      required: 2,
      actual: sources.length,
    });
  }

  if (rows.length < minRows) {
    return err(insufficientData("PCA", minRows, rows.length));
  }

  const columnCount = rows[0]?.length ?? 0;
  const componentCount = Math.min(sources.length, columnCount);
  const eigenPairs = symmetricEigen(covarianceMatrix(standardizeColumns(rows)));
  const eigenvalues = eigenPairs.map((pair) => Math.max(pair.value, 0));
  const totalVariance = sum(eigenvalues);

  if (!(totalVariance > 0)) {
    return err({
      code: "computation_failed",
      message: "PCA needs at least one source with non-zero variance.",
    });
  }

  const retained = eigenvalues.slice(0, componentCount);
  const denominator = Math.max(totalVariance, sum(retained));
  const varianceRatios = capAtUnit(
    retained.map((value) => value / denominator),
  );

  let cumulative = 0;
  const components: PrincipalComponent[] = eigenPairs
    .slice(0, Math.min(REPORTED_COMPONENTS, componentCount))
    .map((pair, index) => {
      const ratio = varianceRatios[index] ?? 0;
      cumulative += ratio;
      const loadings = pair.vector.map((value) => value * Math.sqrt(ratio));
      return {
        label: `PC${index + 1}`,
        varianceExplained: ratio * 100,
        cumulativeVariance: Math.min(1, cumulative) * 100,
        loadings: Object.fromEntries(
          sources.map((source, column) => [source, loadings[column] ?? 0]),
        ),
        contributions: describeContributions(sources, loadings),
        pattern: componentPattern(loadings),
      };
    });

  return ok({
    componentCount,
    varianceRatios,
    totalVarianceExplained: sum(varianceRatios) * 100,
    components,
    rowsUsed: rows.length,
  });
};
