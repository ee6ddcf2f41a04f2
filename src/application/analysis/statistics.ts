export const sum = (values: number[]): number =>
  values.reduce((total, value) => total + value, 0);

export const mean = (values: number[]): number =>
  values.length === 0 ? Number.NaN : sum(values) / values.length;

const centralMoment = (values: number[], order: number): number => {
  const center = mean(values);
  return mean(values.map((value) => (value - center) ** order));
};

/**
 * Sample standard deviation (n - 1 denominator); NaN below two values.
 */
export const sampleStd = (values: number[]): number => {
  if (values.length < 2) {
    return Number.NaN;
  }

  const center = mean(values);
  const squares = sum(values.map((value) => (value - center) ** 2));
  return Math.sqrt(squares / (values.length - 1));
};

export const populationStd = (values: number[]): number =>
  values.length === 0 ? Number.NaN : Math.sqrt(centralMoment(values, 2));

/**
 * Linear-interpolated quantile over sorted values, matching the common "type 7" definition.
 */
export const quantile = (values: number[], q: number): number => {
  if (values.length === 0) {
    return Number.NaN;
  }

  const sorted = [...values].sort((a, b) => a - b);
  const position = (sorted.length - 1) * q;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  const lowerValue = sorted[lower] ?? Number.NaN;
  const upperValue = sorted[upper] ?? Number.NaN;
  return lowerValue + (upperValue - lowerValue) * (position - lower);
};

export const median = (values: number[]): number => quantile(values, 0.5);

export const skewness = (values: number[]): number => {
  const m2 = centralMoment(values, 2);
  return m2 === 0 ? 0 : centralMoment(values, 3) / m2 ** 1.5;
};

/**
 * Excess (Fisher) kurtosis.
 */
export const kurtosis = (values: number[]): number => {
  const m2 = centralMoment(values, 2);
  return m2 === 0 ? 0 : centralMoment(values, 4) / m2 ** 2 - 3;
};

export const compact = (values: Array<number | null>): number[] =>
  values.filter((value): value is number => value !== null);

const lanczos = [
  676.5203681218851, -1259.1392167224028, 771.32342877765313,
  -176.61502916214059, 12.507343278686905, -0.13857109526572012,
  9.9843695780195716e-6, 1.5056327351493116e-7,
];

export const logGamma = (x: number): number => {
  if (x < 0.5) {
    return Math.log(Math.PI / Math.sin(Math.PI * x)) - logGamma(1 - x);
  }

  const shifted = x - 1;
  let series = 0.99999999999980993;
  lanczos.forEach((coefficient, index) => {
    series += coefficient / (shifted + index + 1);
  });
  const t = shifted + lanczos.length - 0.5;
  return (
    0.5 * Math.log(2 * Math.PI) +
    (shifted + 0.5) * Math.log(t) -
    t +
    Math.log(series)
  );
};

const betaContinuedFraction = (a: number, b: number, x: number): number => {
  const maxIterations = 200;
  const epsilon = 3e-14;
  const tiny = 1e-300;
  let c = 1;
  let d = 1 - ((a + b) * x) / (a + 1);
  if (Math.abs(d) < tiny) d = tiny;
  d = 1 / d;
  let h = d;

  for (let m = 1; m <= maxIterations; m += 1) {
    const m2 = 2 * m;
    let aa = (m * (b - m) * x) / ((a + m2 - 1) * (a + m2));
    d = 1 + aa * d;
    if (Math.abs(d) < tiny) d = tiny;
    c = 1 + aa / c;
    if (Math.abs(c) < tiny) c = tiny;
    d = 1 / d;
    h *= d * c;

    aa = (-(a + m) * (a + b + m) * x) / ((a + m2) * (a + m2 + 1));
    d = 1 + aa * d;
    if (Math.abs(d) < tiny) d = tiny;
    c = 1 + aa / c;
    if (Math.abs(c) < tiny) c = tiny;
    d = 1 / d;
    const delta = d * c;
    h *= delta;
    if (Math.abs(delta - 1) < epsilon) {
      break;
    }
  }

  return h;
};

/**
 * Regularized incomplete beta I_x(a, b).
 */
export const incompleteBeta = (x: number, a: number, b: number): number => {
  if (x <= 0) return 0;
  if (x >= 1) return 1;

  const front = Math.exp(
    logGamma(a + b) -
      logGamma(a) -
      logGamma(b) +
      a * Math.log(x) +
      b * Math.log(1 - x),
  );

  if (x < (a + 1) / (a + b + 2)) {
    return (front * betaContinuedFraction(a, b, x)) / a;
  }

  return 1 - (front * betaContinuedFraction(b, a, 1 - x)) / b;
};

/**
 * Two-sided p-value of a Student t statistic.
 */
export const tTestPValue = (t: number, degreesOfFreedom: number): number => {
  if (degreesOfFreedom <= 0 || Number.isNaN(t)) {
    return 1;
  }

  if (!Number.isFinite(t)) {
    return 0;
  }

  return incompleteBeta(
    degreesOfFreedom / (degreesOfFreedom + t * t),
    degreesOfFreedom / 2,
    0.5,
  );
};

const correlationPValue = (r: number, n: number): number => {
  const df = n - 2;
  if (df <= 0) {
    return 1;
  }

  if (Math.abs(r) >= 1) {
    return 0;
  }

  return tTestPValue(r * Math.sqrt(df / (1 - r * r)), df);
};

export type PearsonResult = {
  r: number;
  pValue: number;
};

/**
 * Pearson correlation; r is NaN when either side is constant.
 */
export const pearson = (xs: number[], ys: number[]): PearsonResult => {
  const n = Math.min(xs.length, ys.length);
  const left = xs.slice(0, n);
  const right = ys.slice(0, n);
  const meanX = mean(left);
  const meanY = mean(right);

  let covariance = 0;
  let varianceX = 0;
  let varianceY = 0;
  for (let index = 0; index < n; index += 1) {
    const dx = (left[index] ?? 0) - meanX;
    const dy = (right[index] ?? 0) - meanY;
    covariance += dx * dy;
    varianceX += dx * dx;
    varianceY += dy * dy;
  }

  if (varianceX === 0 || varianceY === 0) {
    return { r: Number.NaN, pValue: Number.NaN };
  }

  const r = Math.max(-1, Math.min(1, covariance / Math.sqrt(varianceX * varianceY)));
  return { r, pValue: correlationPValue(r, n) };
};

export type LinearRegression = {
  slope: number;
  intercept: number;
  r: number;
  pValue: number;
};

/**
 * Ordinary least squares of `ys` on `xs`.
 */
export const linearRegression = (
  xs: number[],
  ys: number[],
): LinearRegression => {
  const meanX = mean(xs);
  const meanY = mean(ys);
  let sxy = 0;
  let sxx = 0;
  let syy = 0;
  xs.forEach((x, index) => {
    const dx = x - meanX;
    const dy = (ys[index] ?? meanY) - meanY;
    sxy += dx * dy;
    sxx += dx * dx;
    syy += dy * dy;
  });

  const slope = sxx === 0 ? 0 : sxy / sxx;
  const intercept = meanY - slope * meanX;
  if (sxx === 0 || syy === 0) {
    return { slope, intercept, r: 0, pValue: 1 };
  }

  const r = Math.max(-1, Math.min(1, sxy / Math.sqrt(sxx * syy)));
  return { slope, intercept, r, pValue: correlationPValue(r, xs.length) };
};

/**
 * Rolling mean over full windows only; positions without a full window are null.
 */
export const rollingMean = (
  values: number[],
  window: number,
  centered = false,
): Array<number | null> => {
  const offset = centered ? Math.floor(window / 2) : window - 1;
  return values.map((_, index) => {
    const start = index - offset;
    const end = start + window;
    if (start < 0 || end > values.length) {
      return null;
    }
    return mean(values.slice(start, end));
  });
};

/**
 * Trailing rolling sample standard deviation.
 */
export const rollingStd = (
  values: number[],
  window: number,
): Array<number | null> =>
  values.map((_, index) => {
    const start = index - window + 1;
    if (start < 0) {
      return null;
    }
    const std = sampleStd(values.slice(start, index + 1));
    return Number.isNaN(std) ? null : std;
  });

export const lastDefined = (values: Array<number | null>): number | null => {
  for (let index = values.length - 1; index >= 0; index -= 1) {
    const value = values[index];
    if (value !== undefined && value !== null) {
      return value;
    }
  }
  return null;
};
